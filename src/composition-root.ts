import type { AppConfig } from "./config.js";
import type { FileSystem, Logger, ModuleResolver, ScanImports } from "./domain/ports.js";
import { NodeFileSystem } from "./infrastructure/node-filesystem.js";
import { ConsoleLogger } from "./infrastructure/console-logger.js";
import { NearestModuleResolver } from "./infrastructure/module-resolver.js";
import { GoParser } from "./domain/parsers/go.js";
import { ScanImportsService } from "./application/scan-imports.js";

export interface AppServices {
  fs: FileSystem;
  modules: ModuleResolver;
  scanImports: ScanImports;
  logger: Logger;
}

export function createAppServices(config: AppConfig): AppServices {
  const logger = new ConsoleLogger(config.logLevel);
  const fs = new NodeFileSystem();
  const modules = new NearestModuleResolver(fs, logger, config.moduleFile);
  const scanImports = new ScanImportsService(fs, new GoParser(), modules, logger, {
    includeTests: config.includeTests,
    ignore: config.ignore,
  });

  return { fs, modules, scanImports, logger };
}

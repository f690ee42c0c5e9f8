import { dirname, join, resolve } from "node:path";
import type { FileSystem, Logger, ModuleResolver } from "../domain/ports.js";
import { DEFAULT_MODULE_FILE, Module, parseModuleFile } from "../domain/module.js";
import { ModuleResolutionError } from "../domain/errors.js";

/**
 * Finds the owning module by walking up to the nearest directory that
 * holds a module file.
 */
export class NearestModuleResolver implements ModuleResolver {
  private cache = new Map<string, Module>();

  constructor(
    private readonly fs: FileSystem,
    private readonly logger: Logger,
    private readonly moduleFile = DEFAULT_MODULE_FILE,
  ) {}

  resolve(fromPath: string): Module {
    const start = resolve(fromPath);
    let dir = this.fs.isDirectory(start) ? start : dirname(start);

    for (;;) {
      const cached = this.cache.get(dir);
      if (cached) return cached;

      const candidate = join(dir, this.moduleFile);
      if (this.fs.exists(candidate)) {
        const mod = new Module(parseModuleFile(this.fs.readFile(candidate), candidate), dir);
        this.logger.debug(`Module ${mod.path()} at ${dir}`);
        this.cache.set(dir, mod);
        return mod;
      }

      const parent = dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }

    throw new ModuleResolutionError(fromPath, `no ${this.moduleFile} found in any parent directory`);
  }
}

// Public API exports

// ── Domain types ────────────────────────────────────────────────
export type {
  Position,
  LiteralKind,
  BasicLiteral,
  ImportSpec,
  ModuleContext,
  ModuleImports,
  ScanFailure,
  ScanReport,
} from "./domain/types.js";

// ── Domain ports ────────────────────────────────────────────────
export type {
  FileSystem,
  GlobOptions,
  Logger,
  HeaderParser,
  ModuleResolver,
  ScanImports,
  ScanOptions,
} from "./domain/ports.js";

// ── Domain ──────────────────────────────────────────────────────
export {
  InvariantViolation,
  invariant,
  ImportDepsError,
  ImportParseError,
  ModuleResolutionError,
} from "./domain/errors.js";
export { FileSet, SourceFile } from "./domain/file-set.js";
export { decodeStringLiteral, unquote } from "./domain/literal.js";
export { canonicalImportPath, cleanPath, isRelativeImport } from "./domain/canonical.js";
export { Module, parseModuleFile, DEFAULT_MODULE_FILE } from "./domain/module.js";
export { ImportsParser, mergeImports } from "./domain/imports-parser.js";
export type { ImportsParserDeps } from "./domain/imports-parser.js";
export { GoParser } from "./domain/parsers/go.js";

// ── Application ─────────────────────────────────────────────────
export { ScanImportsService } from "./application/scan-imports.js";
export type { ScanImportsSettings } from "./application/scan-imports.js";
export { formatReport } from "./application/format-report.js";
export type { ReportFormat } from "./application/format-report.js";

// ── Infrastructure ──────────────────────────────────────────────
export { NodeFileSystem } from "./infrastructure/node-filesystem.js";
export { ConsoleLogger } from "./infrastructure/console-logger.js";
export type { LogLevel } from "./infrastructure/console-logger.js";
export { NearestModuleResolver } from "./infrastructure/module-resolver.js";

// ── Composition ─────────────────────────────────────────────────
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createAppServices } from "./composition-root.js";
export type { AppServices } from "./composition-root.js";

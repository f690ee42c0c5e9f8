import type { ImportSpec, ScanReport } from "./types.js";
import type { SourceFile } from "./file-set.js";
import type { Module } from "./module.js";

// ── Outbound ports ──────────────────────────────────────────────

export interface GlobOptions {
  cwd: string;
  absolute?: boolean;
  ignore?: string[];
}

export interface FileSystem {
  readFile(filePath: string): string;
  exists(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
  glob(patterns: string[], options: GlobOptions): Promise<string[]>;
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
}

/**
 * Source-grammar parser: reads only the package clause and import block of
 * a file. Throws ImportParseError when that header does not parse.
 */
export interface HeaderParser {
  readonly supportedExtensions: string[];
  readonly languageName: string;
  parseHeader(source: string, file: SourceFile): ImportSpec[];
}

export interface ModuleResolver {
  /** Module owning the file or directory at `fromPath`. */
  resolve(fromPath: string): Module;
}

// ── Inbound ports (use cases) ───────────────────────────────────

export interface ScanOptions {
  includeTests?: boolean;
}

export interface ScanImports {
  scan(paths: string[], options?: ScanOptions): Promise<ScanReport>;
  collectFiles(dirPath: string, options?: ScanOptions): Promise<string[]>;
}

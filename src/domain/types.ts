// ── Source positions ────────────────────────────────────────────

export interface Position {
  filename: string;
  /** 0-based character offset into the file. */
  offset: number;
  /** 1-based. */
  line: number;
  /** 1-based, in characters. */
  column: number;
}

// ── Parsed header entities ──────────────────────────────────────

export type LiteralKind = "string" | "int" | "float" | "imaginary" | "rune" | "unknown";

export interface BasicLiteral {
  kind: LiteralKind;
  /** Raw token text, quotes included. */
  value: string;
}

export interface ImportSpec {
  /** Local package name: an identifier, "_" or ".". */
  name?: string;
  path: BasicLiteral;
  position: Position;
}

// ── Module context ──────────────────────────────────────────────

export interface ModuleContext {
  /** Canonical root import path of the module. */
  path(): string;
}

// ── Scan results ────────────────────────────────────────────────

export interface ModuleImports {
  module: string;
  dir: string;
  files: string[];
  imports: string[];
}

export interface ScanFailure {
  filePath: string;
  message: string;
}

export interface ScanReport {
  modules: ModuleImports[];
  imports: string[];
  filesScanned: number;
  failures: ScanFailure[];
}

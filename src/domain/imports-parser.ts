import type { FileSystem, HeaderParser } from "./ports.js";
import type { ModuleContext } from "./types.js";
import type { FileSet } from "./file-set.js";
import { ImportParseError } from "./errors.js";
import { decodeStringLiteral } from "./literal.js";
import { canonicalImportPath } from "./canonical.js";

export interface ImportsParserDeps {
  parser: HeaderParser;
  fs: FileSystem;
}

/**
 * Accumulates the canonical import paths of every file fed to it.
 *
 * One instance per scan session and module. Not safe for interleaved use:
 * give each concurrent scan its own parser and combine them with
 * {@link mergeImports}.
 */
export class ImportsParser {
  private readonly deps = new Set<string>();

  constructor(
    private readonly fset: FileSet,
    private readonly mod: ModuleContext,
    private readonly services: ImportsParserDeps,
  ) {}

  /**
   * Read `filePath` and add its imports. On ImportParseError nothing from
   * this file has been added.
   */
  parseImports(filePath: string): void {
    let source: string;
    try {
      source = this.services.fs.readFile(filePath);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ImportParseError(filePath, `cannot read file: ${detail}`, undefined, { cause: err });
    }
    this.parseSource(filePath, source);
  }

  /** Same as {@link parseImports} with the file contents already in hand. */
  parseSource(filePath: string, source: string): void {
    const file = this.fset.addFile(filePath, source);
    const specs = this.services.parser.parseHeader(source, file);

    const paths = specs.map((spec) => canonicalImportPath(decodeStringLiteral(spec.path), this.mod));
    for (const p of paths) {
      this.deps.add(p);
    }
  }

  imports(): ReadonlySet<string> {
    return this.deps;
  }
}

export function mergeImports(parsers: Iterable<ImportsParser>): Set<string> {
  const merged = new Set<string>();
  for (const parser of parsers) {
    for (const p of parser.imports()) merged.add(p);
  }
  return merged;
}

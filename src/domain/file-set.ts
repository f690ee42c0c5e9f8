import type { Position } from "./types.js";

/** Line table of one registered source file. */
export class SourceFile {
  constructor(
    readonly name: string,
    readonly size: number,
    private readonly lineStarts: readonly number[],
  ) {}

  get lineCount(): number {
    return this.lineStarts.length;
  }

  position(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.size));
    // last line start <= offset
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= clamped) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return {
      filename: this.name,
      offset: clamped,
      line: lo + 1,
      column: clamped - this.lineStarts[lo] + 1,
    };
  }
}

/**
 * Registry of every file handed to a parser, used to turn offsets into
 * file:line:column positions for diagnostics. One instance is shared by all
 * parsers of a scan session.
 */
export class FileSet {
  private files = new Map<string, SourceFile>();

  addFile(name: string, source: string): SourceFile {
    const lineStarts = [0];
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) lineStarts.push(i + 1);
    }
    const file = new SourceFile(name, source.length, lineStarts);
    this.files.set(name, file);
    return file;
  }

  file(name: string): SourceFile | undefined {
    return this.files.get(name);
  }

  position(name: string, offset: number): Position | undefined {
    return this.files.get(name)?.position(offset);
  }

  get size(): number {
    return this.files.size;
  }
}

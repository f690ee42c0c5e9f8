import { existsSync, readFileSync, statSync } from "node:fs";
import fg from "fast-glob";
import type { FileSystem, GlobOptions } from "../domain/ports.js";

// fatal: bytes that are not UTF-8 fail the read instead of becoming U+FFFD
const utf8 = new TextDecoder("utf-8", { fatal: true });

export class NodeFileSystem implements FileSystem {
  readFile(filePath: string): string {
    return utf8.decode(readFileSync(filePath));
  }

  exists(filePath: string): boolean {
    return existsSync(filePath);
  }

  isDirectory(filePath: string): boolean {
    return statSync(filePath, { throwIfNoEntry: false })?.isDirectory() ?? false;
  }

  async glob(patterns: string[], options: GlobOptions): Promise<string[]> {
    return fg(patterns, {
      cwd: options.cwd,
      absolute: options.absolute ?? true,
      ignore: options.ignore,
    });
  }
}

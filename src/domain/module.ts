import type { ModuleContext } from "./types.js";
import { ModuleResolutionError } from "./errors.js";
import { unquote } from "./literal.js";

export const DEFAULT_MODULE_FILE = "go.mod";

/** The build module owning the files under scan. Immutable. */
export class Module implements ModuleContext {
  constructor(
    private readonly rootPath: string,
    /** Directory holding the module file; empty for modules built in memory. */
    readonly dir = "",
  ) {}

  path(): string {
    return this.rootPath;
  }
}

function stripComment(line: string): string {
  const idx = line.indexOf("//");
  return (idx >= 0 ? line.slice(0, idx) : line).trim();
}

function modulePathToken(token: string, file: string): string {
  if (token.startsWith('"') || token.startsWith("`")) {
    const value = unquote(token);
    if (value === undefined) {
      throw new ModuleResolutionError(file, `invalid quoted module path ${token}`);
    }
    return value;
  }
  if (/\s/.test(token)) {
    throw new ModuleResolutionError(file, `usage: module module/path`);
  }
  return token;
}

/**
 * Read the module path declared by the `module` directive of a go.mod
 * file. Both `module example.com/m` and the block form are accepted.
 */
export function parseModuleFile(content: string, file: string): string {
  const found: string[] = [];
  let inBlock = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = stripComment(rawLine);
    if (!line) continue;

    if (inBlock) {
      if (line === ")") {
        inBlock = false;
      } else {
        found.push(modulePathToken(line, file));
      }
      continue;
    }

    const match = /^module(?:\s*(\()|\s+(.*))$/.exec(line);
    if (!match) continue;
    if (match[1]) {
      inBlock = true;
    } else if (match[2]) {
      found.push(modulePathToken(match[2].trim(), file));
    }
  }

  if (found.length === 0) {
    throw new ModuleResolutionError(file, "no module declaration");
  }
  if (found.length > 1) {
    throw new ModuleResolutionError(file, "repeated module statement");
  }
  return found[0];
}

import { createRequire } from "node:module";
import type TreeSitter from "tree-sitter";
import type { HeaderParser } from "../ports.js";
import type { ImportSpec } from "../types.js";
import type { SourceFile } from "../file-set.js";

const require = createRequire(import.meta.url);
const Parser = require("tree-sitter") as typeof TreeSitter;

export abstract class BaseParser implements HeaderParser {
  protected parser: InstanceType<typeof Parser>;
  abstract readonly supportedExtensions: string[];
  abstract readonly languageName: string;

  constructor(language: unknown) {
    this.parser = new Parser();
    this.parser.setLanguage(language as TreeSitter.Language);
  }

  abstract parseHeader(source: string, file: SourceFile): ImportSpec[];

  /** Parse source text into a tree-sitter Tree. */
  protected parseSource(source: string): TreeSitter.Tree {
    // the binding's default input buffer is too small for large files
    return this.parser.parse(source, undefined, {
      bufferSize: Math.max(32 * 1024, source.length * 2 + 1),
    });
  }

  /** Get the text of a named field child, or undefined. */
  protected getFieldText(
    node: TreeSitter.SyntaxNode,
    fieldName: string,
  ): string | undefined {
    return node.childForFieldName(fieldName)?.text;
  }

  /**
   * First syntax error at or below `node`: an ERROR node, or a zero-width
   * MISSING node inserted by error recovery.
   */
  protected findError(node: TreeSitter.SyntaxNode): TreeSitter.SyntaxNode | undefined {
    if (!node.hasError) return undefined;
    if (node.type === "ERROR" || node.isMissing) return node;
    for (const child of node.children) {
      const found = this.findError(child);
      if (found) return found;
    }
    return node;
  }
}

import { createRequire } from "node:module";
import type TreeSitter from "tree-sitter";
import { BaseParser } from "./base-parser.js";
import type { BasicLiteral, ImportSpec, LiteralKind } from "../types.js";
import type { SourceFile } from "../file-set.js";
import { ImportParseError } from "../errors.js";
import { unquote } from "../literal.js";

const require = createRequire(import.meta.url);

const LITERAL_KINDS: Record<string, LiteralKind> = {
  interpreted_string_literal: "string",
  raw_string_literal: "string",
  int_literal: "int",
  float_literal: "float",
  imaginary_literal: "imaginary",
  rune_literal: "rune",
};

export class GoParser extends BaseParser {
  readonly supportedExtensions = [".go"];
  readonly languageName = "go";

  constructor(language?: unknown) {
    super(language ?? require("tree-sitter-go"));
  }

  /**
   * Import declarations of a Go file. Only the leading comments, the
   * package clause and the import declarations are inspected; whatever
   * follows the first other declaration is never looked at, so syntax
   * errors in the body do not fail the header.
   */
  parseHeader(source: string, file: SourceFile): ImportSpec[] {
    const root = this.parseSource(source).rootNode;
    const specs: ImportSpec[] = [];
    let sawPackage = false;

    for (const node of root.namedChildren) {
      if (node.type === "comment") continue;

      if (!sawPackage) {
        if (node.type !== "package_clause") {
          throw this.syntaxError(file, node, "expected 'package'");
        }
        this.assertNoError(file, node);
        sawPackage = true;
        continue;
      }

      if (node.type === "ERROR") {
        throw this.syntaxError(file, node, "syntax error in import declarations");
      }
      if (node.type !== "import_declaration") break;

      this.assertNoError(file, node);
      for (const spec of node.descendantsOfType("import_spec")) {
        specs.push(this.toImportSpec(spec, file));
      }
    }

    if (!sawPackage) {
      throw new ImportParseError(file.name, "expected 'package', found EOF", file.position(file.size));
    }
    return specs;
  }

  private toImportSpec(node: TreeSitter.SyntaxNode, file: SourceFile): ImportSpec {
    const pathNode = node.childForFieldName("path");
    if (!pathNode) {
      throw this.syntaxError(file, node, "missing import path");
    }
    const kind = LITERAL_KINDS[pathNode.type] ?? "unknown";
    if (kind === "string" && unquote(pathNode.text) === undefined) {
      throw this.syntaxError(file, pathNode, "invalid import path literal");
    }
    const path: BasicLiteral = {
      kind,
      value: pathNode.text,
    };
    return {
      name: this.getFieldText(node, "name"),
      path,
      position: file.position(pathNode.startIndex),
    };
  }

  private assertNoError(file: SourceFile, node: TreeSitter.SyntaxNode): void {
    const error = this.findError(node);
    if (error) {
      throw this.syntaxError(file, error, `syntax error in ${node.type.replace("_", " ")}`);
    }
  }

  private syntaxError(file: SourceFile, node: TreeSitter.SyntaxNode, detail: string): ImportParseError {
    return new ImportParseError(file.name, detail, file.position(node.startIndex));
  }
}

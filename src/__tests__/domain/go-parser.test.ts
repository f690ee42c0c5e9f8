import { describe, it, expect } from "vitest";
import { GoParser } from "../../domain/parsers/go.js";
import { FileSet } from "../../domain/file-set.js";
import { ImportParseError } from "../../domain/errors.js";

const parser = new GoParser();

function parse(source: string, name = "/src/main.go") {
  const file = new FileSet().addFile(name, source);
  return parser.parseHeader(source, file);
}

describe("GoParser", () => {
  it("extracts single and grouped imports in order", () => {
    const source = `// Package main does things.
package main

import "fmt"

import (
	"os"
	str "strings"
	_ "embed"
	. "math"
	"./util"
)

func main() {}
`;
    const specs = parse(source);
    expect(specs.map((s) => s.path.value)).toEqual([
      '"fmt"',
      '"os"',
      '"strings"',
      '"embed"',
      '"math"',
      '"./util"',
    ]);
    expect(specs.map((s) => s.name)).toEqual([undefined, undefined, "str", "_", ".", undefined]);
    expect(specs.every((s) => s.path.kind === "string")).toBe(true);
  });

  it("records the position of each path literal", () => {
    const source = `// Package main does things.
package main

import "fmt"
`;
    const [spec] = parse(source);
    expect(spec.position.filename).toBe("/src/main.go");
    expect(spec.position.line).toBe(4);
    expect(spec.position.column).toBe(8);
  });

  it("accepts raw string import paths", () => {
    const specs = parse("package main\n\nimport `fmt`\n");
    expect(specs).toHaveLength(1);
    expect(specs[0].path).toEqual({ kind: "string", value: "`fmt`" });
  });

  it("returns nothing for a file without imports", () => {
    expect(parse("package main\n\nfunc main() {}\n")).toEqual([]);
  });

  it("ignores syntax errors after the import block", () => {
    const source = `package main

import "fmt"

var x = 1

func main() {
	fmt.Println("x"
}
`;
    expect(parse(source).map((s) => s.path.value)).toEqual(['"fmt"']);
  });

  it("fails when the package clause is missing", () => {
    expect(() => parse('import "fmt"\n', "a.go")).toThrow(ImportParseError);
    expect(() => parse('import "fmt"\n', "a.go")).toThrow("a.go:1:1: expected 'package'");
  });

  it("fails when the import block is not closed", () => {
    const source = 'package main\n\nimport (\n\t"fmt"\n';
    expect(() => parse(source, "a.go")).toThrow(ImportParseError);
    expect(() => parse(source, "a.go")).toThrow(/^a\.go:\d+:\d+: syntax error in import declaration$/);
  });

  it("fails when the package clause has no name", () => {
    const source = 'package\n\nimport "fmt"\n';
    expect(() => parse(source, "b.go")).toThrow(ImportParseError);
    expect(() => parse(source, "b.go")).toThrow(/^b\.go:\d+:\d+: syntax error in /);
  });

  it("rejects an import path with an invalid escape", () => {
    expect(() => parse('package main\n\nimport "\\q"\n', "c.go")).toThrow(
      "c.go:3:8: invalid import path literal",
    );
  });

  it("fails on an empty file", () => {
    expect(() => parse("", "empty.go")).toThrow("empty.go:1:1: expected 'package', found EOF");
  });

  it("reports the file path on failure", () => {
    try {
      parse("", "empty.go");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ImportParseError);
      expect((err as ImportParseError).filePath).toBe("empty.go");
      expect((err as ImportParseError).position?.line).toBe(1);
    }
  });
});

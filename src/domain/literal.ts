import type { BasicLiteral } from "./types.js";
import { InvariantViolation, invariant } from "./errors.js";

const SIMPLE_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
  "\\": 0x5c,
  '"': 0x22,
};

const HEX_ESCAPE_LENGTH: Record<string, number> = { x: 2, u: 4, U: 8 };

/**
 * Decode the token of a string literal found in import-path position.
 *
 * The grammar only ever puts string literals there, so a token of another
 * kind, or one whose escapes do not unquote, means the parser upstream is
 * broken: both cases throw {@link InvariantViolation}.
 */
export function decodeStringLiteral(lit: BasicLiteral): string {
  invariant(lit.kind === "string", `expected string literal, got ${lit.kind} ${lit.value}`);
  const decoded = unquote(lit.value);
  if (decoded === undefined) {
    throw new InvariantViolation(`malformed string literal ${lit.value}`);
  }
  return decoded;
}

/** Go unquoting rules for `"..."` and `` `...` `` literals; undefined when malformed. */
export function unquote(raw: string): string | undefined {
  if (raw.length < 2) return undefined;
  const quote = raw[0];
  if (raw[raw.length - 1] !== quote) return undefined;
  const body = raw.slice(1, -1);

  if (quote === "`") {
    if (body.includes("`")) return undefined;
    return body.replace(/\r/g, "");
  }
  if (quote !== '"') return undefined;
  if (body.includes("\n")) return undefined;
  if (!body.includes("\\") && !body.includes('"')) return body;

  const chars = Array.from(body);
  const bytes: number[] = [];
  let i = 0;
  while (i < chars.length) {
    const c = chars[i];
    if (c === '"') return undefined;
    if (c !== "\\") {
      bytes.push(...Buffer.from(c, "utf8"));
      i++;
      continue;
    }

    const esc = chars[i + 1];
    if (esc === undefined) return undefined;

    if (esc in SIMPLE_ESCAPES) {
      bytes.push(SIMPLE_ESCAPES[esc]);
      i += 2;
      continue;
    }

    const hexLength = HEX_ESCAPE_LENGTH[esc];
    if (hexLength !== undefined) {
      const digits = chars.slice(i + 2, i + 2 + hexLength).join("");
      if (digits.length !== hexLength || !/^[0-9a-fA-F]+$/.test(digits)) return undefined;
      const value = parseInt(digits, 16);
      if (esc === "x") {
        bytes.push(value);
      } else {
        if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) return undefined;
        bytes.push(...Buffer.from(String.fromCodePoint(value), "utf8"));
      }
      i += 2 + hexLength;
      continue;
    }

    if (esc >= "0" && esc <= "7") {
      const digits = chars.slice(i + 1, i + 4).join("");
      if (!/^[0-7]{3}$/.test(digits)) return undefined;
      const value = parseInt(digits, 8);
      if (value > 0xff) return undefined;
      bytes.push(value);
      i += 4;
      continue;
    }

    // includes \' which is only valid inside rune literals
    return undefined;
  }

  return Buffer.from(bytes).toString("utf8");
}

import type { Position } from "./types.js";

// ── Unrecoverable ───────────────────────────────────────────────

/**
 * A grammar invariant was broken by an upstream component (for example a
 * non-string token in import-path position). Not a user error: never caught
 * by the core and deliberately not an {@link ImportDepsError}.
 */
export class InvariantViolation extends Error {
  override readonly name = "InvariantViolation";
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

// ── Recoverable ─────────────────────────────────────────────────

export abstract class ImportDepsError extends Error {}

export class ImportParseError extends ImportDepsError {
  override readonly name = "ImportParseError";

  constructor(
    readonly filePath: string,
    readonly detail: string,
    readonly position?: Position,
    options?: { cause?: unknown },
  ) {
    super(
      position
        ? `${position.filename}:${position.line}:${position.column}: ${detail}`
        : `${filePath}: ${detail}`,
      options,
    );
  }
}

export class ModuleResolutionError extends ImportDepsError {
  override readonly name = "ModuleResolutionError";

  constructor(readonly path: string, detail: string) {
    super(`${path}: ${detail}`);
  }
}

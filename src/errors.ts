/**
 * Source locations and the errors reported against them.
 */

import { type Value, formatValue } from "./value";

export type SourceLocation = {
  from: number; // Start offset in source
  to: number; // End offset in source
};

export function loc(from: number, to: number): SourceLocation {
  return { from, to };
}

export function locEquals(a: SourceLocation, b: SourceLocation): boolean {
  return a.from === b.from && a.to === b.to;
}

function formatLoc(at: SourceLocation): string {
  return `${at.from}..${at.to}`;
}

// ============================================
// Type check errors
// ============================================

/**
 * A step from a compound value into one of its parts.
 */
export type PathElement =
  | { kind: "index"; index: number }
  | { kind: "key"; key: Value };

export function indexElement(index: number): PathElement {
  return { kind: "index", index };
}

export function keyElement(key: Value): PathElement {
  return { kind: "key", key };
}

/**
 * Render a path outermost step first, e.g. `[1]["name"]`.
 * Paths are stored innermost step first, the order in which they are built.
 */
export function formatPath(path: readonly PathElement[]): string {
  return [...path]
    .reverse()
    .map((elem) =>
      elem.kind === "index" ? `[${elem.index}]` : `[${formatValue(elem.key)}]`
    )
    .join("");
}

export type CompilerNote = {
  message: string;
  loc?: SourceLocation;
};

/**
 * A type error to report to the user.
 *
 * Errors are assembled fluently: the checker creates one at the failing site
 * and callers further up add notes, help and path elements as the error
 * travels outwards.
 */
export class TypeCheckError extends Error {
  loc?: SourceLocation;
  body?: string;
  notes: CompilerNote[];
  help?: string;
  // Innermost element first.
  path: PathElement[];

  constructor(message: string, loc?: SourceLocation) {
    super(message);
    this.name = "TypeCheckError";
    this.loc = loc;
    this.notes = [];
    this.path = [];
  }

  withBody(body: string): this {
    this.body = body;
    return this;
  }

  withNote(loc: SourceLocation, message: string): this {
    this.notes.push({ message, loc });
    return this;
  }

  withHelp(help: string): this {
    this.help = help;
    return this;
  }

  withPathElement(elem: PathElement): this {
    this.path.push(elem);
    return this;
  }

  /**
   * Render the full report as plain text.
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.loc) lines.push(`  at ${formatLoc(this.loc)}`);
    if (this.path.length > 0) lines.push(`  in ${formatPath(this.path)}`);
    if (this.body !== undefined) lines.push("", this.body);
    for (const note of this.notes) {
      const where = note.loc ? ` (at ${formatLoc(note.loc)})` : "";
      lines.push("", `Note${where}: ${note.message}`);
    }
    if (this.help !== undefined) lines.push("", `Help: ${this.help}`);
    return lines.join("\n");
  }
}

/**
 * Outcome of a check that can fail with a user-facing error.
 */
export type CheckResult<T> =
  | { success: true; value: T }
  | { success: false; error: TypeCheckError };

export function succeed<T>(value: T): CheckResult<T> {
  return { success: true, value };
}

export function fail<T>(error: TypeCheckError): CheckResult<T> {
  return { success: false, error };
}

// ============================================
// Internal errors
// ============================================

/**
 * A broken invariant inside the checker. These point at a defect in the
 * caller and are thrown, never returned as a CheckResult.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = "InternalError";
  }
}

export function unreachable(message: string): never {
  throw new InternalError(message);
}

import { describe, it, expect } from "vitest";
import {
  TypeCheckError,
  loc,
  indexElement,
  keyElement,
  formatPath,
  locEquals,
} from "./errors";
import { intVal, stringVal } from "./value";

describe("TypeCheckError", () => {
  it("renders only the parts that were set", () => {
    const error = new TypeCheckError("Type mismatch.", loc(1, 4));
    expect(error.format()).toBe("Error: Type mismatch.\n  at 1..4");
  });

  it("renders the full report", () => {
    const error = new TypeCheckError("Type mismatch.", loc(1, 4))
      .withBody("body")
      .withNote(loc(0, 1), "see here")
      .withHelp("try this")
      .withPathElement(indexElement(2))
      .withPathElement(keyElement(stringVal("a")));

    expect(error.format()).toBe(
      [
        "Error: Type mismatch.",
        "  at 1..4",
        '  in ["a"][2]',
        "",
        "body",
        "",
        "Note (at 0..1): see here",
        "",
        "Help: try this",
      ].join("\n")
    );
  });

  it("is an Error with its own name", () => {
    const error = new TypeCheckError("Type mismatch.");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("TypeCheckError");
    expect(error.message).toBe("Type mismatch.");
  });
});

describe("formatPath", () => {
  it("renders keys as literals, outermost first", () => {
    const path = [keyElement(intVal(7)), indexElement(0), keyElement(stringVal("x"))];
    expect(formatPath(path)).toBe('["x"][0][7]');
  });
});

describe("locEquals", () => {
  it("compares both offsets", () => {
    expect(locEquals(loc(1, 4), loc(1, 4))).toBe(true);
    expect(locEquals(loc(1, 4), loc(1, 5))).toBe(false);
  });
});

/**
 * Runtime checking of values against requirements, for checks the static
 * phase had to defer.
 */

import type { AtomName } from "../types/types";
import { formatType, indent } from "../types/format";
import { type ReqType, type TypeReq, requiredType, reqTypeToType } from "../types/requirement";
import { type Value, formatValue } from "../value";
import {
  type SourceLocation,
  TypeCheckError,
  type CheckResult,
  succeed,
  fail,
  indexElement,
  keyElement,
} from "../errors";

const ATOM_TAGS: Record<AtomName, Value["tag"]> = {
  Null: "null",
  Bool: "bool",
  Int: "int",
  String: "string",
};

function valueMismatch(
  expected: ReqType,
  at: SourceLocation,
  value: Value
): TypeCheckError {
  return new TypeCheckError("Type mismatch.", at).withBody(
    [
      "Expected a value that fits this type:",
      "",
      indent(formatType(reqTypeToType(expected))),
      "",
      "But got this value:",
      "",
      indent(formatValue(value)),
    ].join("\n")
  );
}

function checkElements(
  element: ReqType,
  at: SourceLocation,
  values: readonly Value[]
): TypeCheckError | undefined {
  for (let i = 0; i < values.length; i++) {
    const error = checkShape(element, at, values[i]);
    // Sets have no indices, but the position still locates the element.
    if (error) return error.withPathElement(indexElement(i));
  }
  return undefined;
}

function checkShape(
  shape: ReqType,
  at: SourceLocation,
  value: Value
): TypeCheckError | undefined {
  switch (shape.kind) {
    case "atom":
      return value.tag === ATOM_TAGS[shape.name]
        ? undefined
        : valueMismatch(shape, at, value);

    case "list":
      if (value.tag !== "list") return valueMismatch(shape, at, value);
      return checkElements(shape.element, at, value.elements);

    case "set":
      if (value.tag !== "set") return valueMismatch(shape, at, value);
      return checkElements(shape.element, at, value.elements);

    case "dict":
      if (value.tag !== "dict") return valueMismatch(shape, at, value);
      for (const [k, v] of value.entries) {
        const error = checkShape(shape.key, at, k) ?? checkShape(shape.value, at, v);
        if (error) return error.withPathElement(keyElement(k));
      }
      return undefined;

    case "function":
      // Function values carry no signature to check against, so none fits.
      return valueMismatch(shape, at, value);
  }
}

/**
 * Check that a value fits the requirement.
 *
 * On failure the error's path leads from the value down to the part that
 * does not fit.
 */
export function checkValue(
  req: TypeReq,
  at: SourceLocation,
  value: Value
): CheckResult<Value> {
  const shape = requiredType(req);
  if (shape === undefined) return succeed(value);
  const error = checkShape(shape, at, value);
  return error ? fail(error) : succeed(value);
}

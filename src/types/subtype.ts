/**
 * Static subtype checking of inferred types against requirements.
 *
 * Subtyping is structural. When the inferred type is `Dynamic` somewhere
 * the requirement looks, the check cannot be decided statically and is
 * deferred to runtime instead of failing.
 */

import {
  type Type,
  listType,
  setType,
  dictType,
  functionType,
  typesEqual,
} from "./types";
import {
  type ReqType,
  type TypeReq,
  requiredType,
  reqTypeToType,
  withShape,
} from "./requirement";

/**
 * The result of a static check.
 *
 * Besides success and plain failure, a diff can say that the check has to
 * wait for the value, or that there is a mismatch somewhere inside a
 * compound type. Nested diffs keep the full structure so the error can be
 * shown in place.
 */
export type TypeDiff =
  | { kind: "ok"; type: Type }
  | { kind: "defer"; type: Type }
  | { kind: "error"; expected: TypeReq; actual: Type }
  | { kind: "list"; element: TypeDiff }
  | { kind: "set"; element: TypeDiff }
  | { kind: "dict"; key: TypeDiff; value: TypeDiff }
  | { kind: "function"; args: TypeDiff[]; result: TypeDiff };

type ResolvedDiff = Extract<TypeDiff, { kind: "ok" | "defer" }>;

function ok(type: Type): TypeDiff {
  return { kind: "ok", type };
}

function defer(type: Type): TypeDiff {
  return { kind: "defer", type };
}

function mismatch(expected: TypeReq, actual: Type): TypeDiff {
  return { kind: "error", expected, actual };
}

function isResolved(diff: TypeDiff): diff is ResolvedDiff {
  return diff.kind === "ok" || diff.kind === "defer";
}

/**
 * Decide whether an actual function argument type fits the required one.
 *
 * Arguments are contravariant, so the sound rule is that the required type
 * is a subtype of the actual one. Until that check exists, arguments must
 * match exactly: this rejects some correct programs but accepts no wrong ones.
 */
export type ArgumentRule = (required: ReqType, actual: Type) => boolean;

export const strictArgumentRule: ArgumentRule = (required, actual) =>
  typesEqual(reqTypeToType(required), actual);

/**
 * Check that `actual` is a subtype of the type `req` demands.
 *
 * Rules, in order:
 * - No requirement accepts everything
 * - A `Dynamic` actual type defers to runtime
 * - Atoms must match by name
 * - Lists and sets recurse into the element
 * - Dicts recurse into key and value independently
 * - Functions must have the same arity; arguments go through the
 *   argument rule and the result recurses
 * - Everything else is a mismatch
 */
export function diffType(
  req: TypeReq,
  actual: Type,
  argumentRule: ArgumentRule = strictArgumentRule
): TypeDiff {
  const shape = requiredType(req);
  if (shape === undefined) return ok(actual);
  return diffShape(req, shape, actual, argumentRule);
}

function diffShape(
  req: TypeReq,
  shape: ReqType,
  actual: Type,
  argumentRule: ArgumentRule
): TypeDiff {
  if (actual.kind === "dynamic") return defer(reqTypeToType(shape));

  switch (shape.kind) {
    case "atom":
      return actual.kind === "atom" && actual.name === shape.name
        ? ok(actual)
        : mismatch(req, actual);

    case "list": {
      if (actual.kind !== "list") return mismatch(req, actual);
      const element = diffShape(
        withShape(req, shape.element),
        shape.element,
        actual.element,
        argumentRule
      );
      if (element.kind === "ok") return ok(actual);
      if (element.kind === "defer") return defer(listType(element.type));
      return { kind: "list", element };
    }

    case "set": {
      if (actual.kind !== "set") return mismatch(req, actual);
      const element = diffShape(
        withShape(req, shape.element),
        shape.element,
        actual.element,
        argumentRule
      );
      if (element.kind === "ok") return ok(actual);
      if (element.kind === "defer") return defer(setType(element.type));
      return { kind: "set", element };
    }

    case "dict": {
      if (actual.kind !== "dict") return mismatch(req, actual);
      const key = diffShape(withShape(req, shape.key), shape.key, actual.key, argumentRule);
      const value = diffShape(
        withShape(req, shape.value),
        shape.value,
        actual.value,
        argumentRule
      );
      if (key.kind === "ok" && value.kind === "ok") return ok(actual);
      if (isResolved(key) && isResolved(value)) {
        return defer(dictType(key.type, value.type));
      }
      // Keep both sides, so the error can be shown within the pair.
      return { kind: "dict", key, value };
    }

    case "function": {
      if (actual.kind !== "function") return mismatch(req, actual);
      if (shape.args.length !== actual.args.length) return mismatch(req, actual);

      const actualArgs = actual.args;
      const args = shape.args.map((argShape, i) => {
        const argType = actualArgs[i];
        return argumentRule(argShape, argType)
          ? ok(argType)
          : mismatch(withShape(req, argShape), argType);
      });
      const result = diffShape(
        withShape(req, shape.result),
        shape.result,
        actual.result,
        argumentRule
      );

      const argsOk = args.every((arg) => arg.kind === "ok");
      if (argsOk && result.kind === "ok") return ok(actual);
      if (argsOk && result.kind === "defer") {
        return defer(functionType(actual.args, result.type));
      }
      return { kind: "function", args, result };
    }
  }
}

/**
 * Check whether a type is a subtype of the requirement, treating a deferred
 * outcome as "not known to be".
 */
export function isSubtype(actual: Type, req: TypeReq): boolean {
  return diffType(req, actual).kind === "ok";
}

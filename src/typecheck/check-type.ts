/**
 * Static checking of inferred types against requirements.
 *
 * This is the entry point the typechecker calls wherever it needs a type
 * guarantee. A check either resolves statically, or is deferred: then the
 * caller attaches a runtime check (see `RuntimeCheck`) to verify the value
 * once it exists.
 */

import { type Type, isAtom } from "../types/types";
import { formatType } from "../types/format";
import { type TypeReq, reqTypeToType, typeReqToType } from "../types/requirement";
import { diffType } from "../types/subtype";
import {
  type SourceLocation,
  TypeCheckError,
  type CheckResult,
  succeed,
  fail,
  unreachable,
} from "../errors";
import { type CheckConfig, resolveConfig } from "./config";
import { renderNestedDiff, renderTypeMismatch } from "./diff-render";

/**
 * The result of a static check that did not fail.
 */
export type Typed =
  // The type is known statically, and this is the most specific type we infer.
  | { kind: "type"; type: Type }
  // A runtime check is needed. If it passes, the value has this type.
  | { kind: "defer"; type: Type };

/**
 * Explain why the requirement caused the error.
 */
export function addContext(req: TypeReq, error: TypeCheckError): TypeCheckError {
  switch (req.kind) {
    case "none":
      return unreachable("a check without requirement cannot fail");

    case "annotation":
      return error.withNote(req.at, "The expected type is specified here.");

    case "condition":
      return error.withHelp(
        "There is no implicit conversion, conditions must be boolean."
      );

    case "operator": {
      const expected = reqTypeToType(req.type);
      if (!isAtom(expected)) {
        return unreachable(
          `operator requires non-atomic type ${formatType(expected)}`
        );
      }
      return error.withNote(
        req.at,
        `Expected ${formatType(expected)} due to this operator.`
      );
    }

    case "indexList":
      return error.withHelp("List indices must be integers.");
  }
}

/**
 * Statically check that `actual` satisfies the requirement.
 *
 * `at` is the location of the expression being checked; errors are reported
 * there.
 */
export function checkType(
  req: TypeReq,
  at: SourceLocation,
  actual: Type,
  config: CheckConfig = {}
): CheckResult<Typed> {
  if (req.kind === "none") return succeed({ kind: "type", type: actual });

  const { argumentRule, logger } = resolveConfig(config);
  const diff = diffType(req, actual, argumentRule);

  switch (diff.kind) {
    case "ok":
      return succeed({ kind: "type", type: diff.type });

    case "defer":
      logger.debug(
        `check of ${formatType(actual)} against ${formatType(diff.type)} ` +
          `at ${at.from}..${at.to} deferred to runtime`
      );
      return succeed({ kind: "defer", type: diff.type });

    case "error": {
      const error = new TypeCheckError("Type mismatch.", at).withBody(
        renderTypeMismatch(typeReqToType(diff.expected), diff.actual)
      );
      return fail(addContext(req, error));
    }

    case "list":
    case "set":
    case "dict":
    case "function": {
      const error = new TypeCheckError("Type mismatch in type.", at).withBody(
        renderNestedDiff(diff)
      );
      return fail(addContext(req, error));
    }
  }
}

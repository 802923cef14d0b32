/**
 * Type requirements.
 *
 * A `Type` is what inference found for an expression. A `TypeReq` is what
 * the surrounding code demands of it, together with the reason for the demand
 * ("it was annotated so at this location", "conditions must be booleans").
 * Requirements are satisfied by the required type and its subtypes.
 */

import { type SourceLocation, unreachable } from "../errors";
import {
  type AtomName,
  type Type,
  atomType,
  listType,
  setType,
  dictType,
  functionType,
  Dynamic,
} from "./types";

// ============================================
// Required shapes
// ============================================

/**
 * The shape of a required type. Unlike `Type` there is no `Dynamic`:
 * a requirement always names a concrete type.
 */
export type ReqType = AtomReq | ListReq | SetReq | DictReq | FunctionReq;

export type AtomReq = {
  kind: "atom";
  name: AtomName;
};

export type ListReq = {
  kind: "list";
  element: ReqType;
};

export type SetReq = {
  kind: "set";
  element: ReqType;
};

export type DictReq = {
  kind: "dict";
  key: ReqType;
  value: ReqType;
};

export type FunctionReq = {
  kind: "function";
  args: readonly ReqType[];
  result: ReqType;
};

export function atomReq(name: AtomName): AtomReq {
  return { kind: "atom", name };
}

export function listReq(element: ReqType): ListReq {
  return { kind: "list", element };
}

export function setReq(element: ReqType): SetReq {
  return { kind: "set", element };
}

export function dictReq(key: ReqType, value: ReqType): DictReq {
  return { kind: "dict", key, value };
}

export function functionReq(args: readonly ReqType[], result: ReqType): FunctionReq {
  return { kind: "function", args, result };
}

export const ReqBool: AtomReq = atomReq("Bool");
export const ReqInt: AtomReq = atomReq("Int");
export const ReqNull: AtomReq = atomReq("Null");
export const ReqStr: AtomReq = atomReq("String");

// ============================================
// Requirements
// ============================================

export type TypeReq =
  | { kind: "none" }
  | { kind: "annotation"; at: SourceLocation; type: ReqType }
  | { kind: "condition" }
  | { kind: "operator"; at: SourceLocation; type: ReqType }
  | { kind: "indexList" };

export const noReq: TypeReq = { kind: "none" };
export const conditionReq: TypeReq = { kind: "condition" };
export const indexListReq: TypeReq = { kind: "indexList" };

export function annotationReq(at: SourceLocation, type: ReqType): TypeReq {
  return { kind: "annotation", at, type };
}

export function operatorReq(at: SourceLocation, type: ReqType): TypeReq {
  return { kind: "operator", at, type };
}

/**
 * The shape demanded by a requirement, or undefined if anything goes.
 */
export function requiredType(req: TypeReq): ReqType | undefined {
  switch (req.kind) {
    case "none":
      return undefined;
    case "annotation":
    case "operator":
      return req.type;
    case "condition":
      return ReqBool;
    case "indexList":
      return ReqInt;
  }
}

/**
 * The requirement for a part of the shape `req` demands, keeping the reason.
 * Only annotations and operators can carry compound shapes.
 */
export function withShape(req: TypeReq, type: ReqType): TypeReq {
  switch (req.kind) {
    case "annotation":
      return annotationReq(req.at, type);
    case "operator":
      return operatorReq(req.at, type);
    case "none":
    case "condition":
    case "indexList":
      return unreachable(`requirement '${req.kind}' has no compound shape`);
  }
}

// ============================================
// Projection
// ============================================

/**
 * The most specific type of any value that satisfies the shape.
 */
export function reqTypeToType(req: ReqType): Type {
  switch (req.kind) {
    case "atom":
      return atomType(req.name);
    case "list":
      return listType(reqTypeToType(req.element));
    case "set":
      return setType(reqTypeToType(req.element));
    case "dict":
      return dictType(reqTypeToType(req.key), reqTypeToType(req.value));
    case "function":
      return functionType(req.args.map(reqTypeToType), reqTypeToType(req.result));
  }
}

/**
 * The most specific type of any value that satisfies the requirement.
 * Without a requirement nothing is known, so that is `Dynamic`.
 */
export function typeReqToType(req: TypeReq): Type {
  const shape = requiredType(req);
  return shape ? reqTypeToType(shape) : Dynamic;
}

// ============================================
// Ordering
// ============================================

const ATOM_ORDER: Record<AtomName, number> = {
  Bool: 0,
  Int: 1,
  Null: 2,
  String: 3,
};

function reqRank(req: ReqType): number {
  switch (req.kind) {
    case "atom":
      return ATOM_ORDER[req.name];
    case "list":
      return 4;
    case "set":
      return 5;
    case "dict":
      return 6;
    case "function":
      return 7;
  }
}

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareSequences<T>(
  a: readonly T[],
  b: readonly T[],
  compare: (x: T, y: T) => number
): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compare(a[i], b[i]);
    if (c !== 0) return c;
  }
  return compareNumbers(a.length, b.length);
}

/**
 * Total order over shapes: variant first, then fields in declaration order.
 * Returns a negative number, zero or a positive number like `Array.sort`
 * comparators.
 */
export function compareReqTypes(a: ReqType, b: ReqType): number {
  const byRank = compareNumbers(reqRank(a), reqRank(b));
  if (byRank !== 0) return byRank;

  switch (a.kind) {
    case "atom":
      return 0;
    case "list":
      return b.kind === "list" ? compareReqTypes(a.element, b.element) : 0;
    case "set":
      return b.kind === "set" ? compareReqTypes(a.element, b.element) : 0;
    case "dict":
      if (b.kind !== "dict") return 0;
      return compareReqTypes(a.key, b.key) || compareReqTypes(a.value, b.value);
    case "function":
      if (b.kind !== "function") return 0;
      return (
        compareSequences(a.args, b.args, compareReqTypes) ||
        compareReqTypes(a.result, b.result)
      );
  }
}

export function reqTypesEqual(a: ReqType, b: ReqType): boolean {
  return compareReqTypes(a, b) === 0;
}

const REQ_ORDER: Record<TypeReq["kind"], number> = {
  none: 0,
  annotation: 1,
  condition: 2,
  operator: 3,
  indexList: 4,
};

function compareLocations(a: SourceLocation, b: SourceLocation): number {
  return compareNumbers(a.from, b.from) || compareNumbers(a.to, b.to);
}

/**
 * Total order over requirements, in the same manner as `compareReqTypes`.
 */
export function compareTypeReqs(a: TypeReq, b: TypeReq): number {
  const byKind = compareNumbers(REQ_ORDER[a.kind], REQ_ORDER[b.kind]);
  if (byKind !== 0) return byKind;

  if (
    (a.kind === "annotation" && b.kind === "annotation") ||
    (a.kind === "operator" && b.kind === "operator")
  ) {
    return compareLocations(a.at, b.at) || compareReqTypes(a.type, b.type);
  }
  return 0;
}

export function typeReqsEqual(a: TypeReq, b: TypeReq): boolean {
  return compareTypeReqs(a, b) === 0;
}

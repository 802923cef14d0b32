/**
 * Type requirements and gradual checking for the configuration language.
 */

// Inferred types
export type {
  Type,
  AtomName,
  AtomType,
  ListType,
  SetType,
  DictType,
  FunctionType,
  DynamicType,
} from "./types/types";
export {
  atomType,
  listType,
  setType,
  dictType,
  functionType,
  Null,
  Bool,
  Int,
  Str,
  Dynamic,
  isAtom,
  typesEqual,
} from "./types/types";
export { formatType, indent } from "./types/format";

// Requirements
export type {
  ReqType,
  AtomReq,
  ListReq,
  SetReq,
  DictReq,
  FunctionReq,
  TypeReq,
} from "./types/requirement";
export {
  atomReq,
  listReq,
  setReq,
  dictReq,
  functionReq,
  ReqBool,
  ReqInt,
  ReqNull,
  ReqStr,
  noReq,
  conditionReq,
  indexListReq,
  annotationReq,
  operatorReq,
  requiredType,
  reqTypeToType,
  typeReqToType,
  compareReqTypes,
  reqTypesEqual,
  compareTypeReqs,
  typeReqsEqual,
} from "./types/requirement";

// Static checking
export type { TypeDiff, ArgumentRule } from "./types/subtype";
export { diffType, isSubtype, strictArgumentRule } from "./types/subtype";
export type { Typed } from "./typecheck/check-type";
export { checkType, addContext } from "./typecheck/check-type";
export { renderNestedDiff, renderTypeMismatch } from "./typecheck/diff-render";

// Runtime checking
export { checkValue } from "./typecheck/check-value";
export { RuntimeCheck } from "./typecheck/runtime-check";

// Configuration
export type { CheckConfig, CheckLogger } from "./typecheck/config";
export { consoleLogger, silentLogger } from "./typecheck/config";

// Values
export type {
  Value,
  NullValue,
  BoolValue,
  IntValue,
  StringValue,
  ListValue,
  SetValue,
  DictValue,
  FunctionValue,
} from "./value";
export {
  nullVal,
  boolVal,
  intVal,
  stringVal,
  listVal,
  setVal,
  dictVal,
  functionVal,
  formatValue,
  valueFromRaw,
} from "./value";

// Errors
export type { SourceLocation, PathElement, CompilerNote, CheckResult } from "./errors";
export {
  loc,
  locEquals,
  indexElement,
  keyElement,
  formatPath,
  TypeCheckError,
  InternalError,
} from "./errors";

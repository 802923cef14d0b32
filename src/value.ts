/**
 * Runtime values produced by evaluation.
 */

// ============================================================================
// Value Types
// ============================================================================

export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | StringValue
  | ListValue
  | SetValue
  | DictValue
  | FunctionValue;

export interface NullValue {
  tag: "null";
}

export interface BoolValue {
  tag: "bool";
  value: boolean;
}

export interface IntValue {
  tag: "int";
  value: number;
}

export interface StringValue {
  tag: "string";
  value: string;
}

export interface ListValue {
  tag: "list";
  elements: readonly Value[];
}

/**
 * A set value. Elements are kept in the order the evaluator produced them;
 * that order carries no meaning beyond making diagnostics reproducible.
 */
export interface SetValue {
  tag: "set";
  elements: readonly Value[];
}

export interface DictValue {
  tag: "dict";
  entries: readonly (readonly [Value, Value])[];
}

/**
 * A built-in or user-defined function, referenced by name.
 */
export interface FunctionValue {
  tag: "function";
  name: string;
}

// ============================================================================
// Constructors
// ============================================================================

export const nullVal: NullValue = { tag: "null" };
export const boolVal = (value: boolean): BoolValue => ({ tag: "bool", value });
export const intVal = (value: number): IntValue => ({ tag: "int", value });
export const stringVal = (value: string): StringValue => ({ tag: "string", value });

export const listVal = (elements: readonly Value[]): ListValue => ({
  tag: "list",
  elements,
});

export const setVal = (elements: readonly Value[]): SetValue => ({
  tag: "set",
  elements,
});

export const dictVal = (entries: readonly (readonly [Value, Value])[]): DictValue => ({
  tag: "dict",
  entries,
});

export const functionVal = (name: string): FunctionValue => ({
  tag: "function",
  name,
});

// ============================================================================
// Printing
// ============================================================================

/**
 * Render a value as a literal of the configuration language.
 */
export function formatValue(value: Value): string {
  switch (value.tag) {
    case "null":
      return "null";

    case "bool":
      return String(value.value);

    case "int":
      return String(value.value);

    case "string":
      return JSON.stringify(value.value);

    case "list":
      return `[${value.elements.map(formatValue).join(", ")}]`;

    case "set":
      // `{}` is the empty dict, so the empty set needs its own spelling.
      if (value.elements.length === 0) return "std.empty_set";
      return `{${value.elements.map(formatValue).join(", ")}}`;

    case "dict": {
      const entries = value.entries.map(
        ([k, v]) => `${formatValue(k)}: ${formatValue(v)}`
      );
      return `{${entries.join(", ")}}`;
    }

    case "function":
      return `<function ${value.name}>`;
  }
}

/**
 * Convert a raw JS value (as read from a JSON document) to a Value.
 * Arrays become lists and objects become dicts with string keys.
 */
export function valueFromRaw(raw: unknown): Value {
  if (raw === null) return nullVal;
  if (typeof raw === "boolean") return boolVal(raw);
  if (typeof raw === "string") return stringVal(raw);
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) {
      throw new Error(`Cannot convert to Value: ${raw} is not an integer`);
    }
    if (!Number.isSafeInteger(raw)) {
      throw new Error(`Cannot convert to Value: ${raw} is out of the exact integer range`);
    }
    return intVal(raw);
  }
  if (Array.isArray(raw)) return listVal(raw.map(valueFromRaw));
  if (typeof raw === "object") {
    return dictVal(
      Object.entries(raw).map(([k, v]) => [stringVal(k), valueFromRaw(v)] as const)
    );
  }
  throw new Error(`Cannot convert to Value: ${String(raw)}`);
}

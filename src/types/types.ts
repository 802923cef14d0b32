/**
 * Type representation for inferred types.
 *
 * These are the types the inference pass assigns to expressions. Besides the
 * primitive and compound shapes, an expression can have the `Dynamic` type,
 * meaning its type is only known once the value exists.
 */

export type AtomName = "Null" | "Bool" | "Int" | "String";

/**
 * The Type discriminated union.
 */
export type Type =
  | AtomType
  | ListType
  | SetType
  | DictType
  | FunctionType
  | DynamicType;

export type AtomType = {
  kind: "atom";
  name: AtomName;
};

export type ListType = {
  kind: "list";
  element: Type;
};

export type SetType = {
  kind: "set";
  element: Type;
};

export type DictType = {
  kind: "dict";
  key: Type;
  value: Type;
};

export type FunctionType = {
  kind: "function";
  args: readonly Type[];
  result: Type;
};

export type DynamicType = {
  kind: "dynamic";
};

// ============================================
// Type constructors (convenience functions)
// ============================================

export function atomType(name: AtomName): AtomType {
  return { kind: "atom", name };
}

export function listType(element: Type): ListType {
  return { kind: "list", element };
}

export function setType(element: Type): SetType {
  return { kind: "set", element };
}

export function dictType(key: Type, value: Type): DictType {
  return { kind: "dict", key, value };
}

export function functionType(args: readonly Type[], result: Type): FunctionType {
  return { kind: "function", args, result };
}

// ============================================
// Built-in types
// ============================================

export const Null: AtomType = atomType("Null");
export const Bool: AtomType = atomType("Bool");
export const Int: AtomType = atomType("Int");
export const Str: AtomType = atomType("String");
export const Dynamic: DynamicType = { kind: "dynamic" };

// ============================================
// Type utilities
// ============================================

export function isAtom(t: Type): t is AtomType {
  return t.kind === "atom";
}

/**
 * Check structural equality of two types.
 */
export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case "dynamic":
      return b.kind === "dynamic";
    case "atom":
      return b.kind === "atom" && a.name === b.name;
    case "list":
      return b.kind === "list" && typesEqual(a.element, b.element);
    case "set":
      return b.kind === "set" && typesEqual(a.element, b.element);
    case "dict":
      return (
        b.kind === "dict" &&
        typesEqual(a.key, b.key) &&
        typesEqual(a.value, b.value)
      );
    case "function":
      return (
        b.kind === "function" &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => typesEqual(arg, b.args[i])) &&
        typesEqual(a.result, b.result)
      );
  }
}

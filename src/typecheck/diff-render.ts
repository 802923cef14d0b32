/**
 * Rendering of type mismatches that sit inside a compound type.
 *
 * The actual type is printed with every mismatching part replaced by a
 * numbered hole (`?1`, `?2`, ...), followed by what each hole expected.
 */

import type { Type } from "../types/types";
import { formatType, indent } from "../types/format";
import { typeReqToType } from "../types/requirement";
import type { TypeDiff } from "../types/subtype";

type Hole = {
  expected: Type;
  actual: Type;
};

function renderShape(diff: TypeDiff, holes: Hole[]): string {
  switch (diff.kind) {
    case "ok":
    case "defer":
      return formatType(diff.type);

    case "error":
      holes.push({ expected: typeReqToType(diff.expected), actual: diff.actual });
      return `?${holes.length}`;

    case "list":
      return `List[${renderShape(diff.element, holes)}]`;

    case "set":
      return `Set[${renderShape(diff.element, holes)}]`;

    case "dict":
      return `Dict[${renderShape(diff.key, holes)}, ${renderShape(diff.value, holes)}]`;

    case "function": {
      const args = diff.args.map((arg) => renderShape(arg, holes));
      return `(${args.join(", ")}) -> ${renderShape(diff.result, holes)}`;
    }
  }
}

export function renderNestedDiff(diff: TypeDiff): string {
  const holes: Hole[] = [];
  const shape = renderShape(diff, holes);
  const lines = [
    "The type does not match in the marked places:",
    "",
    indent(shape),
    "",
  ];
  holes.forEach((hole, i) => {
    lines.push(
      `?${i + 1}: expected ${formatType(hole.expected)}, found ${formatType(hole.actual)}.`
    );
  });
  return lines.join("\n");
}

/**
 * Body for a mismatch of a whole type.
 */
export function renderTypeMismatch(expected: Type, actual: Type): string {
  return [
    "Expected this type:",
    "",
    indent(formatType(expected)),
    "",
    "But found this type:",
    "",
    indent(formatType(actual)),
  ].join("\n");
}

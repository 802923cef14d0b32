/**
 * Type formatting for error messages.
 */

import type { Type } from "./types";

/**
 * Format a type as it would be written in a type annotation.
 */
export function formatType(t: Type): string {
  switch (t.kind) {
    case "atom":
      return t.name;

    case "dynamic":
      return "Dynamic";

    case "list":
      return `List[${formatType(t.element)}]`;

    case "set":
      return `Set[${formatType(t.element)}]`;

    case "dict":
      return `Dict[${formatType(t.key)}, ${formatType(t.value)}]`;

    case "function":
      return `(${t.args.map(formatType).join(", ")}) -> ${formatType(t.result)}`;
  }
}

/**
 * Indent every line of a rendered block by two spaces.
 */
export function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => (line.length > 0 ? `  ${line}` : line))
    .join("\n");
}

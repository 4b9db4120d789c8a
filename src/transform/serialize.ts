import type { CommandNode, CommandPart } from "../ast/types.js";
import { CLOSE_MARKER, ESCAPE_CHAR, OPEN_MARKER } from "../parser/types.js";

/**
 * Write a tree back to command-line source. Parsing the result yields a
 * tree equal to the input, as long as no literal is empty and no two
 * literals are adjacent (the parser never builds either).
 */
export function serialize(node: CommandNode): string {
  return node.parts.map(serializePart).join("");
}

function serializePart(part: CommandPart): string {
  switch (part.type) {
    case "Literal":
      return escapeLiteral(part.value);
    case "Interpolation":
      return `${OPEN_MARKER}${serialize(part.body)}${CLOSE_MARKER}`;
  }
}

/**
 * Escape backslashes first so the escapes added for markers stay intact.
 */
export function escapeLiteral(value: string): string {
  return value
    .replaceAll(ESCAPE_CHAR, ESCAPE_CHAR + ESCAPE_CHAR)
    .replaceAll(OPEN_MARKER, ESCAPE_CHAR + OPEN_MARKER)
    .replaceAll(CLOSE_MARKER, ESCAPE_CHAR + CLOSE_MARKER);
}

/**
 * Parser Types and Constants
 *
 * Markers recognised by the parser and the errors it raises.
 */

import type { Position } from "../ast/types.js";

export const OPEN_MARKER = "$(";
export const CLOSE_MARKER = ")";
export const ESCAPE_CHAR = "\\";

/** Plain-data view of a parse failure, e.g. for reporting across a process boundary */
export interface ParseError {
  message: string;
  line: number;
  column: number;
  offset: number;
}

export class ParseException extends Error implements ParseError {
  constructor(
    message: string,
    public line: number,
    public column: number,
    public offset: number,
  ) {
    super(`Parse error at ${line}:${column}: ${message}`);
    this.name = "ParseException";
  }

  /** Copy the failure into a plain object */
  toJSON(): ParseError {
    return {
      message: this.message,
      line: this.line,
      column: this.column,
      offset: this.offset,
    };
  }

  static at(message: string, position: Position): ParseException {
    return new ParseException(
      message,
      position.line,
      position.column,
      position.offset,
    );
  }
}

/** Thrown when $(...) nesting in the source goes deeper than the configured limit */
export class NestingDepthError extends ParseException {
  constructor(
    public readonly limit: number,
    position: Position = { line: 1, column: 1, offset: 0 },
  ) {
    super(
      `Maximum interpolation depth (${limit}) exceeded`,
      position.line,
      position.column,
      position.offset,
    );
    this.name = "NestingDepthError";
  }
}

/**
 * Recursive Descent Parser for interpolated command lines
 *
 * Works directly on characters; the grammar is small enough that a
 * separate lexer pass would only duplicate the marker checks.
 *
 * Grammar:
 *   command       ::= (interpolation | literal)*
 *   interpolation ::= '$(' command ')'
 *   literal       ::= (escape | plain)+
 *   plain         ::= any char that does not start '$(' and is not ')'
 *   escape        ::= '\' ('$(' | ')' | '\' | any char)
 *
 * Interpolations are tried before literals, and escapes before plain
 * characters, at every position.
 */

import {
  AST,
  type CommandNode,
  type CommandPart,
  type InterpolationNode,
  type LiteralNode,
  type Position,
} from "../ast/types.js";
import { type InterpolationLimits, resolveLimits } from "../limits.js";
import {
  CLOSE_MARKER,
  ESCAPE_CHAR,
  NestingDepthError,
  OPEN_MARKER,
  ParseException,
} from "./types.js";

export type { ParseError } from "./types.js";
export { NestingDepthError, ParseException } from "./types.js";

/**
 * Parser class - transforms a command line into an AST
 */
export class Parser {
  private input = "";
  private pos = 0;
  private line = 1;
  private column = 1;
  private readonly limits: Required<InterpolationLimits>;

  constructor(limits?: InterpolationLimits) {
    this.limits = resolveLimits(limits);
  }

  /**
   * Parse a command line. Throws ParseException if the input is malformed;
   * no partial tree is ever returned.
   */
  parse(input: string): CommandNode {
    if (input.length > this.limits.maxInputSize) {
      throw new ParseException(
        `Input too large: ${input.length} characters exceeds limit of ${this.limits.maxInputSize}`,
        1,
        1,
        0,
      );
    }

    this.input = input;
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    const command = this.parseCommand(0);

    // parseCommand only stops early on a close marker
    if (!this.atEnd()) {
      throw ParseException.at(
        "syntax error near unexpected token `)'",
        this.position(),
      );
    }

    return command;
  }

  // ===========================================================================
  // HELPER METHODS
  // ===========================================================================

  private atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private startsWith(marker: string): boolean {
    return this.input.startsWith(marker, this.pos);
  }

  private position(): Position {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  private advance(count: number): void {
    for (let i = 0; i < count && !this.atEnd(); i++) {
      if (this.input[this.pos] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  // ===========================================================================
  // GRAMMAR RULES
  // ===========================================================================

  private parseCommand(depth: number): CommandNode {
    const parts: CommandPart[] = [];

    while (!this.atEnd() && !this.startsWith(CLOSE_MARKER)) {
      if (this.startsWith(OPEN_MARKER)) {
        parts.push(this.parseInterpolation(depth + 1));
      } else {
        parts.push(this.parseLiteral());
      }
    }

    return AST.command(parts);
  }

  private parseInterpolation(depth: number): InterpolationNode {
    const start = this.position();
    if (depth > this.limits.maxNestingDepth) {
      throw new NestingDepthError(this.limits.maxNestingDepth, start);
    }

    this.advance(OPEN_MARKER.length);
    const body = this.parseCommand(depth);

    if (!this.startsWith(CLOSE_MARKER)) {
      throw ParseException.at(
        "unexpected EOF while looking for matching `)'",
        start,
      );
    }
    this.advance(CLOSE_MARKER.length);

    return AST.interpolation(body);
  }

  /**
   * Consume plain characters and escapes up to the next marker.
   * Callers guarantee the current position is neither a marker nor the end,
   * so the literal is never empty.
   */
  private parseLiteral(): LiteralNode {
    let value = "";

    while (
      !this.atEnd() &&
      !this.startsWith(OPEN_MARKER) &&
      !this.startsWith(CLOSE_MARKER)
    ) {
      if (this.input[this.pos] === ESCAPE_CHAR) {
        value += this.parseEscape();
      } else {
        value += this.input[this.pos];
        this.advance(1);
      }
    }

    return AST.literal(value);
  }

  private parseEscape(): string {
    const start = this.position();
    this.advance(ESCAPE_CHAR.length);

    if (this.atEnd()) {
      throw ParseException.at("unexpected EOF after `\\'", start);
    }

    const unit = this.startsWith(OPEN_MARKER)
      ? OPEN_MARKER
      : this.input[this.pos];
    this.advance(unit.length);
    return unit;
  }
}

/**
 * Convenience function to parse a command line
 */
export function parse(input: string, limits?: InterpolationLimits): CommandNode {
  const parser = new Parser(limits);
  return parser.parse(input);
}

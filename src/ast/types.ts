/**
 * Abstract Syntax Tree (AST) Types for interpolated command lines
 *
 * The grammar is recursive: a command is a sequence of literal text and
 * interpolations, and every interpolation wraps another command.
 *
 * Architecture:
 *   Input → Parser → AST → Evaluator(run) → expanded command text
 */

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base interface for all AST nodes */
export interface ASTNode {
  type: string;
}

/** Position information for error reporting */
export interface Position {
  line: number;
  column: number;
  offset: number;
}

// =============================================================================
// NODES
// =============================================================================

/** Root node, and the body of every interpolation */
export interface CommandNode extends ASTNode {
  type: "Command";
  /** Parts in source order; concatenating their values yields the command text */
  parts: readonly CommandPart[];
}

/** Text taken verbatim, with escapes already decoded */
export interface LiteralNode extends ASTNode {
  type: "Literal";
  value: string;
}

/** $(...) - the body is resolved and replaced by the output of running it */
export interface InterpolationNode extends ASTNode {
  type: "Interpolation";
  body: CommandNode;
}

export type CommandPart = LiteralNode | InterpolationNode;

export type Node = CommandNode | CommandPart;

// =============================================================================
// FACTORY
// =============================================================================

export const AST = {
  command(parts: readonly CommandPart[] = []): CommandNode {
    return { type: "Command", parts };
  },

  literal(value: string): LiteralNode {
    return { type: "Literal", value };
  },

  interpolation(body: CommandNode): InterpolationNode {
    return { type: "Interpolation", body };
  },
};

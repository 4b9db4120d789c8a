export type {
  ASTNode,
  CommandNode,
  CommandPart,
  InterpolationNode,
  LiteralNode,
  Node,
  Position,
} from "./ast/types.js";
export { AST } from "./ast/types.js";
export type { CommandName, RegistryOptions } from "./commands/registry.js";
export {
  CommandRegistry,
  createDefaultRegistry,
  getCommandNames,
} from "./commands/registry.js";
export type { ShellCommandOptions } from "./commands/shell/shell.js";
export { createShellCommand } from "./commands/shell/shell.js";
// Custom commands API
export { defineCommand } from "./custom-commands.js";
export {
  EvaluationDepthError,
  getErrorMessage,
  InvocationDepthError,
} from "./interpreter/errors.js";
export type {
  AsyncRunCallback,
  EvaluateOptions,
  RunCallback,
} from "./interpreter/evaluator.js";
export { execute, executeAsync } from "./interpreter/evaluator.js";
export type { InterpolationLimits } from "./limits.js";
export { resolveLimits } from "./limits.js";
export type { ParseError } from "./parser/parser.js";
export {
  NestingDepthError,
  ParseException,
  Parser,
  parse,
} from "./parser/parser.js";
export type {
  CommandDispatcher,
  ShellExecResult,
  ShellLogger,
  ShellOptions,
} from "./Shell.js";
export { Shell } from "./Shell.js";
export { escapeLiteral, serialize } from "./transform/serialize.js";
export type {
  BotCommand,
  CommandContext,
  CommandLookup,
  ReplyFn,
} from "./types.js";

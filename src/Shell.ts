/**
 * Shell - interpolating command front end
 *
 *   Input → Parser → AST → Evaluator(dispatch) → expanded command → dispatch
 *
 * Every $(...) is dispatched as an independent command and replaced by
 * its replies; the expanded outer command is then dispatched the same way
 * and its replies become the result.
 */

import type { CommandNode } from "./ast/types.js";
import { executeAsync } from "./interpreter/evaluator.js";
import { type InterpolationLimits, resolveLimits } from "./limits.js";
import { ParseException, Parser } from "./parser/parser.js";
import type { ReplyFn } from "./types.js";

export type { InterpolationLimits } from "./limits.js";

/**
 * Logger interface for Shell execution logging.
 * Implement this interface to receive execution logs.
 */
export interface ShellLogger {
  /** Log informational messages (exec commands, malformed input) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (each resolved interpolation and its output) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Runs one command and hands each of its replies to `reply`.
 * Must not settle before the command has finished replying.
 */
export type CommandDispatcher = (
  commandText: string,
  reply: ReplyFn,
) => void | Promise<void>;

export interface ShellOptions {
  dispatch: CommandDispatcher;
  limits?: InterpolationLimits;
  /**
   * Joins the replies of one dispatched command.
   * Default: " "
   */
  replySeparator?: string;
  /**
   * Optional logger for execution tracing.
   * When provided, logs exec commands and malformed input (info) and every
   * resolved interpolation with its output (debug).
   */
  logger?: ShellLogger;
}

export interface ShellExecResult {
  /** Joined replies of the expanded outer command, or the malformed-command message */
  output: string;
  /** The outer command with every interpolation replaced; null when parsing failed */
  expanded: string | null;
  malformed: boolean;
}

export class Shell {
  private readonly dispatch: CommandDispatcher;
  private readonly parser: Parser;
  private readonly limits: Required<InterpolationLimits>;
  private readonly replySeparator: string;
  private readonly logger?: ShellLogger;

  constructor(options: ShellOptions) {
    this.dispatch = options.dispatch;
    this.limits = resolveLimits(options.limits);
    this.parser = new Parser(this.limits);
    this.replySeparator = options.replySeparator ?? " ";
    this.logger = options.logger;
  }

  /**
   * Parse, expand and dispatch a command line.
   * Malformed input is reported in the result; dispatcher errors propagate.
   */
  async exec(commandLine: string): Promise<ShellExecResult> {
    this.logger?.info("exec", { command: commandLine });

    let tree: CommandNode;
    try {
      tree = this.parser.parse(commandLine);
    } catch (error) {
      if (!(error instanceof ParseException)) {
        throw error;
      }
      this.logger?.info("malformed", {
        command: commandLine,
        error: error.message,
      });
      return {
        output: `Malformed command ${commandLine}`,
        expanded: null,
        malformed: true,
      };
    }

    const expanded = await this.resolve(tree);
    const output = await this.run(expanded);
    return { output, expanded, malformed: false };
  }

  /**
   * Resolve the interpolations of a command line without dispatching the
   * result. Throws ParseException on malformed input.
   */
  async expand(commandLine: string): Promise<string> {
    return this.resolve(this.parser.parse(commandLine));
  }

  private resolve(tree: CommandNode): Promise<string> {
    return executeAsync(
      tree,
      async (commandText) => {
        const output = await this.run(commandText);
        this.logger?.debug("interpolation", { command: commandText, output });
        return output;
      },
      { maxNestingDepth: this.limits.maxNestingDepth },
    );
  }

  private async run(commandText: string): Promise<string> {
    const replies: string[] = [];
    await this.dispatch(commandText, (message) => {
      replies.push(message);
    });
    return replies.join(this.replySeparator);
  }
}

/**
 * Tree-walking evaluator for interpolated command lines.
 *
 * Interpolations are resolved depth-first, left to right: a nested
 * interpolation's callback runs, and its output is spliced in, before the
 * callback of the interpolation that contains it. The root command itself
 * is never passed to the callback; dispatching the expanded text is up to
 * the caller.
 */

import type { CommandNode, CommandPart } from "../ast/types.js";
import { resolveLimits } from "../limits.js";
import { EvaluationDepthError } from "./errors.js";

/** Runs a fully resolved command text and returns its textual output */
export type RunCallback = (commandText: string) => string;

/** Like RunCallback, but may settle later; each result is awaited before moving on */
export type AsyncRunCallback = (
  commandText: string,
) => string | Promise<string>;

export interface EvaluateOptions {
  /**
   * Deepest interpolation allowed; defaults to the parser's limit.
   * Exceeding it throws EvaluationDepthError.
   */
  maxNestingDepth?: number;
}

interface EvaluationContext<R> {
  run: R;
  maxNestingDepth: number;
}

function createContext<R>(
  run: R,
  options: EvaluateOptions,
): EvaluationContext<R> {
  return {
    run,
    maxNestingDepth:
      options.maxNestingDepth ?? resolveLimits().maxNestingDepth,
  };
}

function checkDepth(depth: number, ctx: EvaluationContext<unknown>): void {
  if (depth > ctx.maxNestingDepth) {
    throw new EvaluationDepthError(ctx.maxNestingDepth);
  }
}

/**
 * Resolve every interpolation in the tree and return the expanded command text.
 * Errors thrown by `run` propagate unchanged and stop evaluation.
 */
export function execute(
  tree: CommandNode,
  run: RunCallback,
  options: EvaluateOptions = {},
): string {
  return executeCommand(tree, createContext(run, options), 0);
}

function executeCommand(
  node: CommandNode,
  ctx: EvaluationContext<RunCallback>,
  depth: number,
): string {
  let result = "";
  for (const part of node.parts) {
    result += evaluatePart(part, ctx, depth);
  }
  return result;
}

function evaluatePart(
  part: CommandPart,
  ctx: EvaluationContext<RunCallback>,
  depth: number,
): string {
  switch (part.type) {
    case "Literal":
      return part.value;
    case "Interpolation": {
      checkDepth(depth + 1, ctx);
      const commandText = executeCommand(part.body, ctx, depth + 1);
      return ctx.run(commandText);
    }
  }
}

/**
 * Async counterpart of execute() for callbacks that dispatch asynchronously.
 * Order and failure behaviour are the same: nothing runs concurrently.
 */
export async function executeAsync(
  tree: CommandNode,
  run: AsyncRunCallback,
  options: EvaluateOptions = {},
): Promise<string> {
  return executeCommandAsync(tree, createContext(run, options), 0);
}

async function executeCommandAsync(
  node: CommandNode,
  ctx: EvaluationContext<AsyncRunCallback>,
  depth: number,
): Promise<string> {
  let result = "";
  for (const part of node.parts) {
    if (part.type === "Literal") {
      result += part.value;
      continue;
    }
    checkDepth(depth + 1, ctx);
    const commandText = await executeCommandAsync(part.body, ctx, depth + 1);
    result += await ctx.run(commandText);
  }
  return result;
}

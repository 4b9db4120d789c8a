/**
 * Evaluation and Dispatch Errors
 *
 * Parse failures live with the parser (ParseException, NestingDepthError).
 * Errors thrown by a run callback are never wrapped; they reach the caller
 * of execute() as thrown.
 */

/**
 * Error thrown when evaluation reaches an interpolation nested deeper than
 * the limit. Trees built by hand can exceed what the parser admits; they
 * carry no source positions, so neither does this error.
 */
export class EvaluationDepthError extends Error {
  readonly name = "EvaluationDepthError";

  constructor(public readonly limit: number) {
    super(`Maximum interpolation depth (${limit}) exceeded during evaluation`);
  }
}

/**
 * Error thrown when a `shell` command is dispatched from inside too many
 * enclosing `shell` commands.
 */
export class InvocationDepthError extends Error {
  readonly name = "InvocationDepthError";

  constructor(public readonly limit: number) {
    super(`Maximum shell invocation depth (${limit}) exceeded`);
  }
}

/**
 * Extract message from an unknown error value.
 * Handles both Error instances and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

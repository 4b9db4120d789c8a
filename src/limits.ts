/**
 * Interpolation Limits Configuration
 *
 * Centralized configuration for the limits that keep parsing and
 * evaluation of deeply nested input bounded.
 * These limits can be overridden when creating a Parser or Shell instance.
 */

/**
 * Configuration for interpolation limits.
 * All limits are optional - undefined values use defaults.
 */
export interface InterpolationLimits {
  /** Maximum $(...) nesting depth accepted by the parser and evaluator (default: 100) */
  maxNestingDepth?: number;

  /** Maximum input length in characters (default: 1000000) */
  maxInputSize?: number;

  /** Maximum depth of `shell` commands dispatched from inside other `shell` commands (default: 8) */
  maxInvocationDepth?: number;
}

/**
 * Default interpolation limits.
 */
const DEFAULT_LIMITS: Required<InterpolationLimits> = {
  maxNestingDepth: 100,
  maxInputSize: 1_000_000,
  maxInvocationDepth: 8,
};

/**
 * Resolve interpolation limits by merging user-provided limits with defaults.
 */
export function resolveLimits(
  userLimits?: InterpolationLimits,
): Required<InterpolationLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS };
  }
  return {
    maxNestingDepth:
      userLimits.maxNestingDepth ?? DEFAULT_LIMITS.maxNestingDepth,
    maxInputSize: userLimits.maxInputSize ?? DEFAULT_LIMITS.maxInputSize,
    maxInvocationDepth:
      userLimits.maxInvocationDepth ?? DEFAULT_LIMITS.maxInvocationDepth,
  };
}

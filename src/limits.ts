/**
 * Engine Limits Configuration
 *
 * Centralized configuration for the limits that bound parsing and matching.
 * These limits can be overridden when creating a PosixRegex instance.
 */

/**
 * Configuration for engine limits.
 * All limits are optional - undefined values use defaults.
 */
export interface RegexLimits {
  /** Maximum pattern length accepted by the parser (default: 100000) */
  maxPatternLength?: number;

  /** Maximum VM steps for a single match call (default: unlimited) */
  maxSteps?: number;
}

/**
 * Default engine limits.
 * The step budget is off by default: the visited-state table already bounds
 * a match call to instructions × (subject length + 1) states.
 */
const DEFAULT_LIMITS: Required<RegexLimits> = {
  maxPatternLength: 100_000,
  maxSteps: Number.POSITIVE_INFINITY,
};

/**
 * Resolve engine limits by merging user-provided limits with defaults.
 */
export function resolveLimits(
  userLimits?: RegexLimits,
): Required<RegexLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS };
  }
  return {
    maxPatternLength:
      userLimits.maxPatternLength ?? DEFAULT_LIMITS.maxPatternLength,
    maxSteps: userLimits.maxSteps ?? DEFAULT_LIMITS.maxSteps,
  };
}

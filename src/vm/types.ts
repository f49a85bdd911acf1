/**
 * VM result and option types
 */

/** Half-open range [start, end) of subject offsets */
export interface Span {
  start: number;
  end: number;
}

export interface MatchResult {
  /** Start of the whole match */
  start: number;
  /** End of the whole match */
  end: number;
  /** One entry per group, group 0 first; null for unset groups */
  spans: (Span | null)[];
}

export interface MatchOptions {
  /**
   * Subject offset where `^` matches. Defaults to the search origin; pass 0
   * to anchor at the start of the subject whatever the origin.
   */
  anchor?: number;

  /**
   * Maximum number of instructions executed by one call.
   * Exceeding it throws MatchLimitError. Unlimited when omitted.
   */
  maxSteps?: number;
}

export class MatchLimitError extends Error {
  constructor(public readonly steps: number) {
    super(`Match step limit exceeded: ${steps} steps`);
    this.name = "MatchLimitError";
  }
}

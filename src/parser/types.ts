/**
 * Parser Types and Constants
 *
 * Shared types used by the lexer and the shift-reduce parser.
 */

import type { RegexNode } from "../ast/types.js";

// =============================================================================
// STACK MARKERS
// =============================================================================

/** `(` waiting for its `)` */
export interface CapturingGroupStart {
  readonly type: "CapturingGroupStart";
  readonly level: number;
  readonly offset: number;
}

/** `[` waiting for its `]` */
export interface CharClassStart {
  readonly type: "CharClassStart";
  readonly level: number;
  readonly offset: number;
}

/** `{` waiting for its `}` */
export interface RepetitionBoundStart {
  readonly type: "RepetitionBoundStart";
  readonly offset: number;
}

/** `|` waiting for its right operand to be reduced */
export interface AlternationMarker {
  readonly type: "AlternationMarker";
  readonly offset: number;
}

export type Marker =
  | CapturingGroupStart
  | CharClassStart
  | RepetitionBoundStart
  | AlternationMarker;

/** Items on the parser stack: finished AST nodes or markers */
export type StackItem = RegexNode | Marker;

const MARKER_TYPES: ReadonlySet<string> = new Set([
  "CapturingGroupStart",
  "CharClassStart",
  "RepetitionBoundStart",
  "AlternationMarker",
]);

export function isMarker(item: StackItem): item is Marker {
  return MARKER_TYPES.has(item.type);
}

// =============================================================================
// ERRORS
// =============================================================================

export interface ParseError {
  /** Zero-based offset into the pattern */
  offset: number;
  description: string;
  pattern: string;
}

/**
 * Syntax error in a pattern. The message carries the offset, the
 * description and the unparsed rest of the pattern:
 *
 *   Unbalanced closing character ')' near index 1
 *   )
 *   ^
 */
export class RegexSyntaxError extends Error implements ParseError {
  constructor(
    public description: string,
    public offset: number,
    public pattern: string,
  ) {
    super(`${description} near index ${offset}\n${pattern.slice(offset)}\n^`);
    this.name = "RegexSyntaxError";
  }
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RegexSyntaxError };

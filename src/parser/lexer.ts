/**
 * Lexer for Extended Regular Expressions
 *
 * Lexing is context-sensitive: the parser passes the current mode with each
 * request, and the mode decides which characters are meta characters.
 * - Normal: . [ ] { } ( ) \ * + ? | ^ $
 * - Bound (inside {m,n}): }
 * - Set (inside [...]): [ ]
 * In every mode a backslash escapes the meta characters of that mode and
 * introduces the built-in classes \d \s \w \D \S \W.
 */

import { RegexSyntaxError } from "./types.js";

export enum TokenType {
  // End of input
  EOI = "EOI",

  // Atoms
  CHAR = "CHAR",
  DOT = "DOT", // .

  // Quantifiers
  STAR = "STAR", // *
  PLUS = "PLUS", // +
  OPT = "OPT", // ?

  // Grouping and alternation
  PIPE = "PIPE", // |
  LPAREN = "LPAREN", // (
  RPAREN = "RPAREN", // )
  LBRACKET = "LBRACKET", // [
  RBRACKET = "RBRACKET", // ]
  LBRACE = "LBRACE", // {
  RBRACE = "RBRACE", // }

  // Anchors
  CARET = "CARET", // ^
  DOLLAR = "DOLLAR", // $

  // Built-in classes
  DIGIT_CLASS = "DIGIT_CLASS", // \d \D
  WORD_CLASS = "WORD_CLASS", // \w \W
  SPACE_CLASS = "SPACE_CLASS", // \s \S
}

export interface Token {
  type: TokenType;
  /** Source text of the character for CHAR tokens, the raw lexeme otherwise */
  value: string;
  /** Original position in input */
  start: number;
  end: number;
  /** For class tokens: the uppercase (complemented) form */
  negated?: boolean;
}

export type LexerMode =
  | { readonly kind: "normal" }
  | { readonly kind: "bound" }
  | {
      readonly kind: "set";
      readonly negated: boolean;
      readonly previous: LexerMode;
    };

export const NORMAL_MODE: LexerMode = { kind: "normal" };
export const BOUND_MODE: LexerMode = { kind: "bound" };

export function setMode(negated: boolean, previous: LexerMode): LexerMode {
  return { kind: "set", negated, previous };
}

const NORMAL_META: ReadonlyMap<string, TokenType> = new Map([
  [".", TokenType.DOT],
  ["*", TokenType.STAR],
  ["+", TokenType.PLUS],
  ["?", TokenType.OPT],
  ["|", TokenType.PIPE],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
  ["[", TokenType.LBRACKET],
  ["]", TokenType.RBRACKET],
  ["{", TokenType.LBRACE],
  ["}", TokenType.RBRACE],
  ["^", TokenType.CARET],
  ["$", TokenType.DOLLAR],
]);

const BOUND_META: ReadonlyMap<string, TokenType> = new Map([
  ["}", TokenType.RBRACE],
]);

const SET_META: ReadonlyMap<string, TokenType> = new Map([
  ["[", TokenType.LBRACKET],
  ["]", TokenType.RBRACKET],
]);

const CLASS_ESCAPES: ReadonlyMap<
  string,
  { type: TokenType; negated: boolean }
> = new Map([
  ["d", { type: TokenType.DIGIT_CLASS, negated: false }],
  ["s", { type: TokenType.SPACE_CLASS, negated: false }],
  ["w", { type: TokenType.WORD_CLASS, negated: false }],
  ["D", { type: TokenType.DIGIT_CLASS, negated: true }],
  ["S", { type: TokenType.SPACE_CLASS, negated: true }],
  ["W", { type: TokenType.WORD_CLASS, negated: true }],
]);

function metaTable(mode: LexerMode): ReadonlyMap<string, TokenType> {
  switch (mode.kind) {
    case "normal":
      return NORMAL_META;
    case "bound":
      return BOUND_META;
    case "set":
      return SET_META;
  }
}

/** Whether `c` may follow a backslash in the given mode */
export function isEscapable(mode: LexerMode, c: string): boolean {
  return c === "\\" || metaTable(mode).has(c);
}

export class Lexer {
  constructor(private readonly input: string) {}

  /**
   * Read the token starting at `offset` under `mode`.
   */
  nextToken(mode: LexerMode, offset: number): Token {
    const input = this.input;
    if (offset >= input.length) {
      return { type: TokenType.EOI, value: "", start: offset, end: offset };
    }

    const c = input[offset];

    if (c === "\\") {
      if (offset + 1 >= input.length) {
        throw new RegexSyntaxError(
          "Unterminated escaped character",
          offset,
          input,
        );
      }
      const escaped = input[offset + 1];
      if (isEscapable(mode, escaped)) {
        return this.char(escaped, offset, offset + 2);
      }
      const builtin = CLASS_ESCAPES.get(escaped);
      if (builtin) {
        return {
          type: builtin.type,
          value: input.slice(offset, offset + 2),
          start: offset,
          end: offset + 2,
          negated: builtin.negated,
        };
      }
      throw new RegexSyntaxError(
        `Unknown escaped character '\\${escaped}'`,
        offset + 1,
        input,
      );
    }

    const metaType = metaTable(mode).get(c);
    if (metaType !== undefined) {
      return { type: metaType, value: c, start: offset, end: offset + 1 };
    }
    return this.char(c, offset, offset + 1);
  }

  /**
   * Read the next character as a CHAR token, ignoring the mode.
   */
  nextRawToken(offset: number): Token {
    if (offset >= this.input.length) {
      return { type: TokenType.EOI, value: "", start: offset, end: offset };
    }
    return this.char(this.input[offset], offset, offset + 1);
  }

  private char(value: string, start: number, end: number): Token {
    return { type: TokenType.CHAR, value, start, end };
  }
}

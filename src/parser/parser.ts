/**
 * Shift-Reduce Parser for Extended Regular Expressions
 *
 * The parser reads one token at a time and either shifts an item onto its
 * stack or reduces the top of the stack when a closing token arrives:
 *
 *   a, ., \d, [..]   shift a leaf node
 *   ( [ {            shift a marker remembering the opening offset
 *   ) ] }            reduce down to the matching marker
 *   * + ?            wrap the node on top of the stack
 *   |                reduce the left operand, then shift a marker
 *
 * When the input is exhausted the whole stack is reduced like an alternative
 * and exactly one node must remain.
 */

import { AST, childNodes, type RegexNode } from "../ast/types.js";
import {
  CharRangeSet,
  DIGIT,
  range,
  SPACE,
  WORD,
} from "../charset/char-range-set.js";
import { resolveLimits } from "../limits.js";
import {
  BOUND_MODE,
  Lexer,
  type LexerMode,
  NORMAL_MODE,
  setMode,
  type Token,
  TokenType,
} from "./lexer.js";
import {
  isMarker,
  type Marker,
  type ParseResult,
  RegexSyntaxError,
  type StackItem,
} from "./types.js";

export type { ParseError, ParseResult } from "./types.js";
export { RegexSyntaxError } from "./types.js";

/** Maximum nesting of groups and bracket expressions */
export const MAX_NESTING_DEPTH = 1000;
/** Largest count accepted in a {m,n} bound */
export const MAX_REPETITION = 1000;
/**
 * Largest tree accepted after bound expansion, counting a node once per
 * copy. Bounds nest multiplicatively (`a{1000}{1000}`), so the counts alone
 * do not bound the size of the compiled program.
 */
export const MAX_EXPANDED_SIZE = 1_000_000;

const EXPANSION_TOO_LARGE =
  "Repetition too large: expanded pattern exceeds limit of " +
  `${MAX_EXPANDED_SIZE} nodes`;

const NEGATED_DIGIT = DIGIT.negate();
const NEGATED_WORD = WORD.negate();
const NEGATED_SPACE = SPACE.negate();

function builtinClass(token: Token): CharRangeSet {
  switch (token.type) {
    case TokenType.DIGIT_CLASS:
      return token.negated ? NEGATED_DIGIT : DIGIT;
    case TokenType.WORD_CLASS:
      return token.negated ? NEGATED_WORD : WORD;
    default:
      return token.negated ? NEGATED_SPACE : SPACE;
  }
}

function isLiteral(item: StackItem | undefined, char?: string): boolean {
  return (
    item !== undefined &&
    item.type === "Literal" &&
    (char === undefined || item.char === char)
  );
}

export interface ParserOptions {
  /** Patterns longer than this are rejected (default: 100000) */
  maxPatternLength?: number;
}

/**
 * Parser class - transforms a pattern into an AST
 */
export class Parser {
  private lexer = new Lexer("");
  private pattern = "";
  private mode: LexerMode = NORMAL_MODE;
  private level = 0;
  private stack: StackItem[] = [];
  private offset = 0;
  // Expanded size per node, shared by every bound of one parse
  private sizes = new Map<RegexNode, number>();
  private readonly maxPatternLength: number;

  constructor(options: ParserOptions = {}) {
    this.maxPatternLength = resolveLimits(options).maxPatternLength;
  }

  /**
   * Parse a pattern string. Throws RegexSyntaxError on malformed input.
   */
  parse(pattern: string): RegexNode {
    if (pattern.length > this.maxPatternLength) {
      throw new RegexSyntaxError(
        `Pattern too large: ${pattern.length} characters exceeds limit of ` +
          `${this.maxPatternLength}`,
        0,
        pattern,
      );
    }

    this.pattern = pattern;
    this.lexer = new Lexer(pattern);
    this.mode = NORMAL_MODE;
    this.level = 0;
    this.stack = [];
    this.offset = 0;
    this.sizes = new Map();

    while (this.offset < pattern.length) {
      this.step();
    }

    this.reduceAlternatives();

    const leftover = this.stack.find(isMarker);
    if (leftover) {
      this.fail("Malformed regular expression", leftover.offset);
    }
    const [root, ...rest] = this.stack;
    if (root === undefined || rest.length > 0 || isMarker(root)) {
      this.fail("Malformed regular expression", 0);
    }
    if (this.expandedSize(root) > MAX_EXPANDED_SIZE) {
      this.fail(EXPANSION_TOO_LARGE, 0);
    }
    return root;
  }

  // ===========================================================================
  // HELPER METHODS
  // ===========================================================================

  private fail(message: string, offset: number): never {
    throw new RegexSyntaxError(message, offset, this.pattern);
  }

  /**
   * Number of nodes in the tree with shared subtrees counted once per use.
   * Sizes are memoized, so each distinct node is visited once per parse.
   */
  private expandedSize(root: RegexNode): number {
    const sizes = this.sizes;
    const pending: RegexNode[] = [root];
    while (pending.length > 0) {
      const node = pending[pending.length - 1];
      if (sizes.has(node)) {
        pending.pop();
        continue;
      }
      const children = childNodes(node);
      const missing = children.filter((child) => !sizes.has(child));
      if (missing.length > 0) {
        pending.push(...missing);
        continue;
      }
      pending.pop();
      let size = 1;
      for (const child of children) {
        size += sizes.get(child) ?? 0;
      }
      sizes.set(node, size);
    }
    return sizes.get(root) ?? 0;
  }

  private top(depth = 0): StackItem | undefined {
    return this.stack[this.stack.length - 1 - depth];
  }

  private push(item: StackItem): void {
    this.stack.push(item);
  }

  private enter(marker: Marker): void {
    if (this.level >= MAX_NESTING_DEPTH) {
      this.fail(
        `Nesting too deep: exceeds limit of ${MAX_NESTING_DEPTH}`,
        marker.offset,
      );
    }
    this.push(marker);
    this.level++;
  }

  /**
   * Consume a `?` directly after a quantifier, if any.
   * Returns true when the quantifier is greedy.
   */
  private readGreediness(): boolean {
    const next = this.lexer.nextRawToken(this.offset);
    if (next.type === TokenType.CHAR && next.value === "?") {
      this.offset = next.end;
      return false;
    }
    return true;
  }

  // ===========================================================================
  // SHIFT
  // ===========================================================================

  /**
   * Read one token and apply its stack transformation.
   */
  private step(): void {
    const token = this.lexer.nextToken(this.mode, this.offset);
    this.offset = token.end;

    switch (token.type) {
      case TokenType.EOI:
        return;

      case TokenType.CHAR:
        this.push(AST.literal(token.value));
        return;

      case TokenType.DOT:
        this.push(AST.anyChar());
        return;

      case TokenType.DIGIT_CLASS:
      case TokenType.WORD_CLASS:
      case TokenType.SPACE_CLASS:
        this.push(AST.charClass(builtinClass(token)));
        return;

      case TokenType.STAR: {
        const greedy = this.readGreediness();
        this.reduceOne("*", token.start, (n) => AST.star(n, greedy));
        return;
      }

      case TokenType.PLUS: {
        const greedy = this.readGreediness();
        this.reduceOne("+", token.start, (n) => AST.plus(n, greedy));
        return;
      }

      case TokenType.OPT: {
        const greedy = this.readGreediness();
        this.reduceOne("?", token.start, (n) => AST.opt(n, greedy));
        return;
      }

      case TokenType.LPAREN:
        this.enter({
          type: "CapturingGroupStart",
          level: this.level,
          offset: token.start,
        });
        return;

      case TokenType.RPAREN:
        this.reduceCapturing(token.start);
        this.level--;
        return;

      case TokenType.PIPE:
        this.reduceAlternatives();
        this.push({ type: "AlternationMarker", offset: token.start });
        return;

      case TokenType.LBRACKET: {
        const next = this.lexer.nextRawToken(this.offset);
        const negated = next.type === TokenType.CHAR && next.value === "^";
        if (negated) {
          this.offset = next.end;
        }
        this.enter({
          type: "CharClassStart",
          level: this.level,
          offset: token.start,
        });
        this.mode = setMode(negated, this.mode);
        return;
      }

      case TokenType.RBRACKET:
        if (this.mode.kind === "set") {
          const { negated, previous } = this.mode;
          this.reduceCharClass(negated, token.start);
          this.mode = previous;
          this.level--;
        } else {
          this.push(AST.literal("]"));
        }
        return;

      case TokenType.CARET:
        this.push(AST.startAnchor());
        return;

      case TokenType.DOLLAR:
        this.push(AST.endAnchor());
        return;

      case TokenType.LBRACE:
        this.push({ type: "RepetitionBoundStart", offset: token.start });
        this.mode = BOUND_MODE;
        return;

      case TokenType.RBRACE:
        if (this.mode.kind === "bound") {
          this.reduceBound(token.start);
          this.mode = NORMAL_MODE;
        } else {
          this.push(AST.literal("}"));
        }
        return;
    }
  }

  // ===========================================================================
  // REDUCE
  // ===========================================================================

  /**
   * Pop the top node and push it back wrapped by a quantifier.
   */
  private reduceOne(
    meta: string,
    offset: number,
    wrap: (node: RegexNode) => RegexNode,
  ): void {
    const top = this.stack.pop();
    if (top === undefined) {
      this.fail(`Dangling control meta character '${meta}'`, offset);
    }
    if (isMarker(top)) {
      this.fail("Malformed regular expression", top.offset);
    }
    this.push(wrap(top));
  }

  /**
   * Pop everything down to the `(` one level below the current one,
   * concatenating nodes and folding alternatives, then push the group.
   */
  private reduceCapturing(closeOffset: number): void {
    const target = this.level - 1;
    let acc: RegexNode | null = null;

    for (;;) {
      const item = this.stack.pop();
      if (item === undefined) {
        this.fail("Unbalanced closing character ')'", closeOffset);
      }
      if (item.type === "CapturingGroupStart" && item.level === target) {
        this.push(AST.capture(acc ?? AST.empty()));
        return;
      }
      if (item.type === "AlternationMarker") {
        acc = AST.alt(this.popLeftOperand(item), acc ?? AST.empty());
        continue;
      }
      if (isMarker(item)) {
        this.fail("Malformed regular expression", item.offset);
      }
      acc = acc ? AST.concat(item, acc) : item;
    }
  }

  /**
   * Pop everything down to the previous `|`, the enclosing `(` (which stays
   * on the stack) or the bottom of the stack, and push the reduced node.
   */
  private reduceAlternatives(): void {
    const target = this.level - 1;
    let acc: RegexNode | null = null;

    for (;;) {
      const item = this.top();
      if (item === undefined) {
        this.push(acc ?? AST.empty());
        return;
      }
      if (item.type === "CapturingGroupStart" && item.level === target) {
        this.push(acc ?? AST.empty());
        return;
      }
      if (item.type === "AlternationMarker") {
        this.stack.pop();
        this.push(AST.alt(this.popLeftOperand(item), acc ?? AST.empty()));
        return;
      }
      if (isMarker(item)) {
        this.fail("Malformed regular expression", item.offset);
      }
      this.stack.pop();
      acc = acc ? AST.concat(item, acc) : item;
    }
  }

  /** The already reduced left operand sitting below an alternation marker */
  private popLeftOperand(marker: Marker): RegexNode {
    const left = this.stack.pop();
    if (left === undefined || isMarker(left)) {
      this.fail("Malformed regular expression", marker.offset);
    }
    return left;
  }

  /**
   * Pop everything down to the matching `[` and push one class node.
   */
  private reduceCharClass(negated: boolean, closeOffset: number): void {
    const target = this.level - 1;
    let set: CharRangeSet = CharRangeSet.empty;

    for (;;) {
      const item = this.top();
      if (item === undefined) {
        this.fail("Malformed regular expression", closeOffset);
      }

      if (item.type === "CharClassStart" && item.level === target) {
        this.stack.pop();
        if (set.isEmpty) {
          return;
        }
        if (set.isSingleton() && !negated) {
          this.push(AST.literal(String.fromCharCode(set.ranges[0].lo)));
          return;
        }
        this.push(AST.charClass(negated ? set.negate() : set));
        return;
      }

      if (isMarker(item)) {
        this.fail("Malformed regular expression", item.offset);
      }

      const below = this.top(1);
      const bottom = this.top(2);

      if (
        isLiteral(below, "-") &&
        bottom !== undefined &&
        bottom.type === "CharClassStart" &&
        bottom.level === target
      ) {
        // `[-a]`
        this.fail("Malformed range", bottom.offset + 1);
      }

      if (
        item.type === "Literal" &&
        isLiteral(below, "-") &&
        bottom !== undefined &&
        bottom.type === "Literal"
      ) {
        this.stack.length -= 3;
        set = set.add(range(bottom.char, item.char));
        continue;
      }

      this.stack.pop();
      if (item.type === "Literal") {
        set = set.add(range(item.char));
      } else if (item.type === "CharClass") {
        set = set.union(item.set);
      } else {
        this.fail("Malformed character set", closeOffset);
      }
    }
  }

  /**
   * Read the `{m,n}` bound back from the stack and expand the node below
   * it into concatenated copies.
   */
  private reduceBound(closeOffset: number): void {
    let inMax = true;
    let sawComma = false;
    let min: number | null = null;
    let max: number | null = null;
    let place = 1;
    let boundOffset = -1;

    for (;;) {
      const item = this.stack.pop();
      if (item === undefined) {
        this.fail("Malformed regular expression", closeOffset);
      }
      if (item.type === "RepetitionBoundStart") {
        boundOffset = item.offset;
        break;
      }
      if (item.type === "Literal" && item.char === "," && inMax) {
        inMax = false;
        sawComma = true;
        place = 1;
        continue;
      }
      if (item.type === "Literal" && item.char >= "0" && item.char <= "9") {
        const digit = (item.char.charCodeAt(0) - 48) * place;
        place *= 10;
        if (inMax) {
          max = (max ?? 0) + digit;
        } else {
          min = (min ?? 0) + digit;
        }
        continue;
      }
      this.fail("Malformed regular expression", closeOffset);
    }

    if (min === null && max === null) {
      this.fail("Malformed regular expression", boundOffset);
    }
    if (!sawComma) {
      min = max;
    }
    const low = min ?? 0;

    if (low > MAX_REPETITION || (max !== null && max > MAX_REPETITION)) {
      this.fail(
        `Repetition count too large: exceeds limit of ${MAX_REPETITION}`,
        boundOffset,
      );
    }
    if (max !== null && max < low) {
      this.fail("Malformed regular expression", closeOffset);
    }

    const below = this.stack.pop();
    if (below !== undefined && isMarker(below)) {
      this.fail("Malformed regular expression", below.offset);
    }
    const node = below ?? AST.empty();
    const count = Math.max(low, max ?? low, 1);
    if (this.expandedSize(node) * count > MAX_EXPANDED_SIZE) {
      this.fail(EXPANSION_TOO_LARGE, boundOffset);
    }
    const copies: RegexNode[] = [];

    if (max === null) {
      if (low === 0) {
        this.push(AST.star(node, true));
        return;
      }
      for (let i = 1; i < low; i++) copies.push(node);
      copies.push(AST.plus(node, true));
    } else {
      for (let i = 0; i < low; i++) copies.push(node);
      for (let i = low; i < max; i++) copies.push(AST.opt(node, false));
    }
    this.push(AST.sequence(copies));
  }
}

/**
 * Parse a pattern string into an AST. Throws RegexSyntaxError.
 */
export function parse(pattern: string, options?: ParserOptions): RegexNode {
  return new Parser(options).parse(pattern);
}

/**
 * Parse a pattern string, returning the error instead of throwing it.
 */
export function tryParse(
  pattern: string,
  options?: ParserOptions,
): ParseResult<RegexNode> {
  try {
    return { ok: true, value: parse(pattern, options) };
  } catch (e) {
    if (e instanceof RegexSyntaxError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/**
 * Abstract Syntax Tree (AST) Types for Extended Regular Expressions
 *
 * Architecture:
 *   Pattern → Lexer → Parser → AST → Compiler → Program → VM → Match
 *
 * Nodes are immutable and form a tree: every child is owned by exactly one
 * parent. Parser-only markers live in parser/types.ts and never reach here.
 */

import type { CharRangeSet } from "../charset/char-range-set.js";

// =============================================================================
// NODES
// =============================================================================

/** Matches the empty string */
export interface EmptyNode {
  readonly type: "Empty";
}

/** `.` */
export interface AnyCharNode {
  readonly type: "AnyChar";
}

export interface LiteralNode {
  readonly type: "Literal";
  /** A single UTF-16 code unit */
  readonly char: string;
}

export interface ConcatNode {
  readonly type: "Concat";
  readonly left: RegexNode;
  readonly right: RegexNode;
}

/** `left|right`; left has priority */
export interface AltNode {
  readonly type: "Alt";
  readonly left: RegexNode;
  readonly right: RegexNode;
}

export interface OptNode {
  readonly type: "Opt";
  readonly inner: RegexNode;
  readonly greedy: boolean;
}

export interface StarNode {
  readonly type: "Star";
  readonly inner: RegexNode;
  readonly greedy: boolean;
}

export interface PlusNode {
  readonly type: "Plus";
  readonly inner: RegexNode;
  readonly greedy: boolean;
}

/** Bracket expression or built-in class */
export interface CharClassNode {
  readonly type: "CharClass";
  readonly set: CharRangeSet;
}

export interface CaptureNode {
  readonly type: "Capture";
  readonly inner: RegexNode;
}

/** `^` */
export interface StartAnchorNode {
  readonly type: "StartAnchor";
}

/** `$` */
export interface EndAnchorNode {
  readonly type: "EndAnchor";
}

export type RegexNode =
  | EmptyNode
  | AnyCharNode
  | LiteralNode
  | ConcatNode
  | AltNode
  | OptNode
  | StarNode
  | PlusNode
  | CharClassNode
  | CaptureNode
  | StartAnchorNode
  | EndAnchorNode;

export type RegexNodeType = RegexNode["type"];

// =============================================================================
// FACTORY
// =============================================================================

const EMPTY: EmptyNode = { type: "Empty" };
const ANY_CHAR: AnyCharNode = { type: "AnyChar" };
const START_ANCHOR: StartAnchorNode = { type: "StartAnchor" };
const END_ANCHOR: EndAnchorNode = { type: "EndAnchor" };

export const AST = {
  empty(): EmptyNode {
    return EMPTY;
  },

  anyChar(): AnyCharNode {
    return ANY_CHAR;
  },

  literal(char: string): LiteralNode {
    return { type: "Literal", char };
  },

  concat(left: RegexNode, right: RegexNode): ConcatNode {
    return { type: "Concat", left, right };
  },

  alt(left: RegexNode, right: RegexNode): AltNode {
    return { type: "Alt", left, right };
  },

  opt(inner: RegexNode, greedy = true): OptNode {
    return { type: "Opt", inner, greedy };
  },

  star(inner: RegexNode, greedy = true): StarNode {
    return { type: "Star", inner, greedy };
  },

  plus(inner: RegexNode, greedy = true): PlusNode {
    return { type: "Plus", inner, greedy };
  },

  charClass(set: CharRangeSet): CharClassNode {
    return { type: "CharClass", set };
  },

  capture(inner: RegexNode): CaptureNode {
    return { type: "Capture", inner };
  },

  startAnchor(): StartAnchorNode {
    return START_ANCHOR;
  },

  endAnchor(): EndAnchorNode {
    return END_ANCHOR;
  },

  /** Concatenate nodes left to right; no nodes gives Empty */
  sequence(nodes: RegexNode[]): RegexNode {
    let result: RegexNode | null = null;
    for (const node of nodes) {
      result = result ? AST.concat(result, node) : node;
    }
    return result ?? EMPTY;
  },
};

// =============================================================================
// UTILITIES
// =============================================================================

/** Direct operands of a node, left to right */
export function childNodes(node: RegexNode): RegexNode[] {
  switch (node.type) {
    case "Concat":
    case "Alt":
      return [node.left, node.right];
    case "Opt":
    case "Star":
    case "Plus":
    case "Capture":
      return [node.inner];
    default:
      return [];
  }
}

/**
 * Number of distinct Capture nodes in the tree. Bound expansion shares one
 * node between its copies, so a shared group counts once.
 */
export function countCaptures(node: RegexNode): number {
  const seen = new Set<CaptureNode>();
  const pending: RegexNode[] = [node];
  let next = pending.pop();
  while (next !== undefined) {
    switch (next.type) {
      case "Capture":
        if (!seen.has(next)) {
          seen.add(next);
          pending.push(next.inner);
        }
        break;
      case "Concat":
      case "Alt":
        pending.push(next.left, next.right);
        break;
      case "Opt":
      case "Star":
      case "Plus":
        pending.push(next.inner);
        break;
    }
    next = pending.pop();
  }
  return seen.size;
}

function suffix(greedy: boolean): string {
  return greedy ? "" : "?";
}

/**
 * Compact prefix rendering of a tree, e.g. `cat(lit(a), star(any))`.
 * Used for debug output and test diagnostics.
 */
export function formatNode(node: RegexNode): string {
  switch (node.type) {
    case "Empty":
      return "empty";
    case "AnyChar":
      return "any";
    case "Literal":
      return `lit(${node.char})`;
    case "Concat":
      return `cat(${formatNode(node.left)}, ${formatNode(node.right)})`;
    case "Alt":
      return `alt(${formatNode(node.left)}, ${formatNode(node.right)})`;
    case "Opt":
      return `opt${suffix(node.greedy)}(${formatNode(node.inner)})`;
    case "Star":
      return `star${suffix(node.greedy)}(${formatNode(node.inner)})`;
    case "Plus":
      return `plus${suffix(node.greedy)}(${formatNode(node.inner)})`;
    case "CharClass":
      return `class${node.set.toString()}`;
    case "Capture":
      return `group(${formatNode(node.inner)})`;
    case "StartAnchor":
      return "start";
    case "EndAnchor":
      return "end";
  }
}

/**
 * Character range sets
 *
 * An immutable, ordered collection of closed code-unit intervals used for
 * bracket expressions and the built-in classes (\d, \w, \s).
 *
 * Invariant: ranges are sorted ascending by `lo`, pairwise disjoint and never
 * adjacent. Every operation returns a new set.
 */

/** Smallest code unit in the character domain */
export const MIN_CHAR = 0x0000;
/** Largest code unit in the character domain */
export const MAX_CHAR = 0xffff;

/** A closed interval [lo, hi] of code units */
export interface CharRange {
  readonly lo: number;
  readonly hi: number;
}

/**
 * Balanced binary search tree over disjoint ranges, used by the VM for
 * membership tests at match time.
 */
export interface RangeTree {
  readonly range: CharRange;
  readonly left: RangeTree | null;
  readonly right: RangeTree | null;
}

function codeOf(c: string | number): number {
  return typeof c === "number" ? c : c.charCodeAt(0);
}

/**
 * Build a range from characters or code units. With a single argument the
 * range holds exactly that character.
 */
export function range(
  lo: string | number,
  hi: string | number = lo,
): CharRange {
  const a = codeOf(lo);
  const b = codeOf(hi);
  return a <= b ? { lo: a, hi: b } : { lo: b, hi: a };
}

/** Membership test against a tree produced by toSearchStructure() */
export function treeContains(tree: RangeTree | null, code: number): boolean {
  let node = tree;
  while (node) {
    if (code < node.range.lo) {
      node = node.left;
    } else if (code > node.range.hi) {
      node = node.right;
    } else {
      return true;
    }
  }
  return false;
}

function buildTree(
  ranges: readonly CharRange[],
  from: number,
  to: number,
): RangeTree | null {
  if (from > to) return null;
  const mid = (from + to) >>> 1;
  return {
    range: ranges[mid],
    left: buildTree(ranges, from, mid - 1),
    right: buildTree(ranges, mid + 1, to),
  };
}

function formatCode(code: number): string {
  if (code >= 0x21 && code <= 0x7e) {
    return String.fromCharCode(code);
  }
  return `\\u${code.toString(16).padStart(4, "0")}`;
}

export class CharRangeSet {
  private readonly _ranges: readonly CharRange[];

  private constructor(ranges: readonly CharRange[]) {
    this._ranges = ranges;
  }

  static readonly empty: CharRangeSet = new CharRangeSet([]);

  static readonly full: CharRangeSet = new CharRangeSet([
    { lo: MIN_CHAR, hi: MAX_CHAR },
  ]);

  /** Build a set from any ranges, in any order, possibly overlapping */
  static of(...ranges: CharRange[]): CharRangeSet {
    let set = CharRangeSet.empty;
    for (const r of ranges) {
      set = set.add(r);
    }
    return set;
  }

  /** Copy of the canonical sorted ranges */
  get ranges(): CharRange[] {
    return this._ranges.map((r) => ({ lo: r.lo, hi: r.hi }));
  }

  /** Number of disjoint ranges */
  get size(): number {
    return this._ranges.length;
  }

  get isEmpty(): boolean {
    return this._ranges.length === 0;
  }

  /** True when the set holds exactly one character */
  isSingleton(): boolean {
    return (
      this._ranges.length === 1 && this._ranges[0].lo === this._ranges[0].hi
    );
  }

  /**
   * Insert a range, merging it with every overlapping or adjacent range.
   */
  add(r: CharRange): CharRangeSet {
    const result: CharRange[] = [];
    let lo = Math.min(r.lo, r.hi);
    let hi = Math.max(r.lo, r.hi);
    let inserted = false;

    for (const current of this._ranges) {
      if (current.hi + 1 < lo) {
        // strictly before, with a gap
        result.push(current);
      } else if (hi + 1 < current.lo) {
        // strictly after, with a gap
        if (!inserted) {
          result.push({ lo, hi });
          inserted = true;
        }
        result.push(current);
      } else {
        lo = Math.min(lo, current.lo);
        hi = Math.max(hi, current.hi);
      }
    }
    if (!inserted) {
      result.push({ lo, hi });
    }
    return new CharRangeSet(result);
  }

  union(other: CharRangeSet): CharRangeSet {
    let set: CharRangeSet = this;
    for (const r of other._ranges) {
      set = set.add(r);
    }
    return set;
  }

  /**
   * Complement against [MIN_CHAR, MAX_CHAR]: the gaps between ranges plus the
   * two boundary gaps.
   */
  negate(): CharRangeSet {
    const result: CharRange[] = [];
    let next = MIN_CHAR;
    for (const r of this._ranges) {
      if (r.lo > next) {
        result.push({ lo: next, hi: r.lo - 1 });
      }
      next = r.hi + 1;
    }
    if (next <= MAX_CHAR) {
      result.push({ lo: next, hi: MAX_CHAR });
    }
    return new CharRangeSet(result);
  }

  contains(c: string | number): boolean {
    const code = codeOf(c);
    let low = 0;
    let high = this._ranges.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const r = this._ranges[mid];
      if (code < r.lo) {
        high = mid - 1;
      } else if (code > r.hi) {
        low = mid + 1;
      } else {
        return true;
      }
    }
    return false;
  }

  toSearchStructure(): RangeTree | null {
    return buildTree(this._ranges, 0, this._ranges.length - 1);
  }

  toString(): string {
    const parts = this._ranges.map((r) =>
      r.lo === r.hi
        ? formatCode(r.lo)
        : `${formatCode(r.lo)}-${formatCode(r.hi)}`,
    );
    return `[${parts.join("")}]`;
  }
}

// Built-in classes
export const DIGIT: CharRangeSet = CharRangeSet.of(range("0", "9"));
export const WORD: CharRangeSet = CharRangeSet.of(
  range("A", "Z"),
  range("a", "z"),
  range("0", "9"),
  range("_"),
);
export const SPACE: CharRangeSet = CharRangeSet.of(
  range(" "),
  range("\t"),
  range("\r"),
  range("\n"),
  range("\f"),
);

/**
 * Backtracking virtual machine
 *
 * Runs a compiled program depth-first. Each pending alternative is a job
 * (pc, position, slots) on an explicit stack; `split` pushes its secondary
 * target and follows the primary one, so alternatives are tried in priority
 * order. Slot arrays are copied before `save` writes to them, so a job never
 * sees writes made on a sibling path.
 *
 * A (pc, position) pair is explored at most once per call. Captures do not
 * influence whether a state can reach `match`, so a state seen before has
 * either already failed or is being explored through an empty loop; both
 * cases are safe to prune. This bounds a call to
 * instructions × (subject length + 1) states.
 */

import { treeContains } from "../charset/char-range-set.js";
import type { Program } from "../compiler/instructions.js";
import {
  MatchLimitError,
  type MatchOptions,
  type MatchResult,
  type Span,
} from "./types.js";

export type { MatchOptions, MatchResult, Span } from "./types.js";
export { MatchLimitError } from "./types.js";

interface Job {
  pc: number;
  pos: number;
  slots: number[];
}

/** Bit set over (pc, position) pairs */
class VisitedStates {
  private readonly bits: Uint32Array;
  private readonly width: number;

  constructor(programLength: number, subjectLength: number) {
    this.width = subjectLength + 1;
    this.bits = new Uint32Array(Math.ceil((programLength * this.width) / 32));
  }

  /** Mark the state; returns false if it was already marked */
  visit(pc: number, pos: number): boolean {
    const key = pc * this.width + pos;
    const word = Math.floor(key / 32);
    const mask = 1 << (key % 32);
    if (this.bits[word] & mask) {
      return false;
    }
    this.bits[word] |= mask;
    return true;
  }
}

class Machine {
  private steps = 0;
  private readonly maxSteps: number;
  private readonly visited: VisitedStates;

  /** `anchor` is the only position where `start` succeeds */
  constructor(
    private readonly program: Program,
    private readonly subject: string,
    private readonly anchor: number,
    options: MatchOptions,
  ) {
    this.maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;
    this.visited = new VisitedStates(
      program.instructions.length,
      subject.length,
    );
  }

  /**
   * Try to match with the whole-match group starting at `start`.
   * Returns the slots of the highest-priority match, or null.
   */
  run(start: number): number[] | null {
    const { instructions } = this.program;
    const subject = this.subject;
    const end = subject.length;
    const jobs: Job[] = [
      {
        pc: 0,
        pos: start,
        slots: new Array<number>(this.program.groupCount * 2).fill(-1),
      },
    ];

    let job = jobs.pop();
    while (job !== undefined) {
      let { pc, pos, slots } = job;

      thread: while (this.visited.visit(pc, pos)) {
        if (++this.steps > this.maxSteps) {
          throw new MatchLimitError(this.maxSteps);
        }

        const inst = instructions[pc];
        switch (inst.op) {
          case "MatchLiteral":
            if (pos >= end || subject[pos] !== inst.char) break thread;
            pc++;
            pos++;
            break;

          case "MatchAny":
            if (pos >= end) break thread;
            pc++;
            pos++;
            break;

          case "MatchClass":
            if (
              pos >= end ||
              !treeContains(inst.tree, subject.charCodeAt(pos))
            ) {
              break thread;
            }
            pc++;
            pos++;
            break;

          case "Split":
            jobs.push({ pc: inst.secondary, pos, slots });
            pc = inst.primary;
            break;

          case "Jump":
            pc = inst.target;
            break;

          case "SaveSlot":
            slots = slots.slice();
            slots[inst.slot] = pos;
            pc++;
            break;

          case "CheckStart":
            if (pos !== this.anchor) break thread;
            pc++;
            break;

          case "CheckEnd":
            if (pos !== end) break thread;
            pc++;
            break;

          case "Accept":
            return slots;
        }
      }

      job = jobs.pop();
    }
    return null;
  }
}

function toResult(slots: number[], groupCount: number): MatchResult {
  const spans: (Span | null)[] = [];
  for (let group = 0; group < groupCount; group++) {
    const start = slots[group * 2];
    const end = slots[group * 2 + 1];
    spans.push(start >= 0 && end >= 0 ? { start, end } : null);
  }
  return { start: slots[0], end: slots[1], spans };
}

/**
 * Find the leftmost, highest-priority match at or after `origin`.
 *
 * `^` matches only at `options.anchor`, which defaults to the origin, and
 * `$` only at the end of the subject.
 */
export function match(
  program: Program,
  subject: string,
  origin = 0,
  options: MatchOptions = {},
): MatchResult | null {
  if (origin < 0 || origin > subject.length) {
    return null;
  }
  const anchor = options.anchor ?? origin;
  const machine = new Machine(program, subject, anchor, options);
  for (let start = origin; start <= subject.length; start++) {
    const slots = machine.run(start);
    if (slots) {
      return toResult(slots, program.groupCount);
    }
  }
  return null;
}

/**
 * Match only at exactly `position` (no scanning forward). `^` matches at
 * `options.anchor`, which defaults to `position`.
 */
export function matchAt(
  program: Program,
  subject: string,
  position: number,
  options: MatchOptions = {},
): MatchResult | null {
  if (position < 0 || position > subject.length) {
    return null;
  }
  const anchor = options.anchor ?? position;
  const slots = new Machine(program, subject, anchor, options).run(position);
  return slots ? toResult(slots, program.groupCount) : null;
}

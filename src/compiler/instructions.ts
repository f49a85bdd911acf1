/**
 * Bytecode instructions
 *
 * A program is a zero-indexed list of instructions; addresses are indices.
 * Every Split/Jump target lies inside the program and Accept is the last
 * instruction.
 */

import type { RangeTree } from "../charset/char-range-set.js";

export type Instruction =
  | { readonly op: "MatchLiteral"; readonly char: string }
  | { readonly op: "MatchAny" }
  | { readonly op: "MatchClass"; readonly tree: RangeTree | null }
  /** Try `primary` first, `secondary` on backtrack */
  | {
      readonly op: "Split";
      readonly primary: number;
      readonly secondary: number;
    }
  | { readonly op: "Jump"; readonly target: number }
  | { readonly op: "SaveSlot"; readonly slot: number }
  | { readonly op: "CheckStart" }
  | { readonly op: "CheckEnd" }
  | { readonly op: "Accept" };

export type OpCode = Instruction["op"];

export interface Program {
  readonly instructions: readonly Instruction[];
  /** Capture groups including the implicit whole-match group 0 */
  readonly groupCount: number;
}

function formatTree(tree: RangeTree | null, out: string[]): void {
  if (!tree) return;
  formatTree(tree.left, out);
  const { lo, hi } = tree.range;
  out.push(lo === hi ? `${lo}` : `${lo}-${hi}`);
  formatTree(tree.right, out);
}

export function formatInstruction(inst: Instruction): string {
  switch (inst.op) {
    case "MatchLiteral":
      return `char ${JSON.stringify(inst.char)}`;
    case "MatchAny":
      return "any";
    case "MatchClass": {
      const parts: string[] = [];
      formatTree(inst.tree, parts);
      return `class [${parts.join(" ")}]`;
    }
    case "Split":
      return `split ${inst.primary}, ${inst.secondary}`;
    case "Jump":
      return `jmp ${inst.target}`;
    case "SaveSlot":
      return `save ${inst.slot}`;
    case "CheckStart":
      return "start";
    case "CheckEnd":
      return "end";
    case "Accept":
      return "match";
  }
}

/**
 * One line per instruction, e.g. `2: split 3, 5`.
 */
export function disassemble(program: Program): string[] {
  return program.instructions.map(
    (inst, idx) => `${idx}: ${formatInstruction(inst)}`,
  );
}

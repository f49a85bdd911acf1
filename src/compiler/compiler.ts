/**
 * Compiler - lowers an AST into a bytecode program
 *
 * Lowering rules (L = address):
 *
 *   e1e2      code(e1) code(e2)
 *   e1|e2     split L1, L2; L1: code(e1); jmp L3; L2: code(e2); L3:
 *   e?        split L1, L2; L1: code(e); L2:          (e?? swaps the split)
 *   e*        L0: split L1, L2; L1: code(e); jmp L0; L2:   (e*? swaps)
 *   e+        L0: code(e); split L0, L1; L1:                (e+? swaps)
 *   (e)       save 2k; code(e); save 2k+1
 *   ^ $       start / end
 *
 * Bound expansion repeats the same node object, so a group inside a bound
 * is lowered several times. Slots belong to the Capture node, not to each
 * lowering: every copy writes the same pair and the last iteration wins.
 *
 * The root is wrapped in an implicit group (slots 0 and 1) and followed by
 * a single `match`.
 */

import { AST, type CaptureNode, type RegexNode } from "../ast/types.js";
import type { Instruction, Program } from "./instructions.js";

export type { Instruction, OpCode, Program } from "./instructions.js";
export { disassemble, formatInstruction } from "./instructions.js";

/**
 * Raised when the compiler meets a node it cannot lower. The parser never
 * produces such trees, so this signals a broken invariant.
 */
export class RegexCompileError extends Error {
  constructor(message: string) {
    super(`Regex compile error: ${message}`);
    this.name = "RegexCompileError";
  }
}

/**
 * Work item for lowering: a node still to lower, or the code that completes
 * a construct once its operands have been lowered.
 */
type Task = RegexNode | (() => void);

class Compiler {
  private readonly insts: Instruction[] = [];
  private nextSlot = 0;
  private readonly captureSlots = new Map<CaptureNode, number>();

  compile(root: RegexNode): Program {
    this.lower(AST.capture(root));
    this.emit({ op: "Accept" });
    return { instructions: this.insts, groupCount: this.nextSlot / 2 };
  }

  private emit(inst: Instruction): number {
    this.insts.push(inst);
    return this.insts.length - 1;
  }

  private get here(): number {
    return this.insts.length;
  }

  private patch(addr: number, inst: Instruction): void {
    this.insts[addr] = inst;
  }

  private placeholder(): number {
    return this.emit({ op: "Jump", target: -1 });
  }

  private split(addr: number, primary: number, secondary: number): void {
    this.patch(addr, { op: "Split", primary, secondary });
  }

  /**
   * Lower a tree with an explicit work stack instead of recursion.
   */
  private lower(root: RegexNode): void {
    const tasks: Task[] = [root];
    let task = tasks.pop();
    while (task !== undefined) {
      if (typeof task === "function") {
        task();
      } else {
        this.open(task, tasks);
      }
      task = tasks.pop();
    }
  }

  /**
   * Emit the code that precedes the operands of `node` and schedule the
   * operands and the closing code. Tasks run in reverse push order.
   */
  private open(node: RegexNode, tasks: Task[]): void {
    switch (node.type) {
      case "Empty":
        return;

      case "Literal":
        this.emit({ op: "MatchLiteral", char: node.char });
        return;

      case "AnyChar":
        this.emit({ op: "MatchAny" });
        return;

      case "CharClass":
        this.emit({ op: "MatchClass", tree: node.set.toSearchStructure() });
        return;

      case "Concat":
        tasks.push(node.right, node.left);
        return;

      case "Alt": {
        const fork = this.placeholder();
        let jump = -1;
        tasks.push(
          () => {
            this.split(fork, fork + 1, jump + 1);
            this.patch(jump, { op: "Jump", target: this.here });
          },
          node.right,
          () => {
            jump = this.placeholder();
          },
          node.left,
        );
        return;
      }

      case "Opt": {
        const fork = this.placeholder();
        const { greedy } = node;
        tasks.push(() => {
          if (greedy) {
            this.split(fork, fork + 1, this.here);
          } else {
            this.split(fork, this.here, fork + 1);
          }
        }, node.inner);
        return;
      }

      case "Star": {
        const fork = this.placeholder();
        const { greedy } = node;
        tasks.push(() => {
          this.emit({ op: "Jump", target: fork });
          if (greedy) {
            this.split(fork, fork + 1, this.here);
          } else {
            this.split(fork, this.here, fork + 1);
          }
        }, node.inner);
        return;
      }

      case "Plus": {
        const body = this.here;
        const { greedy } = node;
        tasks.push(() => {
          const exit = this.here + 1;
          if (greedy) {
            this.emit({ op: "Split", primary: body, secondary: exit });
          } else {
            this.emit({ op: "Split", primary: exit, secondary: body });
          }
        }, node.inner);
        return;
      }

      case "Capture": {
        let slot = this.captureSlots.get(node);
        if (slot === undefined) {
          slot = this.nextSlot;
          this.nextSlot += 2;
          this.captureSlots.set(node, slot);
        }
        const end = slot + 1;
        this.emit({ op: "SaveSlot", slot });
        tasks.push(() => {
          this.emit({ op: "SaveSlot", slot: end });
        }, node.inner);
        return;
      }

      case "StartAnchor":
        this.emit({ op: "CheckStart" });
        return;

      case "EndAnchor":
        this.emit({ op: "CheckEnd" });
        return;

      default: {
        const unknown: never = node;
        throw new RegexCompileError(
          `unknown node ${JSON.stringify(unknown)}`,
        );
      }
    }
  }
}

/**
 * Compile an AST into a program. The AST must come from the parser.
 */
export function compile(ast: RegexNode): Program {
  return new Compiler().compile(ast);
}

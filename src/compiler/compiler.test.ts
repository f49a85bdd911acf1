import { describe, expect, it } from "vitest";
import { AST, type RegexNode } from "../ast/types.js";
import { parse } from "../parser/parser.js";
import { compile, disassemble, RegexCompileError } from "./compiler.js";

function listing(pattern: string): string[] {
  return disassemble(compile(parse(pattern)));
}

describe("compile", () => {
  it("wraps the pattern in group 0 and appends match", () => {
    expect(listing("a")).toEqual([
      "0: save 0",
      '1: char "a"',
      "2: save 1",
      "3: match",
    ]);
  });

  it("compiles the empty pattern to no instructions between the saves", () => {
    expect(listing("")).toEqual(["0: save 0", "1: save 1", "2: match"]);
  });

  it("emits nothing for empty nodes inside a concatenation", () => {
    expect(listing("a{0}b")).toEqual([
      "0: save 0",
      '1: char "b"',
      "2: save 1",
      "3: match",
    ]);
  });

  it("compiles alternation with the left branch first", () => {
    expect(listing("a|b")).toEqual([
      "0: save 0",
      "1: split 2, 4",
      '2: char "a"',
      "3: jmp 5",
      '4: char "b"',
      "5: save 1",
      "6: match",
    ]);
  });

  describe("optional", () => {
    it("prefers the body when greedy", () => {
      expect(listing("a?").slice(1, 3)).toEqual([
        "1: split 2, 3",
        '2: char "a"',
      ]);
    });

    it("prefers skipping when non-greedy", () => {
      expect(listing("a??").slice(1, 3)).toEqual([
        "1: split 3, 2",
        '2: char "a"',
      ]);
    });
  });

  describe("star", () => {
    it("prefers entering the loop when greedy", () => {
      expect(listing("a*")).toEqual([
        "0: save 0",
        "1: split 2, 4",
        '2: char "a"',
        "3: jmp 1",
        "4: save 1",
        "5: match",
      ]);
    });

    it("prefers leaving the loop when non-greedy", () => {
      expect(listing("a*?")[1]).toBe("1: split 4, 2");
    });
  });

  describe("plus", () => {
    it("prefers repeating when greedy", () => {
      expect(listing("a+")).toEqual([
        "0: save 0",
        '1: char "a"',
        "2: split 1, 3",
        "3: save 1",
        "4: match",
      ]);
    });

    it("prefers leaving when non-greedy", () => {
      expect(listing("a+?")[2]).toBe("2: split 3, 1");
    });
  });

  it("allocates slot pairs in order of the opening parenthesis", () => {
    const program = compile(parse("(a)(b)"));
    expect(program.groupCount).toBe(3);
    expect(disassemble(program)).toEqual([
      "0: save 0",
      "1: save 2",
      '2: char "a"',
      "3: save 3",
      "4: save 4",
      '5: char "b"',
      "6: save 5",
      "7: save 1",
      "8: match",
    ]);
  });

  it("numbers nested groups outer first", () => {
    expect(listing("((a))").slice(0, 3)).toEqual([
      "0: save 0",
      "1: save 2",
      "2: save 4",
    ]);
  });

  it("reuses the slots of a group repeated by a bound", () => {
    const program = compile(parse("(a){2}"));
    expect(program.groupCount).toBe(2);
    expect(disassemble(program)).toEqual([
      "0: save 0",
      "1: save 2",
      '2: char "a"',
      "3: save 3",
      "4: save 2",
      '5: char "a"',
      "6: save 3",
      "7: save 1",
      "8: match",
    ]);
  });

  it("compiles anchors to zero-width checks", () => {
    expect(listing("^a$")).toEqual([
      "0: save 0",
      "1: start",
      '2: char "a"',
      "3: end",
      "4: save 1",
      "5: match",
    ]);
  });

  it("compiles classes to a search tree", () => {
    expect(listing("[a-cx]")[1]).toBe("1: class [97-99 120]");
    expect(listing(".")[1]).toBe("1: any");
  });

  it("compiles very long concatenations", () => {
    const program = compile(parse("ab".repeat(20_000)));
    expect(program.instructions).toHaveLength(40_003);
    expect(program.instructions[40_002]).toEqual({ op: "Accept" });
  });

  it("compiles long alternation chains", () => {
    const program = compile(parse(`${"a|".repeat(30_000)}b`));
    expect(program.instructions).toHaveLength(90_004);
    expect(program.instructions[1]).toEqual({
      op: "Split",
      primary: 2,
      secondary: 90_001,
    });
    expect(program.instructions[90_003]).toEqual({ op: "Accept" });
  });

  it("compiles long chains of stacked quantifiers", () => {
    const program = compile(parse(`a${"*".repeat(60_000)}`));
    expect(program.instructions).toHaveLength(120_004);
    expect(program.instructions[60_001]).toEqual({
      op: "MatchLiteral",
      char: "a",
    });
    expect(program.instructions[120_003]).toEqual({ op: "Accept" });
  });

  it("compiles hand-built trees", () => {
    const program = compile(AST.alt(AST.empty(), AST.literal("x")));
    expect(disassemble(program)).toEqual([
      "0: save 0",
      "1: split 2, 3",
      "2: jmp 4",
      '3: char "x"',
      "4: save 1",
      "5: match",
    ]);
  });

  it("rejects nodes it does not know", () => {
    const bogus: RegexNode = JSON.parse('{"type":"Bogus"}');
    expect(() => compile(bogus)).toThrow(RegexCompileError);
  });
});

import { describe, expect, it } from "vitest";
import { formatNode } from "../ast/types.js";
import {
  MAX_EXPANDED_SIZE,
  MAX_NESTING_DEPTH,
  parse,
  tryParse,
} from "./parser.js";
import { RegexSyntaxError } from "./types.js";

function tree(pattern: string): string {
  return formatNode(parse(pattern));
}

function parseError(pattern: string): RegexSyntaxError {
  const result = tryParse(pattern);
  if (result.ok) {
    throw new Error(`expected ${JSON.stringify(pattern)} to fail`);
  }
  return result.error;
}

describe("Parser", () => {
  describe("atoms and concatenation", () => {
    it("concatenates literals with the earlier operand on the left", () => {
      expect(tree("abc")).toBe("cat(lit(a), cat(lit(b), lit(c)))");
    });

    it("parses a single character", () => {
      expect(tree("x")).toBe("lit(x)");
    });

    it("parses the empty pattern", () => {
      expect(tree("")).toBe("empty");
    });

    it("parses dot and escaped dot", () => {
      expect(tree(".\\.")).toBe("cat(any, lit(.))");
    });

    it("parses anchors", () => {
      expect(tree("^a$")).toBe("cat(start, cat(lit(a), end))");
    });

    it("treats ] and } outside their context as literals", () => {
      expect(tree("a]")).toBe("cat(lit(a), lit(]))");
      expect(tree("a}")).toBe("cat(lit(a), lit(}))");
    });

    it("parses built-in classes", () => {
      expect(tree("\\d")).toBe("class[0-9]");
      expect(tree("\\w")).toBe("class[0-9A-Z_a-z]");
    });
  });

  describe("quantifiers", () => {
    it("wraps the previous atom", () => {
      expect(tree("ab*")).toBe("cat(lit(a), star(lit(b)))");
      expect(tree("a+")).toBe("plus(lit(a))");
      expect(tree("a?")).toBe("opt(lit(a))");
    });

    it("reads a following ? as non-greedy", () => {
      expect(tree("a*?")).toBe("star?(lit(a))");
      expect(tree("a+?")).toBe("plus?(lit(a))");
      expect(tree("a??")).toBe("opt?(lit(a))");
    });

    it("stacks quantifiers", () => {
      expect(tree("a**")).toBe("star(star(lit(a)))");
    });

    it("quantifies a whole group", () => {
      expect(tree("(ab)+")).toBe("plus(group(cat(lit(a), lit(b))))");
    });
  });

  describe("groups and alternation", () => {
    it("parses alternation left-associatively", () => {
      expect(tree("a|b")).toBe("alt(lit(a), lit(b))");
      expect(tree("a|b|c")).toBe("alt(alt(lit(a), lit(b)), lit(c))");
    });

    it("binds concatenation tighter than alternation", () => {
      expect(tree("ab|cd")).toBe(
        "alt(cat(lit(a), lit(b)), cat(lit(c), lit(d)))",
      );
    });

    it("reduces alternation inside a group", () => {
      expect(tree("(a|bc)")).toBe("group(alt(lit(a), cat(lit(b), lit(c))))");
    });

    it("parses an empty group", () => {
      expect(tree("()")).toBe("group(empty)");
    });

    it("allows empty alternatives", () => {
      expect(tree("a|")).toBe("alt(lit(a), empty)");
      expect(tree("|a")).toBe("alt(empty, lit(a))");
      expect(tree("(a|)")).toBe("group(alt(lit(a), empty))");
    });

    it("nests groups", () => {
      expect(tree("((a)b)")).toBe("group(cat(group(lit(a)), lit(b)))");
    });
  });

  describe("bracket expressions", () => {
    it("merges characters into ranges", () => {
      expect(tree("[abc]")).toBe("class[a-c]");
    });

    it("parses ranges in either order", () => {
      expect(tree("[a-z]")).toBe("class[a-z]");
      expect(tree("[z-a]")).toBe("class[a-z]");
    });

    it("collapses a single character to a literal", () => {
      expect(tree("[a]")).toBe("lit(a)");
    });

    it("negates", () => {
      expect(tree("[^a]")).toBe("class[\\u0000-`b-\\uffff]");
    });

    it("treats a trailing hyphen as a literal", () => {
      expect(tree("[a-]")).toBe("class[-a]");
    });

    it("treats meta characters as literals", () => {
      expect(tree("[.*]")).toBe("class[*.]");
    });

    it("unions built-in classes", () => {
      expect(tree("[\\d_]")).toBe("class[0-9_]");
    });

    it("drops an empty bracket expression", () => {
      expect(tree("a[]b")).toBe("cat(lit(a), lit(b))");
    });
  });

  describe("bounds", () => {
    it("repeats exactly", () => {
      expect(tree("a{3}")).toBe("cat(cat(lit(a), lit(a)), lit(a))");
      expect(tree("a{1}")).toBe("lit(a)");
    });

    it("expands the optional tail as non-greedy copies", () => {
      expect(tree("a{1,3}")).toBe(
        "cat(cat(lit(a), opt?(lit(a))), opt?(lit(a)))",
      );
    });

    it("expands an open bound with a trailing plus", () => {
      expect(tree("a{2,}")).toBe("cat(lit(a), plus(lit(a)))");
      expect(tree("a{1,}")).toBe("plus(lit(a))");
    });

    it("turns {0,} into a star", () => {
      expect(tree("a{0,}")).toBe("star(lit(a))");
    });

    it("turns {0} into empty", () => {
      expect(tree("a{0}")).toBe("empty");
      expect(tree("a{0,0}")).toBe("empty");
    });

    it("reads {,n} as {0,n}", () => {
      expect(tree("a{,2}")).toBe("cat(opt?(lit(a)), opt?(lit(a)))");
    });

    it("applies to the last atom only", () => {
      expect(tree("ab{2}")).toBe("cat(lit(a), cat(lit(b), lit(b)))");
    });

    it("reads multi-digit counts in written order", () => {
      const node = parse("a{12}");
      expect(formatNode(node).match(/lit\(a\)/g)).toHaveLength(12);
    });
  });

  describe("errors", () => {
    it("reports an unclosed group at its opening", () => {
      const error = parseError("(a");
      expect(error.offset).toBe(0);
      expect(error.description).toBe("Malformed regular expression");
    });

    it("reports an unbalanced closing parenthesis", () => {
      const error = parseError("a)");
      expect(error.offset).toBe(1);
      expect(error.description).toBe("Unbalanced closing character ')'");
    });

    it("reports an unclosed bracket expression", () => {
      const error = parseError("[a");
      expect(error.offset).toBe(0);
      expect(error.description).toBe("Malformed regular expression");
    });

    it("reports a range starting with a hyphen after the bracket", () => {
      const error = parseError("[-a]");
      expect(error.offset).toBe(1);
      expect(error.description).toBe("Malformed range");
    });

    it("reports a dangling quantifier", () => {
      const error = parseError("*a");
      expect(error.offset).toBe(0);
      expect(error.description).toBe("Dangling control meta character '*'");
    });

    it("reports a quantifier applied to a marker", () => {
      expect(parseError("(*)").offset).toBe(0);
      expect(parseError("a|+").offset).toBe(1);
    });

    it("reports a decreasing bound at the closing brace", () => {
      const error = parseError("a{4,2}");
      expect(error.offset).toBe(5);
      expect(error.description).toBe("Malformed regular expression");
    });

    it("reports a bound without digits at the opening brace", () => {
      expect(parseError("a{}").offset).toBe(1);
      expect(parseError("a{,}").offset).toBe(1);
    });

    it("reports a bound with other characters at the closing brace", () => {
      expect(parseError("a{x}").offset).toBe(3);
      expect(parseError("a{1,2,3}").offset).toBe(7);
    });

    it("reports an unclosed bound", () => {
      expect(parseError("a{2").offset).toBe(1);
    });

    it("reports an oversized repetition", () => {
      const error = parseError("a{1001}");
      expect(error.offset).toBe(1);
      expect(error.description).toBe(
        "Repetition count too large: exceeds limit of 1000",
      );
    });

    it("reports lexing errors", () => {
      const error = parseError("a\\x");
      expect(error.offset).toBe(2);
      expect(error.description).toBe("Unknown escaped character '\\x'");
    });

    it("includes the offset and the rest of the pattern in the message", () => {
      expect(parseError("ab)cd").message).toBe(
        "Unbalanced closing character ')' near index 2\n)cd\n^",
      );
    });

    it("throws RegexSyntaxError from parse()", () => {
      expect(() => parse("(a")).toThrow(RegexSyntaxError);
    });
  });

  describe("limits", () => {
    it("rejects patterns over the length limit", () => {
      expect(() => parse("a".repeat(11), { maxPatternLength: 10 })).toThrow(
        "Pattern too large: 11 characters exceeds limit of 10",
      );
    });

    it("rejects excessive nesting", () => {
      const error = parseError("(".repeat(MAX_NESTING_DEPTH + 1));
      expect(error.offset).toBe(MAX_NESTING_DEPTH);
    });

    it("rejects nested bounds whose expansion is too large", () => {
      const error = parseError("a{1000}{1000}{1000}");
      expect(error.offset).toBe(7);
      expect(error.description).toBe(
        "Repetition too large: expanded pattern exceeds limit of " +
          `${MAX_EXPANDED_SIZE} nodes`,
      );
    });

    it("accepts nested bounds within the expansion limit", () => {
      expect(parse("a{1000}{400}").type).toBe("Concat");
    });

    it("rejects a pattern whose bounds add up past the limit", () => {
      const error = parseError("a{1000}{400}b{1000}{400}");
      expect(error.offset).toBe(0);
      expect(error.description).toMatch(/^Repetition too large/);
    });

    it("parses a long literal without deep recursion", () => {
      const node = parse("a".repeat(50_000));
      expect(node.type).toBe("Concat");
    });
  });

  it("tryParse returns the tree on success", () => {
    const result = tryParse("a");
    expect(result).toEqual({ ok: true, value: { type: "Literal", char: "a" } });
  });
});

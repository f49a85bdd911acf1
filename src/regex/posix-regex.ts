/**
 * PosixRegex - the user-facing regex object
 *
 * Wraps parse → compile → VM behind a RegExp-like interface. Instances are
 * immutable: there is no lastIndex, and every call scans from the position
 * it is given, so one instance can serve any number of subjects.
 */

import { AST, type RegexNode } from "../ast/types.js";
import { compile } from "../compiler/compiler.js";
import { disassemble, type Program } from "../compiler/instructions.js";
import { type RegexLimits, resolveLimits } from "../limits.js";
import { parse } from "../parser/parser.js";
import { type MatchResult, match, matchAt, type Span } from "../vm/vm.js";

/**
 * Logger interface for regex compilation and matching.
 * Implement this interface to receive engine logs.
 */
export interface RegexLogger {
  /** Log informational messages (compilation) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (program listings, match outcomes) */
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface PosixRegexOptions {
  /**
   * Limits for parsing and matching.
   * See RegexLimits for available options.
   */
  limits?: RegexLimits;
  /** Optional logger for compilation and match tracing */
  logger?: RegexLogger;
}

/**
 * A successful match. Offsets are UTF-16 code unit indices into `input`.
 */
export class RegexMatch {
  constructor(
    readonly input: string,
    private readonly spans: readonly (Span | null)[],
  ) {}

  static from(input: string, result: MatchResult): RegexMatch {
    return new RegexMatch(input, result.spans);
  }

  get start(): number {
    return this.span(0)?.start ?? -1;
  }

  get end(): number {
    return this.span(0)?.end ?? -1;
  }

  /** The matched text */
  get matched(): string {
    return this.input.slice(this.start, this.end);
  }

  /** Number of explicit groups (group 0 excluded) */
  get groupCount(): number {
    return this.spans.length - 1;
  }

  /** Text of the explicit groups 1..n; undefined for unset groups */
  get groups(): (string | undefined)[] {
    const result: (string | undefined)[] = [];
    for (let i = 1; i < this.spans.length; i++) {
      result.push(this.group(i));
    }
    return result;
  }

  /** Text before the match */
  get before(): string {
    return this.input.slice(0, this.start);
  }

  /** Text after the match */
  get after(): string {
    return this.input.slice(this.end);
  }

  span(group: number): Span | null {
    const span = this.spans[group];
    return span ? { start: span.start, end: span.end } : null;
  }

  group(group: number): string | undefined {
    const span = this.spans[group];
    return span ? this.input.slice(span.start, span.end) : undefined;
  }
}

export type Replacement = string | ((match: RegexMatch) => string);

function expandReplacement(template: string, m: RegexMatch): string {
  return template.replace(/\$(\$|\d)/g, (_, ref: string) =>
    ref === "$" ? "$" : (m.group(Number(ref)) ?? ""),
  );
}

/**
 * Common interface for regex objects.
 */
export interface RegexLike {
  test(input: string): boolean;
  isMatchedBy(input: string): boolean;
  exec(input: string, from?: number): RegexMatch | null;
  matchAll(input: string): IterableIterator<RegexMatch>;
  replace(input: string, replacement: Replacement): string;
  replaceAll(input: string, replacement: Replacement): string;
  split(input: string, limit?: number): string[];
  search(input: string): number;
  readonly source: string;
  readonly groupCount: number;
}

export class PosixRegex implements RegexLike {
  private readonly _source: string;
  private readonly _ast: RegexNode;
  private readonly _program: Program;
  private readonly _limits: Required<RegexLimits>;
  private readonly _logger?: RegexLogger;
  // Whole-input variant for isMatchedBy - compiled lazily
  private _anchored: Program | null = null;

  constructor(pattern: string, options: PosixRegexOptions = {}) {
    this._source = pattern;
    this._limits = resolveLimits(options.limits);
    this._logger = options.logger;
    this._ast = parse(pattern, this._limits);
    this._program = compile(this._ast);

    if (this._logger) {
      this._logger.info("compile", {
        pattern,
        groups: this._program.groupCount - 1,
        instructions: this._program.instructions.length,
      });
      this._logger.debug("program", {
        listing: disassemble(this._program),
      });
    }
  }

  get source(): string {
    return this._source;
  }

  /** Number of explicit groups (group 0 excluded) */
  get groupCount(): number {
    return this._program.groupCount - 1;
  }

  get program(): Program {
    return this._program;
  }

  get ast(): RegexNode {
    return this._ast;
  }

  /**
   * Test if the pattern matches anywhere in the input.
   */
  test(input: string): boolean {
    return this.find(input, 0) !== null;
  }

  /**
   * Test if the pattern matches the whole input.
   */
  isMatchedBy(input: string): boolean {
    if (!this._anchored) {
      this._anchored = compile(AST.concat(this._ast, AST.endAnchor()));
    }
    const result = matchAt(this._anchored, input, 0, {
      maxSteps: this._limits.maxSteps,
    });
    return result !== null;
  }

  /**
   * Find the first match starting at or after `from`.
   */
  exec(input: string, from = 0): RegexMatch | null {
    const result = this.find(input, from);
    return result ? RegexMatch.from(input, result) : null;
  }

  /**
   * Iterate over successive non-overlapping matches. After an empty match
   * the scan resumes one position further.
   */
  *matchAll(input: string): IterableIterator<RegexMatch> {
    let pos = 0;
    while (pos <= input.length) {
      const result = this.find(input, pos);
      if (!result) break;
      yield RegexMatch.from(input, result);
      pos = result.end === result.start ? result.end + 1 : result.end;
    }
  }

  /**
   * Index of the first match, or -1.
   */
  search(input: string): number {
    return this.find(input, 0)?.start ?? -1;
  }

  /**
   * Replace the first match. A string replacement may refer to groups with
   * $0..$9; $$ is a literal dollar sign.
   */
  replace(input: string, replacement: Replacement): string {
    return this.replaceMatches(input, replacement, false);
  }

  /**
   * Replace every match.
   */
  replaceAll(input: string, replacement: Replacement): string {
    return this.replaceMatches(input, replacement, true);
  }

  /**
   * Split the input around matches, with String.prototype.split semantics:
   * an empty match at the start of a piece does not split.
   */
  split(input: string, limit?: number): string[] {
    const max =
      limit === undefined || limit < 0 ? Number.POSITIVE_INFINITY : limit;
    if (max === 0) {
      return [];
    }
    if (input.length === 0) {
      return this.test(input) ? [] : [input];
    }

    const parts: string[] = [];
    let last = 0;
    let pos = 0;
    while (pos < input.length) {
      const result = this.find(input, pos);
      if (!result || result.start >= input.length) break;
      if (result.end === last) {
        pos = result.start + 1;
        continue;
      }
      parts.push(input.slice(last, result.start));
      if (parts.length >= max) {
        return parts;
      }
      last = result.end;
      pos = result.end > result.start ? result.end : result.end + 1;
    }
    parts.push(input.slice(last));
    return parts.slice(0, max);
  }

  toString(): string {
    return this._source;
  }

  private find(input: string, from: number): MatchResult | null {
    // `^` stays at offset 0 whatever `from` is, as with RegExp
    const result = match(this._program, input, from, {
      anchor: 0,
      maxSteps: this._limits.maxSteps,
    });
    this._logger?.debug("match", {
      from,
      span: result ? [result.start, result.end] : null,
    });
    return result;
  }

  private replaceMatches(
    input: string,
    replacement: Replacement,
    all: boolean,
  ): string {
    const out: string[] = [];
    let last = 0;
    for (const m of this.matchAll(input)) {
      out.push(input.slice(last, m.start));
      out.push(
        typeof replacement === "function"
          ? replacement(m)
          : expandReplacement(replacement, m),
      );
      last = m.end;
      if (!all) break;
    }
    out.push(input.slice(last));
    return out.join("");
  }
}

/**
 * Compile a pattern into a PosixRegex.
 *
 * @throws RegexSyntaxError if the pattern is invalid
 */
export function createRegex(
  pattern: string,
  options?: PosixRegexOptions,
): PosixRegex {
  return new PosixRegex(pattern, options);
}

export type {
  RegexNode,
  RegexNodeType,
} from "./ast/types.js";
export { AST, countCaptures, formatNode } from "./ast/types.js";
export {
  type CharRange,
  CharRangeSet,
  MAX_CHAR,
  MIN_CHAR,
  type RangeTree,
  range,
  treeContains,
} from "./charset/char-range-set.js";
export {
  compile,
  disassemble,
  formatInstruction,
  type Instruction,
  type OpCode,
  type Program,
  RegexCompileError,
} from "./compiler/compiler.js";
export type { RegexLimits } from "./limits.js";
export { resolveLimits } from "./limits.js";
export {
  type ParseError,
  type ParseResult,
  Parser,
  type ParserOptions,
  parse,
  RegexSyntaxError,
  tryParse,
} from "./parser/parser.js";
export {
  createRegex,
  PosixRegex,
  type PosixRegexOptions,
  type RegexLike,
  type RegexLogger,
  RegexMatch,
  type Replacement,
} from "./regex/index.js";
export {
  MatchLimitError,
  type MatchOptions,
  type MatchResult,
  match,
  matchAt,
  type Span,
} from "./vm/vm.js";

/**
 * User-facing regex API.
 *
 * Usage:
 *   import { createRegex } from '../regex/index.js';
 *
 *   const regex = createRegex('(\\w+)@(\\w+)');
 *   const m = regex.exec('mail alice@example');
 *   m?.group(1); // "alice"
 */

export {
  createRegex,
  PosixRegex,
  type PosixRegexOptions,
  type RegexLike,
  type RegexLogger,
  RegexMatch,
  type Replacement,
} from "./posix-regex.js";

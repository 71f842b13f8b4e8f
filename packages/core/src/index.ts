// Parsing and normalization of static-analysis tool output
export {
  Violation,
  addViolation,
  countViolations,
  toViolationRecord,
  type ViolationJson,
  type ViolationsByPath,
} from './violation.js';
export { FormatNotRecognizedError, OutputParseError } from './errors.js';
export { normalizePath } from './path-normalizer.js';
export type { ViolationExtractor } from './parsers/types.js';
export {
  LineRegexExtractor,
  UNIX_PATTERN,
  ESLINT_UNIX_PATTERN,
} from './parsers/line-regex.js';
export {
  IndentedBlockExtractor,
  ESLINT_STYLISH_GRAMMAR,
  STYLELINT_GRAMMAR,
  type IndentedBlockGrammar,
} from './parsers/indented-block.js';
export {
  PylintJsonExtractor,
  BanditJsonExtractor,
  CfnNagExtractor,
  GitleaksExtractor,
  HadolintExtractor,
} from './parsers/json-records.js';
export { BlackExtractor } from './parsers/black.js';
export { CfnLintExtractor } from './parsers/cfn-lint.js';
export {
  FORMAT_KEYS,
  isFormatKey,
  resolveExtractor,
  parseViolations,
  listFormats,
  type FormatKey,
} from './registry.js';

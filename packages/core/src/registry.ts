/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { FormatNotRecognizedError } from './errors.js';
import { BlackExtractor } from './parsers/black.js';
import { CfnLintExtractor } from './parsers/cfn-lint.js';
import { ESLINT_STYLISH_GRAMMAR, IndentedBlockExtractor, STYLELINT_GRAMMAR } from './parsers/indented-block.js';
import {
  BanditJsonExtractor,
  CfnNagExtractor,
  GitleaksExtractor,
  HadolintExtractor,
  PylintJsonExtractor,
} from './parsers/json-records.js';
import { ESLINT_UNIX_PATTERN, LineRegexExtractor, UNIX_PATTERN } from './parsers/line-regex.js';
import type { ViolationExtractor } from './parsers/types.js';
import type { ViolationsByPath } from './violation.js';

export const FORMAT_KEYS = [
  'unix',
  'flake8',
  'pylint-json',
  'eslint',
  'eslint-unix',
  'stylelint',
  'black',
  'cfn-lint',
  'bandit-json',
  'cfn-nag',
  'gitleaks',
  'hadolint',
] as const;

export type FormatKey = (typeof FORMAT_KEYS)[number];

interface FormatEntry {
  description: string;
  extractor: ViolationExtractor;
}

const unixExtractor = new LineRegexExtractor('unix', UNIX_PATTERN);

// One entry per key in FORMAT_KEYS
const FORMATS: Readonly<Record<FormatKey, FormatEntry>> = Object.freeze({
  unix: { description: 'path:line:column: CODE message', extractor: unixExtractor },
  flake8: { description: "flake8's default output (same grammar as unix)", extractor: unixExtractor },
  'pylint-json': { description: 'pylint --output-format=json', extractor: new PylintJsonExtractor() },
  eslint: {
    description: "ESLint's default stylish formatter",
    extractor: new IndentedBlockExtractor('eslint', ESLINT_STYLISH_GRAMMAR),
  },
  'eslint-unix': {
    description: "ESLint's unix formatter (path:line:column: message [Error/rule])",
    extractor: new LineRegexExtractor('eslint-unix', ESLINT_UNIX_PATTERN),
  },
  stylelint: {
    description: "stylelint's default string formatter",
    extractor: new IndentedBlockExtractor('stylelint', STYLELINT_GRAMMAR),
  },
  black: { description: 'black --check', extractor: new BlackExtractor() },
  'cfn-lint': { description: "cfn-lint's default formatter", extractor: new CfnLintExtractor() },
  'bandit-json': { description: 'bandit -f json', extractor: new BanditJsonExtractor() },
  'cfn-nag': { description: 'cfn_nag_scan --output-format json', extractor: new CfnNagExtractor() },
  gitleaks: { description: 'gitleaks JSON report', extractor: new GitleaksExtractor() },
  hadolint: { description: 'hadolint --format json', extractor: new HadolintExtractor() },
});

export function isFormatKey(value: string): value is FormatKey {
  return FORMAT_KEYS.some((key) => key === value);
}

/**
 * Looks up the extractor for a format key. Keys are matched exactly,
 * including case.
 */
export function resolveExtractor(formatKey: string): ViolationExtractor {
  if (!isFormatKey(formatKey)) {
    throw new FormatNotRecognizedError(formatKey, FORMAT_KEYS);
  }
  return FORMATS[formatKey].extractor;
}

/**
 * Parses raw tool output into violations keyed by path relative to `workingRoot`.
 */
export function parseViolations(
  formatKey: string,
  rawOutput: string,
  workingRoot: string = process.cwd()
): ViolationsByPath {
  const extractor = resolveExtractor(formatKey);
  return extractor.extract(rawOutput, workingRoot);
}

export function listFormats(): Array<{ key: FormatKey; description: string }> {
  return FORMAT_KEYS.map((key) => ({ key, description: FORMATS[key].description }));
}

/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { OutputParseError } from '../errors.js';
import type { ViolationsByPath } from '../violation.js';

/**
 * Turns one tool's raw output into violations keyed by normalized path.
 *
 * Implementations hold only their grammar; all scan state lives in `extract`.
 */
export interface ViolationExtractor {
  extract(rawOutput: string, workingRoot: string): ViolationsByPath;
}

/**
 * Splits raw output into lines the way every text extractor reads it:
 * surrounding whitespace of the whole blob is dropped first.
 */
export function outputLines(rawOutput: string): string[] {
  const trimmed = rawOutput.trim();
  if (!trimmed) {
    return [];
  }
  return trimmed.split(/\r?\n/);
}

/**
 * Parses a captured line/column number. Grammars only capture digits, so a
 * failure here means the grammar itself is wrong for the output.
 */
export function parseInteger(value: string, format: string, line: string): number {
  if (!/^\d+$/.test(value)) {
    throw new OutputParseError(format, line, `'${value}' is not an integer`);
  }
  return Number(value);
}

/**
 * `exec` on a global or sticky pattern resumes from `lastIndex`, so results
 * would depend on earlier lines and earlier calls.
 */
export function assertStateless(format: string, pattern: RegExp): void {
  if (pattern.global || pattern.sticky) {
    throw new Error(`Pattern for '${format}' must not use the g or y flag`);
  }
}

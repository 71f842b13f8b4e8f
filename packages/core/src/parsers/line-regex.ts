/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { normalizePath } from '../path-normalizer.js';
import { Violation, addViolation, type ViolationsByPath } from '../violation.js';
import { assertStateless, outputLines, parseInteger, type ViolationExtractor } from './types.js';

const REQUIRED_GROUPS = ['path', 'line', 'column', 'code', 'message'] as const;

/**
 * Matches every line of the output against one grammar. The grammar must name
 * the groups `path`, `line`, `column`, `code` and `message`.
 *
 * Lines that don't match (banners, blank lines, summaries) are ignored.
 */
export class LineRegexExtractor implements ViolationExtractor {
  constructor(
    private readonly format: string,
    private readonly pattern: RegExp
  ) {
    const missing = REQUIRED_GROUPS.filter((group) => !pattern.source.includes(`(?<${group}>`));
    if (missing.length > 0) {
      throw new Error(`Pattern for '${format}' is missing named groups: ${missing.join(', ')}`);
    }
    assertStateless(format, pattern);
  }

  extract(rawOutput: string, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();

    for (const rawLine of outputLines(rawOutput)) {
      const line = rawLine.trim();
      const groups = this.pattern.exec(line)?.groups;
      if (!groups) {
        continue;
      }

      addViolation(
        violations,
        normalizePath(groups.path, workingRoot),
        new Violation({
          line: parseInteger(groups.line, this.format, line),
          column: parseInteger(groups.column, this.format, line),
          code: groups.code,
          message: groups.message,
        })
      );
    }

    return violations;
  }
}

// docs/conf.py:230:1: E265 block comment should start with '# '
export const UNIX_PATTERN = /^(?<path>.*):(?<line>\d+):(?<column>\d+): (?<code>\w\d+) (?<message>.*)$/;

// src/static/js/scripts.js:69:1: 'app' is not defined. [Error/no-undef]
export const ESLINT_UNIX_PATTERN =
  /^(?<path>.*):(?<line>\d+):(?<column>\d+): (?<message>.+) \[(?:Warning|Error)\/(?<code>.+)\]$/;

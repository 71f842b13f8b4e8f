/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { OutputParseError } from '../errors.js';
import { normalizePath } from '../path-normalizer.js';
import { Violation, addViolation, type ViolationsByPath } from '../violation.js';
import { assertStateless, parseInteger, type ViolationExtractor } from './types.js';

export interface IndentedBlockGrammar {
  /** Matched against trimmed indented lines; names `line`, `column`, `message` and `code`. */
  violationPattern: RegExp;
  /** A line starting with this marker ends the report. */
  terminator?: string;
}

/**
 * Reads "stylish" style reports: an unindented line names a file and the
 * indented lines below it are that file's violations.
 *
 *   /home/dev/project/file1.js
 *     1:1    error  '$' is not defined    no-undef
 *
 * Every file header gets an entry, even when no violations follow it.
 */
export class IndentedBlockExtractor implements ViolationExtractor {
  constructor(
    private readonly format: string,
    private readonly grammar: IndentedBlockGrammar
  ) {
    assertStateless(format, grammar.violationPattern);
  }

  extract(rawOutput: string, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    const { violationPattern, terminator } = this.grammar;
    let currentFile: string | null = null;

    // Not trimmed as a whole: leading indentation decides what a line is
    for (const line of rawOutput.split(/\r?\n/)) {
      if (!line.trim()) {
        continue;
      }

      if (/^\s/.test(line)) {
        const groups = violationPattern.exec(line.trim())?.groups;
        if (!groups) {
          continue;
        }
        if (currentFile === null) {
          throw new OutputParseError(this.format, line, 'violation listed before any file header');
        }

        addViolation(
          violations,
          currentFile,
          new Violation({
            line: parseInteger(groups.line, this.format, line),
            column: parseInteger(groups.column, this.format, line),
            code: groups.code.trim(),
            message: groups.message.trim(),
          })
        );
      } else if (terminator && line.startsWith(terminator)) {
        break;
      } else {
        currentFile = normalizePath(line.trimEnd(), workingRoot);
        if (!violations.has(currentFile)) {
          violations.set(currentFile, []);
        }
      }
    }

    return violations;
  }
}

// ESLint's default "stylish" formatter, closed by a "✖ N problems" summary.
export const ESLINT_STYLISH_GRAMMAR: IndentedBlockGrammar = {
  violationPattern: /^(?<line>\d+):(?<column>\d+)\s+(?:error|warning)\s+(?<message>.*)\s+(?<code>.+)$/,
  terminator: '✖',
};

// src/styles/file1.scss
//   13:1  ✖  Expected no more than 1 empty line   max-empty-lines
export const STYLELINT_GRAMMAR: IndentedBlockGrammar = {
  violationPattern: /^(?<line>\d+):(?<column>\d+)\s+[✖⚠]\s+(?<message>.*)\s+(?<code>.+)$/,
};

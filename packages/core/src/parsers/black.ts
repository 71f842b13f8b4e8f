/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { normalizePath } from '../path-normalizer.js';
import { Violation, type ViolationsByPath } from '../violation.js';
import { outputLines, type ViolationExtractor } from './types.js';

const REFORMAT_PREFIX = 'would reformat ';

/**
 * `black --check`: every "would reformat <path>" line marks a file that
 * needs formatting. Black has no line information, so the whole file is
 * reported once at 1:1.
 */
export class BlackExtractor implements ViolationExtractor {
  extract(rawOutput: string, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();

    for (const line of outputLines(rawOutput)) {
      if (!line.startsWith(REFORMAT_PREFIX)) {
        continue;
      }
      const reported = line.slice(REFORMAT_PREFIX.length).trim();
      violations.set(normalizePath(reported, workingRoot), [
        new Violation({ line: 1, column: 1, code: '`black`', message: 'this file needs to be formatted' }),
      ]);
    }

    return violations;
  }
}

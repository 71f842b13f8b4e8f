/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { OutputParseError } from '../errors.js';
import { normalizePath } from '../path-normalizer.js';
import { Violation, addViolation, type ViolationsByPath } from '../violation.js';
import { outputLines, parseInteger, type ViolationExtractor } from './types.js';

const RULE_LINE = /^[EIW]\d{4}\s/;
const LOCATION_LINE = /^(?<path>.+):(?<line>\d+):(?<column>\d+)$/;

/**
 * cfn-lint's default formatter prints each finding over two lines:
 *
 *   W2001 Parameter UnusedParameter not used.
 *   template.yaml:2:9
 */
export class CfnLintExtractor implements ViolationExtractor {
  extract(rawOutput: string, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    let pendingRule: string | null = null;

    for (const line of outputLines(rawOutput)) {
      if (RULE_LINE.test(line)) {
        pendingRule = line;
        continue;
      }
      if (pendingRule === null) {
        continue;
      }

      const groups = LOCATION_LINE.exec(line.trim())?.groups;
      if (!groups) {
        throw new OutputParseError('cfn-lint', line, `expected 'path:line:column' after '${pendingRule}'`);
      }

      const separator = pendingRule.search(/\s/);
      addViolation(
        violations,
        normalizePath(groups.path, workingRoot),
        new Violation({
          line: parseInteger(groups.line, 'cfn-lint', line),
          column: parseInteger(groups.column, 'cfn-lint', line),
          code: pendingRule.slice(0, separator),
          message: pendingRule.slice(separator + 1),
        })
      );
      pendingRule = null;
    }

    return violations;
  }
}

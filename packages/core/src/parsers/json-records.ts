/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import { z } from 'zod';
import { OutputParseError } from '../errors.js';
import { normalizePath } from '../path-normalizer.js';
import { Violation, addViolation, type ViolationsByPath } from '../violation.js';
import type { ViolationExtractor } from './types.js';

function formatIssuePath(issuePath: (string | number)[]): string {
  return issuePath.reduce<string>(
    (acc, key) => (typeof key === 'number' ? `${acc}[${key}]` : `${acc}.${key}`),
    '$'
  );
}

// Lines are 1-based; a column of 0 means the tool reports none
const lineNumber = z.number().int().positive();
const columnNumber = z.number().int().nonnegative();

/**
 * Base for extractors that read the whole output as one JSON document.
 *
 * Empty output means the tool found nothing. Anything that is not valid JSON,
 * or doesn't match `schema`, aborts the parse.
 */
abstract class JsonRecordsExtractor<TSchema extends z.ZodTypeAny> implements ViolationExtractor {
  protected abstract readonly format: string;
  protected abstract readonly schema: TSchema;

  protected abstract collect(document: z.infer<TSchema>, workingRoot: string): ViolationsByPath;

  /** Hook for tools that print something before the JSON starts. */
  protected prepare(rawOutput: string): string {
    return rawOutput;
  }

  extract(rawOutput: string, workingRoot: string): ViolationsByPath {
    const text = this.prepare(rawOutput).trim();
    if (!text) {
      return new Map();
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OutputParseError(this.format, '$', `invalid JSON: ${reason}`, { cause: error });
    }

    const result = this.schema.safeParse(data);
    if (!result.success) {
      const [issue] = result.error.issues;
      throw new OutputParseError(this.format, formatIssuePath(issue.path), issue.message, {
        cause: result.error,
      });
    }

    return this.collect(result.data, workingRoot);
  }
}

const pylintRecord = z.object({
  path: z.string(),
  line: lineNumber,
  column: columnNumber,
  message: z.string(),
  'message-id': z.string(),
  symbol: z.string(),
});

const pylintDocument = z.array(pylintRecord);

/**
 * `pylint --output-format=json`
 *
 *   [{ "type": "convention", "line": 54, "column": 4, "path": "app/backends/base.py",
 *      "symbol": "missing-docstring", "message": "Missing method docstring",
 *      "message-id": "C0111" }]
 */
export class PylintJsonExtractor extends JsonRecordsExtractor<typeof pylintDocument> {
  protected readonly format = 'pylint-json';
  protected readonly schema = pylintDocument;

  // pylint may print "No config file found, using default configuration" first
  protected prepare(rawOutput: string): string {
    if (rawOutput.startsWith('No config')) {
      return rawOutput.split(/\r?\n/).slice(1).join('\n');
    }
    return rawOutput;
  }

  protected collect(records: z.infer<typeof pylintDocument>, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    for (const record of records) {
      addViolation(
        violations,
        normalizePath(record.path, workingRoot),
        new Violation({
          line: record.line,
          column: record.column,
          code: `${record['message-id']} (${record.symbol})`,
          message: record.message,
        })
      );
    }
    return violations;
  }
}

const banditDocument = z.object({
  results: z.array(
    z.object({
      filename: z.string(),
      line_number: lineNumber,
      issue_text: z.string(),
      test_id: z.string(),
      test_name: z.string(),
    })
  ),
});

/**
 * `bandit -f json`: findings live under the top-level `results` key.
 * Bandit reports no columns.
 */
export class BanditJsonExtractor extends JsonRecordsExtractor<typeof banditDocument> {
  protected readonly format = 'bandit-json';
  protected readonly schema = banditDocument;

  protected collect(document: z.infer<typeof banditDocument>, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    for (const result of document.results) {
      addViolation(
        violations,
        normalizePath(result.filename, workingRoot),
        new Violation({
          line: result.line_number,
          column: 0,
          code: `${result.test_id} (${result.test_name})`,
          message: result.issue_text,
        })
      );
    }
    return violations;
  }
}

const cfnNagDocument = z.array(
  z.object({
    filename: z.string(),
    file_results: z.object({
      violations: z.array(
        z.object({
          id: z.string(),
          message: z.string(),
          line_numbers: z.array(lineNumber),
        })
      ),
    }),
  })
);

/**
 * `cfn_nag_scan --output-format json`. One rule violation can cover several
 * lines; each line becomes its own violation. Every scanned template gets an
 * entry, even when it is clean.
 */
export class CfnNagExtractor extends JsonRecordsExtractor<typeof cfnNagDocument> {
  protected readonly format = 'cfn-nag';
  protected readonly schema = cfnNagDocument;

  protected collect(files: z.infer<typeof cfnNagDocument>, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    for (const file of files) {
      const fileViolations = file.file_results.violations.flatMap((info) =>
        info.line_numbers.map(
          (line) => new Violation({ line, column: 0, code: info.id, message: info.message })
        )
      );
      violations.set(normalizePath(file.filename, workingRoot), fileViolations);
    }
    return violations;
  }
}

const gitleaksDocument = z.array(
  z.object({
    file: z.string(),
    lineNumber: lineNumber,
    offender: z.string(),
    rule: z.string(),
  })
);

/**
 * gitleaks JSON report. The leaked value is the code, the rule name the message.
 */
export class GitleaksExtractor extends JsonRecordsExtractor<typeof gitleaksDocument> {
  protected readonly format = 'gitleaks';
  protected readonly schema = gitleaksDocument;

  protected collect(leaks: z.infer<typeof gitleaksDocument>, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    for (const leak of leaks) {
      addViolation(
        violations,
        normalizePath(leak.file, workingRoot),
        new Violation({ line: leak.lineNumber, column: 0, code: leak.offender, message: leak.rule })
      );
    }
    return violations;
  }
}

const hadolintDocument = z.array(
  z.object({
    file: z.string(),
    line: lineNumber,
    column: columnNumber,
    code: z.string(),
    message: z.string(),
  })
);

export class HadolintExtractor extends JsonRecordsExtractor<typeof hadolintDocument> {
  protected readonly format = 'hadolint';
  protected readonly schema = hadolintDocument;

  protected collect(records: z.infer<typeof hadolintDocument>, workingRoot: string): ViolationsByPath {
    const violations: ViolationsByPath = new Map();
    for (const record of records) {
      addViolation(
        violations,
        normalizePath(record.file, workingRoot),
        new Violation({ line: record.line, column: record.column, code: record.code, message: record.message })
      );
    }
    return violations;
  }
}

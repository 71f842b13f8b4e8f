/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

/**
 * Raised when a format key has no extractor. This is a configuration problem
 * and is raised before any output is read.
 */
export class FormatNotRecognizedError extends Error {
  constructor(
    public readonly formatKey: string,
    public readonly knownFormats: readonly string[]
  ) {
    super(`Format '${formatKey}' not recognized. Known formats: ${knownFormats.join(', ')}`);
    this.name = 'FormatNotRecognizedError';
  }
}

/**
 * Raised when tool output deviates from the shape its format documents.
 * `detail` holds the offending line or JSON path.
 */
export class OutputParseError extends Error {
  constructor(
    public readonly format: string,
    public readonly detail: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to parse ${format} output: ${reason} (at ${detail})`, options);
    this.name = 'OutputParseError';
  }
}

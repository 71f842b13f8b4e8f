/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

export interface ViolationJson {
  line: number;
  column: number;
  code: string;
  message: string;
}

/**
 * A single issue reported by a tool, attributed to one file.
 *
 * Tools that don't report a column use 0; tools that don't report a line use 1.
 */
export class Violation {
  readonly line: number;
  readonly column: number;
  readonly code: string;
  readonly message: string;

  constructor({ line, column, code, message }: ViolationJson) {
    this.line = line;
    this.column = column;
    this.code = code;
    this.message = message;
    Object.freeze(this);
  }

  toJSON(): ViolationJson {
    return {
      line: this.line,
      column: this.column,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Normalized path -> violations, in the order the tool reported them.
 */
export type ViolationsByPath = Map<string, Violation[]>;

/**
 * Appends a violation to the list for `path`, creating the list on first use.
 */
export function addViolation(violations: ViolationsByPath, path: string, violation: Violation): void {
  const existing = violations.get(path);
  if (existing) {
    existing.push(violation);
  } else {
    violations.set(path, [violation]);
  }
}

export function countViolations(violations: ViolationsByPath): number {
  let total = 0;
  for (const list of violations.values()) {
    total += list.length;
  }
  return total;
}

export function toViolationRecord(violations: ViolationsByPath): Record<string, ViolationJson[]> {
  const record: Record<string, ViolationJson[]> = {};
  for (const [path, list] of violations) {
    record[path] = list.map((v) => v.toJSON());
  }
  return record;
}

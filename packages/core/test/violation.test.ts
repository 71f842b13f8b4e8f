import { describe, it, expect } from 'vitest';
import { Violation, addViolation, countViolations, toViolationRecord, type ViolationsByPath } from '../src/violation.js';

describe('Violation', () => {
  it('should be frozen after construction', () => {
    const violation = new Violation({ line: 3, column: 0, code: 'B101', message: 'Use of assert detected.' });

    expect(Object.isFrozen(violation)).toBe(true);
    expect(JSON.stringify(violation)).toBe('{"line":3,"column":0,"code":"B101","message":"Use of assert detected."}');
  });

  it('should create the list on first use and keep insertion order', () => {
    const violations: ViolationsByPath = new Map();
    addViolation(violations, 'b.py', new Violation({ line: 9, column: 1, code: 'E1', message: 'first' }));
    addViolation(violations, 'a.py', new Violation({ line: 1, column: 1, code: 'E2', message: 'second' }));
    addViolation(violations, 'b.py', new Violation({ line: 2, column: 1, code: 'E3', message: 'third' }));

    expect([...violations.keys()]).toEqual(['b.py', 'a.py']);
    expect(violations.get('b.py')?.map((v) => v.message)).toEqual(['first', 'third']);
    expect(countViolations(violations)).toBe(3);
  });

  it('should convert to a plain record, keeping empty entries', () => {
    const violations: ViolationsByPath = new Map<string, Violation[]>([
      ['clean.yaml', []],
      ['dirty.yaml', [new Violation({ line: 4, column: 0, code: 'W35', message: 'logging' })]],
    ]);

    expect(toViolationRecord(violations)).toEqual({
      'clean.yaml': [],
      'dirty.yaml': [{ line: 4, column: 0, code: 'W35', message: 'logging' }],
    });
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import { executeTool } from '../src/utils/tool-executor.js';

interface MockedResult {
  command: string;
  exitCode?: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

const execution = vi.hoisted(() => {
  const state: { result: MockedResult | null } = { result: null };
  return state;
});

vi.mock('execa', () => ({
  execa: vi.fn(async () => execution.result),
}));

describe('Tool executor', () => {
  beforeEach(() => {
    vi.mocked(execa).mockClear();
    execution.result = {
      command: 'eslint -f unix src',
      exitCode: 1,
      stdout: 'src/app.js:1:1: Unexpected var [Error/no-var]',
      stderr: '',
      timedOut: false,
    };
  });

  it('should return the output of a linter that exits non-zero', async () => {
    const result = await executeTool({ command: 'eslint', args: ['-f', 'unix', 'src'], cwd: '/work' });

    expect(result).toEqual({
      command: 'eslint -f unix src',
      exitCode: 1,
      stdout: 'src/app.js:1:1: Unexpected var [Error/no-var]',
      stderr: '',
    });
    expect(execa).toHaveBeenCalledWith('eslint', ['-f', 'unix', 'src'], {
      cwd: '/work',
      timeout: undefined,
      reject: false,
    });
  });

  it('should fail when the process never ran', async () => {
    execution.result = {
      command: 'no-such-linter',
      stdout: '',
      stderr: '',
      timedOut: false,
    };

    await expect(executeTool({ command: 'no-such-linter' })).rejects.toThrow(
      'Failed to run no-such-linter: process could not be started'
    );
  });

  it('should report a timeout', async () => {
    execution.result = {
      command: 'slow-linter',
      stdout: '',
      stderr: '',
      timedOut: true,
    };

    await expect(executeTool({ command: 'slow-linter', timeout: 10 })).rejects.toThrow(
      'Failed to run slow-linter: timed out'
    );
  });
});

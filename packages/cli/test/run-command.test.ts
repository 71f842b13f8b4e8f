import { describe, it, expect, vi, beforeEach, afterEach, beforeAll, type MockInstance } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import chalk from 'chalk';
import { runCommand } from '../src/commands/run.js';
import { executeTool } from '../src/utils/tool-executor.js';
import { getToolLogs } from '../src/utils/tool-logger.js';

const spinner = vi.hoisted(() => {
  const state = { isSpinning: false };
  return {
    get isSpinning() {
      return state.isSpinning;
    },
    set isSpinning(value: boolean) {
      state.isSpinning = value;
    },
    start: vi.fn((_text?: string) => {
      state.isSpinning = true;
    }),
    succeed: vi.fn((_text?: string) => {
      state.isSpinning = false;
    }),
    fail: vi.fn((_text?: string) => {
      state.isSpinning = false;
    }),
  };
});

vi.mock('ora', () => ({
  default: vi.fn(() => spinner),
}));

vi.mock('../src/utils/tool-executor.js', () => ({
  executeTool: vi.fn(),
}));

const FLAKE8_OUTPUT = [
  './app/models.py:14:80: E501 line too long (96 > 79 characters)',
  './app/models.py:20:1: W391 blank line at end of file',
  './app/views.py:3:1: F401 \'os\' imported but unused',
].join('\n');

describe('run command', () => {
  let projectDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lintlens-run-'));
    fs.mkdirSync(path.join(projectDir, '.lintlens'));
    fs.writeFileSync(path.join(projectDir, '.lintlens', 'lintlens.config.yml'), 'format: flake8\noutput: json\n');

    spinner.isSpinning = false;
    spinner.start.mockClear();
    spinner.succeed.mockClear();
    spinner.fail.mockClear();
    vi.mocked(executeTool).mockReset();

    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it('should parse stdout of a linter that exits non-zero', async () => {
    vi.mocked(executeTool).mockResolvedValue({
      command: 'flake8 app',
      exitCode: 1,
      stdout: FLAKE8_OUTPUT,
      stderr: '',
    });

    await runCommand(['flake8', 'app'], {});

    expect(executeTool).toHaveBeenCalledWith({ command: 'flake8', args: ['app'], cwd: projectDir, timeout: undefined });
    expect(spinner.succeed).toHaveBeenCalledWith('flake8 finished with exit code 1');
    expect(process.exit).not.toHaveBeenCalled();
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      'app/models.py': [
        { line: 14, column: 80, code: 'E501', message: 'line too long (96 > 79 characters)' },
        { line: 20, column: 1, code: 'W391', message: 'blank line at end of file' },
      ],
      'app/views.py': [{ line: 3, column: 1, code: 'F401', message: "'os' imported but unused" }],
    });

    const logs = await getToolLogs('flake8', 50, projectDir);
    expect(logs[0]).toMatchObject({
      action: 'run',
      command: 'flake8 app',
      exitCode: 1,
      fileCount: 2,
      violationCount: 3,
    });
  });

  it('should pass the timeout through to the executor', async () => {
    vi.mocked(executeTool).mockResolvedValue({ command: 'flake8 .', exitCode: 0, stdout: '', stderr: '' });

    await runCommand(['flake8', '.'], { timeout: '5000' });

    expect(executeTool).toHaveBeenCalledWith({ command: 'flake8', args: ['.'], cwd: projectDir, timeout: 5000 });
    expect(logSpy).toHaveBeenCalledWith('{}');
  });

  it('should reject an invalid timeout before running anything', async () => {
    await expect(runCommand(['flake8', '.'], { timeout: 'soon' })).rejects.toThrow('exit 1');

    expect(executeTool).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(
      '❌ Run failed:',
      'Invalid timeout: soon (expected a positive number of milliseconds)'
    );
  });

  it('should fail the spinner when the linter cannot be started', async () => {
    vi.mocked(executeTool).mockRejectedValue(new Error('Failed to run flake9: process could not be started'));

    await expect(runCommand(['flake9', '.'], {})).rejects.toThrow('exit 1');

    expect(spinner.fail).toHaveBeenCalledWith('Linter run failed');
    expect(errorSpy).toHaveBeenCalledWith('❌ Run failed:', 'Failed to run flake9: process could not be started');
    const logs = await getToolLogs('flake8', 50, projectDir);
    expect(logs[0]).toMatchObject({ action: 'error', error: 'Failed to run flake9: process could not be started' });
  });

  it('should exit with 1 on violations when configured to', async () => {
    vi.mocked(executeTool).mockResolvedValue({
      command: 'flake8 app',
      exitCode: 1,
      stdout: FLAKE8_OUTPUT,
      stderr: '',
    });

    await expect(runCommand(['flake8', 'app'], { failOnViolations: true })).rejects.toThrow('exit 1');
    expect(spinner.fail).not.toHaveBeenCalled();
  });
});

import { execa } from 'execa';

export interface ToolExecutionOptions {
  command: string;
  args?: string[];
  cwd?: string;
  /** Timeout in milliseconds */
  timeout?: number;
}

export interface ToolExecution {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a linter and captures its output. Linters exit non-zero when they find
 * something, so only a process that could not run at all is an error.
 */
export async function executeTool(options: ToolExecutionOptions): Promise<ToolExecution> {
  const result = await execa(options.command, options.args ?? [], {
    cwd: options.cwd,
    timeout: options.timeout,
    reject: false,
  });

  if (result.exitCode === undefined) {
    const reason = result.timedOut ? 'timed out' : result.stderr || 'process could not be started';
    throw new Error(`Failed to run ${result.command}: ${reason}`);
  }

  return {
    command: result.command,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

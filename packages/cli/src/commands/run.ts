import ora from 'ora';
import { countViolations, parseViolations, resolveExtractor } from '@lintlens/core';
import { loadProjectConfig, resolveSettings, type CommandOptions, type ResolvedSettings } from '../utils/config.js';
import { executeTool } from '../utils/tool-executor.js';
import { logToolAction } from '../utils/tool-logger.js';
import { reportFailure, reportViolations } from './parse.js';

export interface RunOptions extends CommandOptions {
  timeout?: string;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(`Invalid timeout: ${value} (expected a positive number of milliseconds)`);
  }
  return timeout;
}

export async function runCommand(commandParts: string[], options: RunOptions): Promise<void> {
  let settings: ResolvedSettings | null = null;
  let exitCode = 0;
  const spinner = ora();

  try {
    settings = resolveSettings(options, await loadProjectConfig());
    resolveExtractor(settings.format);
    const timeout = parseTimeout(options.timeout);

    const [command, ...args] = commandParts;
    if (!command) {
      throw new Error('No command given to run');
    }

    spinner.start(`Running ${commandParts.join(' ')}...`);
    const execution = await executeTool({ command, args, cwd: process.cwd(), timeout });
    spinner.succeed(`${command} finished with exit code ${execution.exitCode}`);

    const violations = parseViolations(settings.format, execution.stdout, settings.workingRoot);
    exitCode = reportViolations(violations, settings);

    await logToolAction(
      {
        timestamp: new Date().toISOString(),
        format: settings.format,
        action: 'run',
        command: execution.command,
        exitCode: execution.exitCode,
        fileCount: violations.size,
        violationCount: countViolations(violations),
      },
      settings.projectRoot ?? undefined
    );
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Linter run failed');
    }
    await reportFailure(error, 'Run failed', settings);
    exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

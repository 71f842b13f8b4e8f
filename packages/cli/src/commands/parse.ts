import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { countViolations, isFormatKey, parseViolations, resolveExtractor, type ViolationsByPath } from '@lintlens/core';
import { loadProjectConfig, resolveSettings, type CommandOptions, type ResolvedSettings } from '../utils/config.js';
import { renderViolations } from '../utils/output.js';
import { logToolAction } from '../utils/tool-logger.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function readInput(file?: string): Promise<string> {
  if (!file || file === '-') {
    return readStdin();
  }
  const filePath = path.resolve(file);
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Prints the violations and returns the exit code the command should end with.
 */
export function reportViolations(violations: ViolationsByPath, settings: ResolvedSettings): number {
  console.log(renderViolations(violations, settings.output));
  return settings.failOnViolations && countViolations(violations) > 0 ? 1 : 0;
}

export async function reportFailure(error: unknown, label: string, settings: ResolvedSettings | null): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`❌ ${label}:`), message);
  if (error instanceof Error && error.stack && process.env.DEBUG) {
    console.error(chalk.gray(error.stack));
  }
  // An unrecognized format gets no log file of its own
  if (settings && isFormatKey(settings.format)) {
    await logToolAction(
      { timestamp: new Date().toISOString(), format: settings.format, action: 'error', error: message },
      settings.projectRoot ?? undefined
    );
  }
}

export async function parseCommand(file: string | undefined, options: CommandOptions): Promise<void> {
  let settings: ResolvedSettings | null = null;
  let exitCode = 0;

  try {
    settings = resolveSettings(options, await loadProjectConfig());
    // Unknown formats fail before stdin is consumed
    resolveExtractor(settings.format);

    const rawOutput = await readInput(file);
    const violations = parseViolations(settings.format, rawOutput, settings.workingRoot);
    exitCode = reportViolations(violations, settings);

    await logToolAction(
      {
        timestamp: new Date().toISOString(),
        format: settings.format,
        action: 'parse',
        source: file && file !== '-' ? file : 'stdin',
        fileCount: violations.size,
        violationCount: countViolations(violations),
      },
      settings.projectRoot ?? undefined
    );
  } catch (error) {
    await reportFailure(error, 'Parse failed', settings);
    exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

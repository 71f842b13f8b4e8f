import chalk from 'chalk';
import { getToolLogs, type ToolLogEntry } from '../utils/tool-logger.js';

interface LogsOptions {
  limit?: string;
}

function describeEntry(entry: ToolLogEntry): string {
  const date = new Date(entry.timestamp).toLocaleString();
  switch (entry.action) {
    case 'error':
      return `${chalk.gray(date)} ${chalk.red('error')} ${entry.error ?? ''}`;
    case 'run':
      return `${chalk.gray(date)} ${chalk.cyan('run')}   ${entry.command ?? ''} (exit ${entry.exitCode ?? '?'}): ${entry.violationCount ?? 0} violations in ${entry.fileCount ?? 0} files`;
    case 'parse':
      return `${chalk.gray(date)} ${chalk.cyan('parse')} ${entry.source ?? 'stdin'}: ${entry.violationCount ?? 0} violations in ${entry.fileCount ?? 0} files`;
  }
}

function parseLimit(value: string | undefined): number {
  if (value === undefined) {
    return 20;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid limit: ${value} (expected a positive number of entries)`);
  }
  return limit;
}

export async function logsCommand(format: string, options: LogsOptions): Promise<void> {
  try {
    const entries = await getToolLogs(format, parseLimit(options.limit));

    if (entries.length === 0) {
      console.log(chalk.yellow(`No logs found for format: ${format}`));
      return;
    }

    console.log(chalk.blue.bold(`Recent runs for ${format}:`));
    for (const entry of entries) {
      console.log(`  ${describeEntry(entry)}`);
    }
  } catch (error) {
    console.error(chalk.red('❌ Failed to read logs:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

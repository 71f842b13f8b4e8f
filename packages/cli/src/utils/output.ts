import chalk from 'chalk';
import { countViolations, toViolationRecord, type ViolationsByPath } from '@lintlens/core';

export function renderJson(violations: ViolationsByPath): string {
  return JSON.stringify(toViolationRecord(violations), null, 2);
}

/**
 * One block per file, violations in the order the tool reported them.
 */
export function renderTable(violations: ViolationsByPath): string {
  const total = countViolations(violations);
  if (violations.size === 0) {
    return chalk.green('✅ No violations found');
  }

  const lines: string[] = [];
  for (const [filePath, fileViolations] of violations) {
    lines.push(chalk.underline(filePath));
    if (fileViolations.length === 0) {
      lines.push(chalk.gray('  no violations'));
    }
    for (const v of fileViolations) {
      const location = `${v.line}:${v.column}`.padEnd(9);
      lines.push(`  ${chalk.gray(location)} ${chalk.yellow(v.code)}  ${v.message}`);
    }
    lines.push('');
  }

  const summary = `${total} violation${total === 1 ? '' : 's'} in ${violations.size} file${violations.size === 1 ? '' : 's'}`;
  lines.push(total > 0 ? chalk.red(`✖ ${summary}`) : chalk.green(`✅ ${summary}`));
  return lines.join('\n');
}

export function renderViolations(violations: ViolationsByPath, output: 'table' | 'json'): string {
  return output === 'json' ? renderJson(violations) : renderTable(violations);
}

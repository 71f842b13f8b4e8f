import chalk from 'chalk';
import { listFormats } from '@lintlens/core';

export function formatsCommand(): void {
  console.log(chalk.blue.bold('Supported formats:'));
  for (const { key, description } of listFormats()) {
    console.log(`  ${chalk.white(key.padEnd(12))} ${chalk.gray(description)}`);
  }
}

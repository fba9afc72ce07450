/**
 * Output Formatter
 *
 * Console output for the admin commands. Errors go to stderr.
 */

import chalk from 'chalk';
import { AdSyncError } from '@adsync/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: string | number): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

/**
 * Error text for the user. Taxonomy errors are shown with their kind.
 */
export function describeError(error: unknown): string {
  if (error instanceof AdSyncError) {
    return `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export interface FileSummary {
  file: string;
  created: number;
  updated: number;
  failed: number;
  failures: { index: number; message: string }[];
  error?: string;
}

/**
 * One line per imported file, then one line per failed entry.
 */
export function printFileSummary(summary: FileSummary): void {
  if (summary.error) {
    printWarning(`${summary.file}: skipped (${summary.error})`);
    return;
  }

  const counts = `${summary.created} created, ${summary.updated} updated, ${summary.failed} failed`;
  if (summary.failed > 0) {
    printWarning(`${summary.file}: ${counts}`);
  } else {
    printSuccess(`${summary.file}: ${counts}`);
  }
  for (const failure of summary.failures) {
    console.error(`  ${chalk.red(`#${failure.index}`)} ${failure.message}`);
  }
}

/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { MergeStats } from '@pack-merger/core';
import type { PlannedAction } from '@pack-merger/merge';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

export function formatPlannedAction(action: PlannedAction, outputRoot: string): string {
  const target = action.target || outputRoot;
  const from = action.source ? ` (from ${action.source})` : '';
  return `[dry-run] Would ${action.kind} ${target}${from}`;
}

export function printStats(stats: Readonly<MergeStats>): void {
  printHeader('Summary');
  printKeyValue('Copied', stats.copied);
  printKeyValue('Overwritten', stats.overwritten);
  printKeyValue('Merged JSON', stats.mergedJson);
  printKeyValue('Skipped', stats.skipped);
  printKeyValue('Errors', stats.errors > 0 ? chalk.red(stats.errors) : stats.errors);
}

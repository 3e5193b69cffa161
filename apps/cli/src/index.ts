#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for pack-merger.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { PackMergeError } from '@pack-merger/core';
import { loadCliConfig, type CliConfig } from './config/index.js';
import { mergeCommand, type MergeCommandOptions } from './commands/merge.js';
import { listCommand } from './commands/list.js';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function buildProgram(config: CliConfig): Command {
  const program = new Command();

  program
    .name('pack-merger')
    .description('Merge resource packs into one pack with controlled priority')
    .version('1.0.0');

  // ============================================
  // MERGE
  // ============================================

  program
    .command('merge', { isDefault: true })
    .description('Merge packs (lowest -> highest priority); autodetects packs in the current directory when none are given')
    .argument('[packs...]', 'Pack directories or zip files')
    .option('-o, --output <dir>', 'Output directory for the merged pack', config.defaultOutput)
    .option('--dry-run', "Don't write files; just print planned actions")
    .option('--clean', 'Remove output directory before merging')
    .option('--summary', 'Print a summary of actions at the end')
    .option('--exclude <glob>', 'Glob pattern to exclude files (repeatable)', collect, [])
    .option('--pack-format <number>', 'Override pack_format for the generated descriptor', parseInteger)
    .option('--description <text>', 'Override description for the generated descriptor')
    .option('--zip', 'Also create <output>.zip of the merged pack')
    .option('--order <names...>', 'Priority order by pack name; unnamed packs are appended')
    .option('--scratch <dir>', 'Where zip inputs are expanded (default: a temporary directory)')
    .option('--json', 'Output in JSON format')
    .action(async (packs: string[], options: MergeCommandOptions) => {
      process.exitCode = await mergeCommand(packs, options);
    });

  // ============================================
  // LIST
  // ============================================

  program
    .command('list [root]')
    .description('List packs that autodetect would merge')
    .option('--json', 'Output in JSON format')
    .action(async (root: string | undefined, options: { json?: boolean }) => {
      process.exitCode = await listCommand(root, options);
    });

  return program;
}

async function main(): Promise<void> {
  let config: CliConfig;
  try {
    config = loadCliConfig();
  } catch (error) {
    if (error instanceof PackMergeError) {
      console.error(chalk.red('Invalid environment configuration:'), error.message);
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }

  await buildProgram(config).parseAsync();
}

main().catch((error: unknown) => {
  console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});

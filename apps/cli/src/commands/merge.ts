/**
 * Merge Command
 *
 * Merge packs into one output pack, lowest to highest priority.
 */

import ora from 'ora';
import chalk from 'chalk';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { createLogger, removeDir, type Logger } from '@pack-merger/utils';
import {
  NoPackagesError,
  PackMergeError,
  createMergeConfig,
  type PackInfo,
} from '@pack-merger/core';
import { discover, loadInfo, orderPackages, resolveInputs } from '@pack-merger/discovery';
import { MergeEngine, type MergeResult } from '@pack-merger/merge';
import { Packager, defaultArchivePath, type PackageResult } from '@pack-merger/packaging';
import {
  formatPlannedAction,
  printError,
  printHeader,
  printJson,
  printStats,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export interface MergeCommandOptions {
  output: string;
  dryRun?: boolean;
  clean?: boolean;
  summary?: boolean;
  exclude?: string[];
  packFormat?: number;
  description?: string;
  zip?: boolean;
  scratch?: string;
  order?: string[];
  json?: boolean;
}

export interface CommandContext {
  cwd: string;
  logger: Logger;
}

function defaultContext(): CommandContext {
  return { cwd: process.cwd(), logger: createLogger({ component: 'cli' }) };
}

async function collectPacks(
  inputs: string[],
  options: MergeCommandOptions,
  scratchDir: string,
  context: CommandContext
): Promise<PackInfo[]> {
  const discoveryOptions = { scratchDir, logger: context.logger };
  const found = inputs.length > 0
    ? await resolveInputs(inputs.map((input) => resolve(context.cwd, input)), discoveryOptions)
    : await discover(context.cwd, discoveryOptions);

  if (found.length === 0) {
    throw new NoPackagesError(
      inputs.length > 0
        ? 'None of the given inputs is a usable pack'
        : 'No packs provided and none autodetected'
    );
  }

  const ordered = options.order && options.order.length > 0
    ? orderPackages(found, options.order, context.logger)
    : found;

  const packs: PackInfo[] = [];
  for (const pack of ordered) {
    packs.push(await loadInfo(pack.path, pack.name, context.logger));
  }
  return packs;
}

function printPriority(packs: readonly PackInfo[]): void {
  printHeader('Merging packs with priority (lowest -> highest)');
  packs.forEach((pack, index) => {
    const format = pack.declaredFormat ?? '?';
    console.log(`  ${chalk.cyan(`${index + 1}.`)} ${pack.name} ${chalk.gray(`(pack_format=${format})`)}`);
  });
}

/**
 * Run a merge and return the process exit code
 */
export async function mergeCommand(
  inputs: string[],
  options: MergeCommandOptions,
  context: CommandContext = defaultContext()
): Promise<number> {
  const ownsScratch = options.scratch === undefined;
  const scratchDir = options.scratch === undefined
    ? await mkdtemp(join(tmpdir(), 'pack-merger-'))
    : resolve(context.cwd, options.scratch);
  const spinner = options.json ? null : ora('Collecting packs...');

  try {
    spinner?.start();
    const packs = await collectPacks(inputs, options, scratchDir, context);
    spinner?.stop();

    if (!options.json) printPriority(packs);

    const config = createMergeConfig({
      outputRoot: resolve(context.cwd, options.output),
      dryRun: options.dryRun ?? false,
      clean: options.clean ?? false,
      excludePatterns: options.exclude ?? [],
      formatOverride: options.packFormat,
      descriptionOverride: options.description,
    });

    spinner?.start('Merging...');
    const result: MergeResult = await new MergeEngine(config, context.logger).run(packs);
    spinner?.stop();

    let archive: PackageResult | undefined;
    if (options.zip && !config.dryRun) {
      spinner?.start('Creating zip...');
      archive = await new Packager({ logger: context.logger }).package(
        config.outputRoot,
        defaultArchivePath(config.outputRoot)
      );
      spinner?.stop();
    }

    if (options.json) {
      printJson({ ...result, packs: packs.map((pack) => pack.name), archive });
      return 0;
    }

    for (const action of result.plannedActions) {
      console.log(formatPlannedAction(action, result.outputRoot));
    }
    if (options.summary) printStats(result.stats);

    if (archive) {
      if (archive.success) {
        printSuccess(`Created zip: ${archive.archivePath}`);
      } else {
        printWarning(`Could not create zip: ${archive.error ?? 'unknown error'}`);
      }
    }

    if (result.stats.errors > 0) {
      printWarning(`Merged into ${result.outputRoot} with ${result.stats.errors} error(s)`);
    } else {
      printSuccess(config.dryRun ? 'Dry run complete' : `Merged into ${result.outputRoot}`);
    }
    return 0;
  } catch (error) {
    spinner?.stop();
    if (error instanceof PackMergeError) {
      printError(error.message);
      return error.exitCode;
    }
    throw error;
  } finally {
    if (ownsScratch) {
      await removeDir(scratchDir);
    }
  }
}

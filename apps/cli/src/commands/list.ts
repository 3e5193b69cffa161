/**
 * List Command
 *
 * Show the packs autodetect would merge, in default priority order.
 */

import chalk from 'chalk';
import { resolve } from 'node:path';
import { createLogger } from '@pack-merger/utils';
import { discover, loadInfo } from '@pack-merger/discovery';
import type { PackInfo } from '@pack-merger/core';
import { printHeader, printInfo, printJson } from '../lib/output.js';

interface ListOptions {
  json?: boolean;
}

export async function listCommand(
  root: string | undefined,
  options: ListOptions,
  cwd: string = process.cwd()
): Promise<number> {
  const logger = createLogger({ component: 'cli' });
  const found = await discover(resolve(cwd, root ?? '.'), { logger });

  const packs: PackInfo[] = [];
  for (const pack of found) {
    packs.push(await loadInfo(pack.path, pack.name, logger));
  }

  if (options.json) {
    printJson(packs);
    return 0;
  }

  if (packs.length === 0) {
    printInfo('No packs found');
    return 0;
  }

  printHeader(`Packs (${packs.length})`);
  packs.forEach((pack, index) => {
    const format = pack.declaredFormat ?? '?';
    const icon = pack.hasIcon ? chalk.green('icon') : chalk.gray('no icon');
    console.log(`  ${chalk.cyan(`${index + 1}.`)} ${pack.name} ${chalk.gray(`(pack_format=${format})`)} ${icon}`);
    if (pack.description) {
      console.log(`     ${chalk.gray(pack.description)}`);
    }
  });
  return 0;
}

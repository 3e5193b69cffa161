/**
 * Pack Discovery
 *
 * Locates candidate packages under a root directory (plain directories and
 * zip archives) and resolves explicitly named inputs. One broken candidate
 * never aborts discovery; it is logged and left out.
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { createLogger, pathExists, type Logger } from '@pack-merger/utils';
import {
  NESTED_SEARCH_DEPTH,
  PackNotFoundError,
  RESERVED_OUTPUT_PREFIX,
  toError,
  type DiscoveredPackage,
} from '@pack-merger/core';
import { isValidPackage } from './validator.js';
import { archiveStem, expandArchivePackage, isArchiveName } from './archive.js';
import { sortByName } from './ordering.js';

export interface DiscoveryOptions {
  /** Where archives are expanded. Archives are ignored without one. */
  scratchDir?: string;
  /** Candidates whose name starts with this are a previous run's output */
  reservedPrefix?: string;
  nestedSearchDepth?: number;
  logger?: Logger;
}

interface ResolvedDiscoveryOptions {
  scratchDir?: string;
  reservedPrefix: string;
  nestedSearchDepth: number;
  log: Logger;
}

function resolveOptions(options: DiscoveryOptions): ResolvedDiscoveryOptions {
  return {
    scratchDir: options.scratchDir,
    reservedPrefix: options.reservedPrefix ?? RESERVED_OUTPUT_PREFIX,
    nestedSearchDepth: options.nestedSearchDepth ?? NESTED_SEARCH_DEPTH,
    log: options.logger ?? createLogger({ component: 'pack-discovery' }),
  };
}

async function discoverArchive(
  archivePath: string,
  options: ResolvedDiscoveryOptions
): Promise<DiscoveredPackage | null> {
  if (options.scratchDir === undefined) return null;

  const expanded = await expandArchivePackage(
    archivePath,
    options.scratchDir,
    options.nestedSearchDepth
  );

  if (!expanded.ok) {
    options.log.warn({ archive: archivePath, err: expanded.error.message }, 'Skipping unreadable archive');
    return null;
  }
  if (expanded.value === null) {
    options.log.warn({ archive: archivePath }, 'Archive does not contain a valid pack');
    return null;
  }

  return {
    path: expanded.value,
    name: archiveStem(basename(archivePath)),
    source: 'archive',
    archivePath,
  };
}

/**
 * Find every package directly under `root`, sorted case-insensitively by name
 */
export async function discover(
  root: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveredPackage[]> {
  const resolved = resolveOptions(options);
  const found: DiscoveredPackage[] = [];
  const entries = await readdir(root, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(root, entry.name);

    try {
      if (entry.isDirectory()) {
        if (entry.name.startsWith(resolved.reservedPrefix)) continue;
        if (await isValidPackage(fullPath)) {
          found.push({ path: fullPath, name: entry.name, source: 'directory' });
        }
      } else if (entry.isFile() && isArchiveName(entry.name)) {
        if (archiveStem(entry.name).startsWith(resolved.reservedPrefix)) continue;
        const pack = await discoverArchive(fullPath, resolved);
        if (pack) found.push(pack);
      }
    } catch (error) {
      resolved.log.warn({ path: fullPath, err: toError(error).message }, 'Skipping unreadable entry');
    }
  }

  return sortByName(found);
}

/**
 * Turn explicitly named inputs into packages, keeping the given order.
 * Every missing path is reported at once, before anything else happens.
 */
export async function resolveInputs(
  paths: readonly string[],
  options: DiscoveryOptions = {}
): Promise<DiscoveredPackage[]> {
  const resolved = resolveOptions(options);
  const absolute = paths.map((p) => resolve(p));

  const missing: string[] = [];
  for (const path of absolute) {
    if (!(await pathExists(path))) missing.push(path);
  }
  if (missing.length > 0) {
    throw new PackNotFoundError(missing);
  }

  const packages: DiscoveredPackage[] = [];
  for (const path of absolute) {
    const info = await stat(path);

    if (info.isDirectory()) {
      if (!(await isValidPackage(path))) {
        resolved.log.warn({ path }, 'Input has no valid pack descriptor; merging its payload anyway');
      }
      packages.push({ path, name: basename(path), source: 'directory' });
    } else if (isArchiveName(path)) {
      if (resolved.scratchDir === undefined) {
        resolved.log.warn({ path }, 'No scratch directory for archive input; skipping');
        continue;
      }
      const pack = await discoverArchive(path, resolved);
      if (pack) packages.push(pack);
    } else {
      resolved.log.warn({ path }, 'Input is neither a directory nor a zip archive; skipping');
    }
  }

  return packages;
}

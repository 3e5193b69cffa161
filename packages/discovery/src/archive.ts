/**
 * Archive Expansion
 *
 * Expands zip archives into a scratch directory and locates the package root
 * inside them, including packages wrapped in extra top-level folders.
 */

import { mkdtemp, readFile, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { unzipSync } from 'fflate';
import {
  ensureDir,
  getBasename,
  resolveInside,
  safeWriteFile,
} from '@pack-merger/utils';
import {
  ArchiveError,
  NESTED_SEARCH_DEPTH,
  err,
  ok,
  toError,
  type Result,
} from '@pack-merger/core';
import { isValidPackage } from './validator.js';

export const ARCHIVE_EXTENSIONS = ['.zip'] as const;

export function isArchiveName(filename: string): boolean {
  const lower = filename.toLowerCase();
  return ARCHIVE_EXTENSIONS.some((ext) => lower.endsWith(ext) && lower.length > ext.length);
}

/**
 * Name of the package an archive holds: its filename without extension
 */
export function archiveStem(filename: string): string {
  return getBasename(filename);
}

/**
 * Unpack every entry of a zip archive into `destination`, which should be new
 * or empty. Entries that would land outside `destination` reject the whole archive.
 */
export async function extractArchive(
  archivePath: string,
  destination: string
): Promise<Result<string, ArchiveError>> {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(new Uint8Array(await readFile(archivePath)));
  } catch (error) {
    return err(new ArchiveError(archivePath, toError(error).message));
  }

  const targets: Array<{ target: string; data: Uint8Array; isDir: boolean }> = [];
  for (const [entryName, data] of Object.entries(entries)) {
    const target = resolveInside(destination, entryName);
    if (target === null) {
      return err(new ArchiveError(archivePath, `entry escapes extraction root: ${entryName}`));
    }
    targets.push({ target, data, isDir: entryName.endsWith('/') });
  }

  try {
    await ensureDir(destination);
    for (const { target, data, isDir } of targets) {
      if (isDir) {
        await ensureDir(target);
      } else {
        await safeWriteFile(target, data);
      }
    }
  } catch (error) {
    return err(new ArchiveError(archivePath, toError(error).message));
  }

  return ok(destination);
}

async function childDirectories(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Depth-first search below `root` for the first valid package directory.
 * Candidates are checked down to `maxDepth` levels below `root`; siblings are
 * visited in name order and a directory's subtree before its next sibling.
 */
export async function findNestedPackage(
  root: string,
  maxDepth: number = NESTED_SEARCH_DEPTH
): Promise<string | null> {
  if (maxDepth <= 0) return null;

  const frontier: Array<{ dir: string; depth: number }> = [];
  const pushChildren = async (dir: string, depth: number): Promise<void> => {
    const children = await childDirectories(dir);
    for (const child of children.reverse()) {
      frontier.push({ dir: child, depth });
    }
  };

  await pushChildren(root, 1);

  let next = frontier.pop();
  while (next !== undefined) {
    if (await isValidPackage(next.dir)) {
      return next.dir;
    }
    if (next.depth < maxDepth) {
      await pushChildren(next.dir, next.depth + 1);
    }
    next = frontier.pop();
  }

  return null;
}

/**
 * Expand an archive into a fresh `scratchDir/<stem>-XXXXXX` directory and
 * return the package root it holds
 */
export async function expandArchivePackage(
  archivePath: string,
  scratchDir: string,
  maxDepth: number = NESTED_SEARCH_DEPTH
): Promise<Result<string | null, ArchiveError>> {
  let destination: string;
  try {
    await ensureDir(scratchDir);
    destination = await mkdtemp(join(scratchDir, `${archiveStem(basename(archivePath))}-`));
  } catch (error) {
    return err(new ArchiveError(archivePath, toError(error).message));
  }

  const extracted = await extractArchive(archivePath, destination);
  if (!extracted.ok) return extracted;

  const root = extracted.value;
  if (await isValidPackage(root)) {
    return ok(root);
  }

  try {
    return ok(await findNestedPackage(root, maxDepth));
  } catch (error) {
    return err(new ArchiveError(archivePath, toError(error).message));
  }
}

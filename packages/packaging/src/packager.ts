/**
 * Packager
 *
 * Archives a finished output tree into a single zip file.
 */

import { readFile, rm, stat } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import { zipSync, type Zippable } from 'fflate';
import {
  createLogger,
  listFilesRecursive,
  safeWriteFile,
  toSegments,
  type Logger,
} from '@pack-merger/utils';
import { toError } from '@pack-merger/core';

export interface PackageResult {
  success: boolean;
  archivePath: string;
  fileCount: number;
  /** Uncompressed bytes */
  totalSize: number;
  error?: string;
}

export interface PackagerOptions {
  /** Deflate level, 0-9 */
  level?: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
  logger?: Logger;
}

/**
 * Default archive location: `<tree>.zip` beside the tree
 */
export function defaultArchivePath(treeDir: string): string {
  return `${resolve(treeDir)}.zip`;
}

function isInside(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

export class Packager {
  private readonly log: Logger;
  private readonly level: NonNullable<PackagerOptions['level']>;

  constructor(options: PackagerOptions = {}) {
    this.log = options.logger ?? createLogger({ component: 'packager' });
    this.level = options.level ?? 6;
  }

  /**
   * Zip every file below `treeDir` into `archivePath`, replacing any existing archive
   */
  async package(treeDir: string, archivePath: string = defaultArchivePath(treeDir)): Promise<PackageResult> {
    const root = resolve(treeDir);
    const target = resolve(archivePath);

    try {
      if (isInside(root, target)) {
        throw new Error('Archive path must not be inside the tree being archived');
      }

      const files = await listFilesRecursive(root);
      const entries: Zippable = {};
      let totalSize = 0;

      for (const relativePath of files) {
        const fullPath = join(root, ...toSegments(relativePath));
        const [data, info] = await Promise.all([readFile(fullPath), stat(fullPath)]);
        entries[relativePath] = [new Uint8Array(data), { mtime: info.mtime }];
        totalSize += data.byteLength;
      }

      const archive = zipSync(entries, { level: this.level });
      await rm(target, { force: true });
      await safeWriteFile(target, archive);

      this.log.info({ archive: target, files: files.length, totalSize }, 'Created archive');

      return {
        success: true,
        archivePath: target,
        fileCount: files.length,
        totalSize,
      };
    } catch (error) {
      const message = toError(error).message;
      this.log.error({ archive: target, err: message }, 'Failed to create archive');
      return {
        success: false,
        archivePath: target,
        fileCount: 0,
        totalSize: 0,
        error: message,
      };
    }
  }
}

/**
 * File Operations
 *
 * Filesystem helpers with explicit "absent" results instead of ENOENT throws.
 */

import {
  mkdir,
  writeFile,
  readFile,
  stat,
  rm,
  readdir,
} from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Uint8Array
): Promise<void> {
  await ensureDir(dirname(filePath));
  if (typeof content === 'string') {
    await writeFile(filePath, content, 'utf8');
  } else {
    await writeFile(filePath, content);
  }
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}

/**
 * List every regular file below a directory, as paths relative to `baseDir`
 * joined with forward slashes. Entries are visited in name order.
 */
export async function listFilesRecursive(dir: string, baseDir: string = dir): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath, baseDir)));
    } else if (entry.isFile()) {
      files.push(toPosixRelative(baseDir, fullPath));
    }
  }

  return files;
}

function toPosixRelative(baseDir: string, fullPath: string): string {
  return relative(baseDir, fullPath).split(/[\\/]+/).join('/');
}

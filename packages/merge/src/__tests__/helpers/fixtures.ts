import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import type { PackInfo } from '@pack-merger/core';

export type TreeSpec = Record<string, string | Uint8Array>;

export async function writeTree(root: string, files: TreeSpec): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, ...relativePath.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/**
 * Write a pack directory under `root` and describe it the way the loader would
 */
export async function createPack(
  root: string,
  name: string,
  files: TreeSpec,
  meta: { declaredFormat?: number; description?: string } = {}
): Promise<PackInfo> {
  const path = join(root, name);
  await writeTree(path, {
    'pack.mcmeta': JSON.stringify({ pack: { pack_format: meta.declaredFormat, description: meta.description } }),
    ...files,
  });
  return {
    path,
    name,
    hasIcon: 'pack.png' in files,
    ...meta,
  };
}

/**
 * Every file under `dir` with its content, keyed by `/`-separated relative path
 */
export async function readTree(dir: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        out[relative(dir, full).split(/[\\/]/).join('/')] = await readFile(full, 'utf8');
      }
    }
  };
  await walk(dir);
  return out;
}

export const json = (value: unknown): string => JSON.stringify(value);

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { strToU8, zipSync, type Zippable } from 'fflate';

export type TreeSpec = Record<string, string | Uint8Array>;

export async function writeTree(root: string, files: TreeSpec): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, ...relativePath.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function descriptor(format: unknown, description?: unknown): string {
  return JSON.stringify({ pack: { pack_format: format, description } });
}

export function zipOf(files: TreeSpec): Uint8Array {
  const entries: Zippable = {};
  for (const [path, content] of Object.entries(files)) {
    entries[path] = typeof content === 'string' ? strToU8(content) : content;
  }
  return zipSync(entries);
}

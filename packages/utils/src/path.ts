/**
 * Path Utilities
 */

import { extname, basename, resolve, sep } from 'node:path';

/**
 * Split a relative path into segments, accepting either separator
 */
export function toSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/**
 * Get file extension as written, without the dot
 */
export function getExtension(filename: string): string {
  return extname(filename).replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Resolve `child` under `root`, or return null when it would escape it
 */
export function resolveInside(root: string, child: string): string | null {
  const base = resolve(root);
  const target = resolve(base, child);
  if (target !== base && !target.startsWith(base + sep)) {
    return null;
  }
  return target;
}

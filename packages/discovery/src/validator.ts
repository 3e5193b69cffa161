/**
 * Pack Validator
 *
 * A directory is a package when its descriptor parses and holds a `pack` object.
 */

import { join } from 'node:path';
import { readFile } from 'node:fs/promises';
import { isObject, parseJsonText } from '@pack-merger/utils';
import { DESCRIPTOR_FILE } from '@pack-merger/core';

/**
 * Check whether a parsed descriptor has the expected top-level shape
 */
export function hasDescriptorShape(document: unknown): boolean {
  return isObject(document) && isObject(document['pack']);
}

export async function isValidPackage(path: string): Promise<boolean> {
  try {
    const text = await readFile(join(path, DESCRIPTOR_FILE), 'utf8');
    return hasDescriptorShape(parseJsonText(text));
  } catch {
    // missing directory, missing descriptor, unreadable or malformed JSON
    return false;
  }
}

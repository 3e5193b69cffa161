/**
 * Pack Loader
 *
 * Reads summary metadata from a package. Never throws for a missing or
 * malformed descriptor: the affected fields are left absent instead.
 */

import { basename, join } from 'node:path';
import {
  createLogger,
  isDefined,
  isFile,
  isInteger,
  isObject,
  isString,
  parseJsonText,
  safeReadFile,
  type Logger,
} from '@pack-merger/utils';
import { DESCRIPTOR_FILE, ICON_FILE, toError, type PackInfo } from '@pack-merger/core';

interface DescriptorFields {
  declaredFormat?: number;
  description?: string;
}

export function describeValue(value: unknown): string {
  return isString(value) ? value : JSON.stringify(value);
}

/**
 * Pull the format version and description out of a parsed descriptor
 */
export function readDescriptorFields(document: unknown): DescriptorFields {
  if (!isObject(document)) return {};
  const pack = document['pack'];
  if (!isObject(pack)) return {};

  const format = pack['pack_format'];
  const description = pack['description'];

  return {
    declaredFormat: isInteger(format) ? format : undefined,
    description: isDefined(description) ? describeValue(description) : undefined,
  };
}

async function readDescriptor(path: string, log: Logger): Promise<unknown> {
  const descriptorPath = join(path, DESCRIPTOR_FILE);
  try {
    const text = await safeReadFile(descriptorPath);
    return text === null ? null : parseJsonText(text);
  } catch (error) {
    log.warn({ path: descriptorPath, err: toError(error).message }, 'Failed to parse pack descriptor');
    return null;
  }
}

export async function loadInfo(
  path: string,
  name: string = basename(path),
  log: Logger = createLogger({ component: 'pack-loader' })
): Promise<PackInfo> {
  const fields = readDescriptorFields(await readDescriptor(path, log));

  const info: PackInfo = {
    path,
    name,
    declaredFormat: fields.declaredFormat,
    description: fields.description,
    hasIcon: await isFile(join(path, ICON_FILE)),
  };

  return Object.freeze(info);
}

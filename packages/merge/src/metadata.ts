/**
 * Metadata Synthesizer
 *
 * Builds the output descriptor and picks the icon to carry over.
 */

import { join } from 'node:path';
import {
  DESCRIPTOR_FILE,
  ICON_FILE,
  MetadataWriteError,
  err,
  ok,
  toError,
  type MergeConfig,
  type PackDescriptor,
  type PackInfo,
  type Result,
} from '@pack-merger/core';
import type { OutputTree } from './outputTree.js';

export const DESCRIPTION_PREFIX = 'Merged: ';
export const DESCRIPTION_SEPARATOR = ' + ';

export interface MetadataPlan {
  descriptor: PackDescriptor;
  /** Highest-priority pack that ships an icon */
  iconSource: PackInfo | null;
}

type MetadataOptions = Pick<MergeConfig, 'formatOverride' | 'descriptionOverride' | 'defaultFormat'>;

export function mergedFormat(packages: readonly PackInfo[], options: MetadataOptions): number {
  if (options.formatOverride !== undefined) return options.formatOverride;

  const declared = packages
    .map((pack) => pack.declaredFormat)
    .filter((format): format is number => format !== undefined);

  return declared.length > 0 ? Math.max(...declared) : options.defaultFormat;
}

export function mergedDescription(packages: readonly PackInfo[], override?: string): string {
  if (override !== undefined && override.length > 0) return override;
  return DESCRIPTION_PREFIX + packages.map((pack) => pack.name).join(DESCRIPTION_SEPARATOR);
}

export function selectIconSource(packages: readonly PackInfo[]): PackInfo | null {
  for (let i = packages.length - 1; i >= 0; i--) {
    const pack = packages[i];
    if (pack?.hasIcon) return pack;
  }
  return null;
}

export function synthesizeMetadata(
  packages: readonly PackInfo[],
  options: MetadataOptions
): MetadataPlan {
  return {
    descriptor: {
      pack: {
        pack_format: mergedFormat(packages, options),
        description: mergedDescription(packages, options.descriptionOverride),
      },
    },
    iconSource: selectIconSource(packages),
  };
}

type MetadataWrite = Result<string, MetadataWriteError>;

async function attempt(relativePath: string, write: () => Promise<void>): Promise<MetadataWrite> {
  try {
    await write();
    return ok(relativePath);
  } catch (error) {
    return err(new MetadataWriteError(relativePath, toError(error)));
  }
}

/**
 * Write the descriptor and copy the selected icon into the output tree.
 * Each write reports its own outcome.
 */
export async function writeMetadata(tree: OutputTree, plan: MetadataPlan): Promise<MetadataWrite[]> {
  const outcomes = [
    await attempt(DESCRIPTOR_FILE, () =>
      tree.writeJson(DESCRIPTOR_FILE, plan.descriptor, { kind: 'write-descriptor', target: DESCRIPTOR_FILE })
    ),
  ];

  if (plan.iconSource) {
    const source = join(plan.iconSource.path, ICON_FILE);
    outcomes.push(
      await attempt(ICON_FILE, () =>
        tree.copyFrom(ICON_FILE, source, { kind: 'copy-icon', target: ICON_FILE, source })
      )
    );
  }

  return outcomes;
}

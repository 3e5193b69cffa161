/**
 * Merge Configuration
 *
 * Per-run options, validated once and frozen before any component sees them.
 */

import { z } from 'zod';
import { resolve } from 'node:path';
import { ValidationError } from '../errors/index.js';

export const DEFAULT_EXCLUDES = ['.DS_Store', 'Thumbs.db', 'desktop.ini'] as const;
export const DEFAULT_PACK_FORMAT = 15;
export const RESERVED_OUTPUT_PREFIX = 'merged_pack';
export const NESTED_SEARCH_DEPTH = 3;

export const mergeConfigSchema = z.object({
  outputRoot: z.string().min(1),
  dryRun: z.boolean().default(false),
  clean: z.boolean().default(false),
  excludePatterns: z.array(z.string().min(1)).default([]),
  formatOverride: z.number().int().min(0).optional(),
  descriptionOverride: z.string().optional(),
  reservedPrefix: z.string().default(RESERVED_OUTPUT_PREFIX),
  defaultExcludes: z.array(z.string()).default([...DEFAULT_EXCLUDES]),
  nestedSearchDepth: z.number().int().min(0).default(NESTED_SEARCH_DEPTH),
  defaultFormat: z.number().int().min(0).default(DEFAULT_PACK_FORMAT),
});

export type MergeConfigInput = z.input<typeof mergeConfigSchema>;

export type MergeConfig = Readonly<
  Omit<z.output<typeof mergeConfigSchema>, 'excludePatterns' | 'defaultExcludes'> & {
    excludePatterns: readonly string[];
    defaultExcludes: readonly string[];
  }
>;

/**
 * Validate raw options into an immutable config. The output root is made absolute.
 */
export function createMergeConfig(input: MergeConfigInput): MergeConfig {
  const parsed = mergeConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  const data = parsed.data;
  return Object.freeze({
    ...data,
    outputRoot: resolve(data.outputRoot),
    excludePatterns: Object.freeze([...data.excludePatterns]),
    defaultExcludes: Object.freeze([...data.defaultExcludes]),
  });
}

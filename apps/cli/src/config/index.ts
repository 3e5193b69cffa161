/**
 * CLI Configuration
 */

import { z } from 'zod';
import { ValidationError, RESERVED_OUTPUT_PREFIX } from '@pack-merger/core';

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PACK_MERGER_OUTPUT: z.string().min(1).default(RESERVED_OUTPUT_PREFIX),
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  defaultOutput: string;
}

export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    throw new ValidationError(issue?.path.join('.') || 'environment', issue?.message ?? 'invalid value');
  }

  const parsed = parseResult.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    defaultOutput: parsed.PACK_MERGER_OUTPUT,
  };
}

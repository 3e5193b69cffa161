/**
 * @pack-merger/core
 *
 * Core package containing:
 * - Shared domain types
 * - Error handling
 * - Run configuration
 */

// Types
export type {
  PackInfo,
  PackSource,
  DiscoveredPackage,
  PackDescriptor,
  NamespaceRoot,
} from './types/pack.js';

export {
  DESCRIPTOR_FILE,
  ICON_FILE,
  NAMESPACE_ROOTS,
} from './types/pack.js';

export {
  createMergeStats,
  type MergeStats,
  type MergeOutcome,
} from './types/stats.js';

export {
  ok,
  err,
  toError,
  type Result,
} from './types/result.js';

// Errors
export {
  PackMergeError,
  ValidationError,
  PackNotFoundError,
  NoPackagesError,
  ArchiveError,
  MergeFileError,
  MetadataWriteError,
} from './errors/index.js';

// Configuration
export {
  mergeConfigSchema,
  createMergeConfig,
  DEFAULT_EXCLUDES,
  DEFAULT_PACK_FORMAT,
  RESERVED_OUTPUT_PREFIX,
  NESTED_SEARCH_DEPTH,
  type MergeConfig,
  type MergeConfigInput,
} from './config/merge.js';

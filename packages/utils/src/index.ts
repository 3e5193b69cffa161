/**
 * @pack-merger/utils
 *
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - JSON text helpers
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  pathExists,
  isDirectory,
  isFile,
  removeDir,
  listFilesRecursive,
} from './file.js';

// Path utilities
export {
  toSegments,
  getExtension,
  getBasename,
  resolveInside,
} from './path.js';

// JSON text
export {
  parseJsonText,
  stringifyJson,
  type JsonPrimitive,
  type JsonObject,
  type JsonValue,
} from './json.js';

// Type guards
export {
  isString,
  isObject,
  isDefined,
  isInteger,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';

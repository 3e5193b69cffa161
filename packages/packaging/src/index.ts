/**
 * @pack-merger/packaging
 *
 * Output packaging layer.
 *
 * Responsibilities:
 * - Archive a finished output tree into a single zip file
 */

export {
  Packager,
  defaultArchivePath,
  type PackageResult,
  type PackagerOptions,
} from './packager.js';

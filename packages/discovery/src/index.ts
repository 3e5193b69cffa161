/**
 * @pack-merger/discovery
 *
 * Input side of a merge run.
 *
 * Responsibilities:
 * - Decide whether a directory is a pack
 * - Load pack summaries
 * - Locate packs in directories and zip archives
 * - Apply priority ordering
 */

export { isValidPackage, hasDescriptorShape } from './validator.js';
export { loadInfo, readDescriptorFields } from './loader.js';
export {
  extractArchive,
  expandArchivePackage,
  findNestedPackage,
  isArchiveName,
  archiveStem,
} from './archive.js';
export { discover, resolveInputs, type DiscoveryOptions } from './discovery.js';
export { orderPackages, sortByName, compareNames } from './ordering.js';

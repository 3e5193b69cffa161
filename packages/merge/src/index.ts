/**
 * @pack-merger/merge
 *
 * The merge engine.
 *
 * Responsibilities:
 * - Classify pack-relative paths
 * - Merge structured files by category, copy everything else last-wins
 * - Synthesize the output descriptor and icon
 * - Track per-run statistics
 */

export { MergeEngine, compileExcludePattern, listPayloadFiles, type MergeResult } from './engine.js';
export {
  classifyPath,
  type PathCategory,
  type StructuredCategory,
} from './classifier.js';
export {
  COMBINATORS,
  mergeKeys,
  mergeListField,
  mergeTagList,
  type Combinator,
} from './strategies.js';
export { dedupeStructural, canonicalJson, structuralKey } from './dedupe.js';
export { toNode, asObject, getList, getBoolean, type JsonNode } from './json.js';
export {
  synthesizeMetadata,
  writeMetadata,
  mergedFormat,
  mergedDescription,
  selectIconSource,
  DESCRIPTION_PREFIX,
  DESCRIPTION_SEPARATOR,
  type MetadataPlan,
} from './metadata.js';
export {
  FsOutputTree,
  DryRunOutputTree,
  type OutputTree,
  type PlannedAction,
  type PlannedActionKind,
} from './outputTree.js';

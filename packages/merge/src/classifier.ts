/**
 * Path Classifier
 *
 * Maps a pack-relative path to the strategy that merges it.
 *
 *   assets/<ns>/lang/**.json     lang
 *   assets/<ns>/sounds.json      sounds-index
 *   assets/<ns>/font/**.json     font-definition
 *   assets/<ns>/atlases/**.json  atlas-definition
 *   data/<ns>/tags/**.json       tag-list
 *   anything else under assets/ or data/ is opaque
 */

import { getExtension, toSegments } from '@pack-merger/utils';
import { NAMESPACE_ROOTS, type NamespaceRoot } from '@pack-merger/core';

export type StructuredCategory =
  | 'lang'
  | 'sounds-index'
  | 'font-definition'
  | 'atlas-definition'
  | 'tag-list';

export type PathCategory = StructuredCategory | 'opaque';

const STRUCTURED_EXTENSION = 'json';

interface CategoryRule {
  category: StructuredCategory;
  root: NamespaceRoot;
  matches: (segments: string[]) => boolean;
}

function directoryRule(
  category: StructuredCategory,
  root: NamespaceRoot,
  directory: string
): CategoryRule {
  return {
    category,
    root,
    matches: (segments) =>
      segments.length >= 4 &&
      segments[2] === directory &&
      getExtension(segments[segments.length - 1] ?? '') === STRUCTURED_EXTENSION,
  };
}

const RULES: readonly CategoryRule[] = [
  directoryRule('lang', 'assets', 'lang'),
  {
    category: 'sounds-index',
    root: 'assets',
    matches: (segments) => segments.length === 3 && segments[2] === 'sounds.json',
  },
  directoryRule('font-definition', 'assets', 'font'),
  directoryRule('atlas-definition', 'assets', 'atlases'),
  directoryRule('tag-list', 'data', 'tags'),
];

function isNamespaceRoot(segment: string | undefined): segment is NamespaceRoot {
  return NAMESPACE_ROOTS.some((root) => root === segment);
}

/**
 * Classify a pack-relative path; `null` means it is not payload at all
 */
export function classifyPath(relativePath: string): PathCategory | null {
  const segments = toSegments(relativePath);
  const root = segments[0];
  if (!isNamespaceRoot(root)) return null;

  const rule = RULES.find((candidate) => candidate.root === root && candidate.matches(segments));
  return rule?.category ?? 'opaque';
}

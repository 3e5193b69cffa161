/**
 * Merge Strategies
 *
 * Combinators for structured files that already exist in the output tree.
 * `destination` is the merged-so-far document, `source` the incoming pack's.
 */

import type { JsonValue } from '@pack-merger/utils';
import type { StructuredCategory } from './classifier.js';
import { asObject, getBoolean, getList } from './json.js';
import { dedupeStructural } from './dedupe.js';

export type Combinator = (destination: JsonValue, source: JsonValue) => JsonValue;

/**
 * Key union; the source's keys win
 */
export const mergeKeys: Combinator = (destination, source) => ({
  ...asObject(destination),
  ...asObject(source),
});

/**
 * Concatenate the list under `field` (destination first) and deduplicate.
 * Every other destination field is kept.
 */
export function mergeListField(field: string): Combinator {
  return (destination, source) => ({
    ...asObject(destination),
    [field]: dedupeStructural([...getList(destination, field), ...getList(source, field)]),
  });
}

const mergeTagValues = mergeListField('values');

/**
 * Union of `values`; an explicit boolean `replace` on the source wins
 */
export const mergeTagList: Combinator = (destination, source) => {
  const merged = asObject(mergeTagValues(destination, source));
  const replace = getBoolean(source, 'replace');
  if (replace !== undefined) {
    merged['replace'] = replace;
  }
  return merged;
};

export const COMBINATORS: Readonly<Record<StructuredCategory, Combinator>> = {
  'lang': mergeKeys,
  'sounds-index': mergeKeys,
  'font-definition': mergeListField('providers'),
  'atlas-definition': mergeListField('sources'),
  'tag-list': mergeTagList,
};

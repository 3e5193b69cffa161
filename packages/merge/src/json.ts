/**
 * JSON Document Model
 *
 * Merge payloads have no fixed shape. Accessors fall back to an empty
 * object, an empty list or "absent" when a document is not what a
 * strategy expects.
 */

import type { JsonObject, JsonPrimitive, JsonValue } from '@pack-merger/utils';

export type JsonNode =
  | { kind: 'object'; value: JsonObject }
  | { kind: 'array'; value: JsonValue[] }
  | { kind: 'scalar'; value: JsonPrimitive }
  | { kind: 'null' };

export function toNode(value: JsonValue): JsonNode {
  if (value === null) return { kind: 'null' };
  if (Array.isArray(value)) return { kind: 'array', value };
  if (typeof value === 'object') return { kind: 'object', value };
  return { kind: 'scalar', value };
}

/**
 * Shallow copy of an object document, or `{}` for any other shape
 */
export function asObject(value: JsonValue | undefined): JsonObject {
  if (value === undefined) return {};
  const node = toNode(value);
  return node.kind === 'object' ? { ...node.value } : {};
}

/**
 * The list stored under `key`, or `[]` when the document or field is not a list
 */
export function getList(value: JsonValue | undefined, key: string): JsonValue[] {
  const field = asObject(value)[key];
  if (field === undefined) return [];
  const node = toNode(field);
  return node.kind === 'array' ? node.value : [];
}

export function getBoolean(value: JsonValue | undefined, key: string): boolean | undefined {
  const field = asObject(value)[key];
  return typeof field === 'boolean' ? field : undefined;
}

/**
 * JSON text helpers
 */

export type JsonPrimitive = string | number | boolean;
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | null | JsonValue[] | JsonObject;

const BOM = '\uFEFF';

/**
 * Parse JSON text, tolerating a leading byte-order mark. Throws on malformed input.
 */
export function parseJsonText(text: string): JsonValue {
  return JSON.parse(text.startsWith(BOM) ? text.slice(BOM.length) : text);
}

/**
 * Serialize with 2-space indent and a trailing newline
 */
export function stringifyJson(value: JsonValue): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

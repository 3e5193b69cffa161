/**
 * Structural Deduplication
 */

function canonicalize(value: unknown, seen: Set<object>): string {
  if (value === null || typeof value !== 'object') {
    const text = JSON.stringify(value);
    if (text === undefined) {
      throw new TypeError(`Cannot serialize ${typeof value}`);
    }
    return text;
  }

  if (seen.has(value)) {
    throw new TypeError('Cannot serialize circular structure');
  }
  seen.add(value);

  let text: string;
  if (Array.isArray(value)) {
    text = `[${value.map((item) => canonicalize(item, seen)).join(',')}]`;
  } else {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    text = `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${canonicalize(item, seen)}`).join(',')}}`;
  }

  seen.delete(value);
  return text;
}

/**
 * JSON text with object keys sorted, so that key order does not matter
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value, new Set());
}

export function structuralKey(value: unknown): string {
  try {
    return canonicalJson(value);
  } catch {
    // not serializable; string form may under-deduplicate
    return String(value);
  }
}

/**
 * Drop structurally equal repeats, keeping the first occurrence of each value
 */
export function dedupeStructural<T>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];

  for (const item of items) {
    const key = structuralKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }

  return out;
}

/**
 * Priority Ordering
 *
 * Index 0 is the lowest priority (applied first); the last entry wins conflicts.
 */

import { createLogger, type Logger } from '@pack-merger/utils';

interface Named {
  name: string;
}

export function compareNames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  if (a !== b) return a < b ? -1 : 1;
  return 0;
}

/**
 * Case-insensitive lexicographic order by name
 */
export function sortByName<T extends Named>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Apply a caller-chosen ordering by name.
 *
 * Named packages come first, in the order given. Names that match nothing are
 * ignored; packages the ordering leaves out are appended in their given order.
 * Without an ordering, packages are sorted by name.
 */
export function orderPackages<T extends Named>(
  packages: readonly T[],
  ordering?: readonly string[],
  log: Logger = createLogger({ component: 'pack-ordering' })
): T[] {
  if (!ordering || ordering.length === 0) {
    return sortByName(packages);
  }

  const byName = new Map<string, T>();
  for (const pack of packages) {
    if (!byName.has(pack.name)) byName.set(pack.name, pack);
  }

  const ordered: T[] = [];
  const placed = new Set<T>();

  for (const name of ordering) {
    const pack = byName.get(name);
    if (pack === undefined) {
      log.warn({ name }, 'Ordering names an unknown pack; ignoring');
      continue;
    }
    if (placed.has(pack)) continue;
    ordered.push(pack);
    placed.add(pack);
  }

  for (const pack of packages) {
    if (!placed.has(pack)) ordered.push(pack);
  }

  return ordered;
}

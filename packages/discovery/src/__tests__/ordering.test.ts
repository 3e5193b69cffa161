import { describe, it, expect } from 'vitest';
import { createLogger } from '@pack-merger/utils';
import { orderPackages, sortByName } from '../ordering.js';

const log = createLogger({ test: 'ordering' });
const packs = (...names: string[]) => names.map((name) => ({ name }));
const names = (items: Array<{ name: string }>) => items.map((item) => item.name);

describe('sortByName', () => {
  it('orders case-insensitively', () => {
    expect(names(sortByName(packs('beta', 'Alpha', 'charlie', 'Bravo')))).toEqual([
      'Alpha',
      'beta',
      'Bravo',
      'charlie',
    ]);
  });

  it('breaks case-only ties deterministically', () => {
    expect(names(sortByName(packs('pack', 'Pack')))).toEqual(['Pack', 'pack']);
  });

  it('does not mutate its input', () => {
    const input = packs('b', 'a');
    sortByName(input);
    expect(names(input)).toEqual(['b', 'a']);
  });
});

describe('orderPackages', () => {
  it('sorts by name without an ordering', () => {
    expect(names(orderPackages(packs('b', 'A', 'c'), undefined, log))).toEqual(['A', 'b', 'c']);
    expect(names(orderPackages(packs('b', 'A', 'c'), [], log))).toEqual(['A', 'b', 'c']);
  });

  it('places named packs first in the given order', () => {
    expect(names(orderPackages(packs('a', 'b', 'c'), ['c', 'a'], log))).toEqual(['c', 'a', 'b']);
  });

  it('ignores unknown names', () => {
    expect(names(orderPackages(packs('a', 'b'), ['ghost', 'b'], log))).toEqual(['b', 'a']);
  });

  it('appends unnamed packs in discovery order, not sorted', () => {
    expect(names(orderPackages(packs('z', 'y', 'x'), ['y'], log))).toEqual(['y', 'z', 'x']);
  });

  it('counts a repeated name once', () => {
    expect(names(orderPackages(packs('a', 'b'), ['b', 'b', 'a'], log))).toEqual(['b', 'a']);
  });
});

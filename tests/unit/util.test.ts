import { describe, it, expect } from 'vitest';
import { compareStrings, sortBy } from '../../src/util/index.js';

describe('sortBy', () => {
  it('compares composite keys component by component', () => {
    const items = [
      { schema: 'sales', name: 'A' },
      { schema: 'dbo', name: 'Z' },
      { schema: 'dbo', name: 'B' },
    ];
    expect(sortBy(items, (i) => [i.schema, i.name])).toEqual([
      { schema: 'dbo', name: 'B' },
      { schema: 'dbo', name: 'Z' },
      { schema: 'sales', name: 'A' },
    ]);
  });

  it('does not let a separator inside a component change the order', () => {
    const items = [{ k: ['a.b', 'c'] }, { k: ['a', 'b.c'] }];
    expect(sortBy(items, (i) => i.k).map((i) => i.k[0])).toEqual(['a', 'a.b']);
  });

  it('returns a new array', () => {
    const items = ['b', 'a'];
    const sorted = sortBy(items, (i) => [i]);
    expect(sorted).toEqual(['a', 'b']);
    expect(items).toEqual(['b', 'a']);
  });
});

describe('compareStrings', () => {
  it('orders by code unit, uppercase before lowercase', () => {
    expect(['b', 'B', 'a'].sort(compareStrings)).toEqual(['B', 'a', 'b']);
  });
});

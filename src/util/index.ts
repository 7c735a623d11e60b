/** Code-unit comparison, independent of locale and server collation. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort an array by a composite key, compared component by component.
 * Returns a new array.
 */
export function sortBy<T>(arr: readonly T[], keyFn: (item: T) => readonly string[]): T[] {
  return [...arr].sort((a, b) => {
    const ka = keyFn(a);
    const kb = keyFn(b);
    const length = Math.min(ka.length, kb.length);
    for (let i = 0; i < length; i++) {
      const order = compareStrings(ka[i] ?? '', kb[i] ?? '');
      if (order !== 0) return order;
    }
    return ka.length - kb.length;
  });
}

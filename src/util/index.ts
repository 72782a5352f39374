/**
 * Sort an array by a key function. Returns a new array.
 */
export function sortBy<T>(arr: readonly T[], keyFn: (item: T) => string): T[] {
  return [...arr].sort((a, b) => compareStrings(keyFn(a), keyFn(b)));
}

/** Plain code-unit ordering, independent of locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order sorted string lists by length first, then element by element.
 */
export function compareLists(a: readonly string[], b: readonly string[]): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  for (let i = 0; i < a.length; i++) {
    const cmp = compareStrings(a[i] ?? '', b[i] ?? '');
    if (cmp !== 0) {
      return cmp;
    }
  }
  return 0;
}

/**
 * Yield every `size`-element combination of `items`, preserving item order.
 */
export function* combinations<T>(
  items: readonly T[],
  size: number,
  start = 0,
): Generator<T[]> {
  if (size === 0) {
    yield [];
    return;
  }
  for (let i = start; i <= items.length - size; i++) {
    const head = items[i];
    if (head === undefined) {
      continue;
    }
    for (const tail of combinations(items, size - 1, i + 1)) {
      yield [head, ...tail];
    }
  }
}

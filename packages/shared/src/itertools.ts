/** Consecutive pairs: [a, b, c] -> [a, b], [b, c] */
export function* pairs<T>(arr: Iterable<T>): Iterable<[T, T]> {
  let prev: { value: T } | undefined;
  for (const item of arr) {
    if (prev) yield [prev.value, item];
    prev = { value: item };
  }
}

/** Compare two strings the way `Array.prototype.sort` does by default */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Lazily yields every ordering of `items` using the iterative form of Heap's
 * algorithm. The identity ordering comes first; for `[A, B, C]` the sequence
 * is `ABC, BAC, CAB, ACB, BCA, CBA`. Each yielded array is a fresh copy, and
 * the input is never modified.
 *
 * The order is fixed and callers may rely on it. The generator holds O(n)
 * state and does not recurse, so it can be stopped early at no extra cost.
 */
export function* permutations<T>(items: readonly T[]): Generator<T[], void, undefined> {
  const arrangement = [...items];
  const n = arrangement.length;
  const counters = new Array<number>(n).fill(0);

  yield [...arrangement];

  let i = 1;
  while (i < n) {
    if (counters[i] < i) {
      const j = i % 2 === 0 ? 0 : counters[i];
      [arrangement[j], arrangement[i]] = [arrangement[i], arrangement[j]];

      yield [...arrangement];

      counters[i] += 1;
      i = 1;
    } else {
      counters[i] = 0;
      i += 1;
    }
  }
}

/** Materializes all n! orderings of `items`. */
export function allPermutations<T>(items: readonly T[]): T[][] {
  return Array.from(permutations(items));
}

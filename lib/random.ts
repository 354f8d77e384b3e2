/**
 * A source of uniform random numbers in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Create seeded random number generator using the xorshift32 algorithm -
 * the same seed always gives the same sample selection.
 *
 * @param seed any integer (0 is replaced as xorshift would only ever produce 0)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0 || 0x9e3779b9;

  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    // convert to [0, 1) range
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Draw items uniformly at random *with* replacement - the same item can be
 * drawn more than once, and more items than the pool holds can be drawn.
 *
 * @param pool the items to draw from
 * @param count how many draws
 * @param rng the random source
 */
export function choicesWithReplacement<T>(
  pool: readonly T[],
  count: number,
  rng: RandomSource
): T[] {
  if (count > 0 && pool.length === 0)
    throw new Error("Cannot draw samples from an empty pool");

  const result: T[] = [];

  for (let i = 0; i < count; i++) {
    result.push(pool[Math.floor(rng() * pool.length)]);
  }

  return result;
}

/**
 * Draw items uniformly at random *without* replacement using a partial
 * Fisher-Yates shuffle. Asking for more items than the pool holds gives
 * the whole pool (in shuffled order).
 *
 * @param pool the items to draw from
 * @param count how many distinct items
 * @param rng the random source
 */
export function sampleWithoutReplacement<T>(
  pool: readonly T[],
  count: number,
  rng: RandomSource
): T[] {
  const items = [...pool];
  const actualCount = Math.min(Math.max(count, 0), items.length);

  for (let i = 0; i < actualCount; i++) {
    // pick random element from remaining unshuffled portion
    const j = i + Math.floor(rng() * (items.length - i));

    const temp = items[i];
    items[i] = items[j];
    items[j] = temp;
  }

  return items.slice(0, actualCount);
}

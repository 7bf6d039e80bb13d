export type RandomSource = () => number;

const normalized = new WeakSet<RandomSource>();

/**
 * Wraps a caller-supplied source so it always yields a value in [0, 1)
 */
export function normalizeRandom(random: RandomSource | undefined): RandomSource {
  if (!random) {
    return Math.random;
  }
  if (normalized.has(random)) {
    return random;
  }
  const wrapped: RandomSource = () => {
    const value = random();
    if (!Number.isFinite(value) || value <= 0) {
      return 0;
    }
    if (value >= 1) {
      return 0.999999999999;
    }
    return value;
  };
  normalized.add(wrapped);
  return wrapped;
}

/**
 * Standard normal sample (Box-Muller)
 */
export function gaussian(random: RandomSource): number {
  const u = random() || Number.EPSILON;
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function pickIndex(length: number, random: RandomSource): number {
  if (length <= 0) {
    throw new Error('Cannot pick from an empty set.');
  }
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Two distinct indices drawn uniformly from [0, length)
 */
export function pickDistinctPair(length: number, random: RandomSource): [number, number] {
  if (length < 2) {
    throw new Error('Need at least two items to pick a distinct pair.');
  }
  const first = pickIndex(length, random);
  const offset = 1 + pickIndex(length - 1, random);
  return [first, (first + offset) % length];
}

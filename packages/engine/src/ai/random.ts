/** Returns a float in [0, 1). */
export type Rng = () => number;

export const defaultRng: Rng = () => Math.random();

/**
 * Deterministic 32-bit generator (mulberry32). Identical seeds produce
 * identical streams, which keeps the easy opponent reproducible.
 */
export function createRng(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomChoice<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) {
    throw new RangeError('randomChoice called with no items');
  }
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}

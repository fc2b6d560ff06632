/**
 * Seeded pseudo-random source. Every entity owns one, so identical seeds
 * and tick timestamps reproduce identical telemetry.
 */
export interface Rng {
  /** Uniform in [0, 1) */
  next(): number;
}

/** mulberry32 */
export function createSeededRng(seed: number): Rng {
  let a = seed >>> 0;
  return {
    next() {
      a = (a + 0x6d2b79f5) >>> 0;
      let t = a;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Per-entity seed from the run seed and an entity id (FNV-1a) */
export function deriveSeed(baseSeed: number, key: string): number {
  let hash = 0x811c9dc5 ^ (baseSeed >>> 0);
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function uniform(rng: Rng, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

export function chance(rng: Rng, probability: number): boolean {
  return rng.next() < probability;
}

/** Normal sample with mean 0 (Box-Muller) */
export function gaussian(rng: Rng, stddev: number): number {
  const u1 = 1 - rng.next();
  const u2 = rng.next();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2) * stddev;
}

export function poisson(rng: Rng, lambda: number): number {
  if (lambda <= 0) return 0;
  if (lambda > 30) {
    return Math.max(0, Math.round(lambda + gaussian(rng, Math.sqrt(lambda))));
  }
  // Knuth
  const limit = Math.exp(-lambda);
  let k = 0;
  let p = 1;
  do {
    k++;
    p *= rng.next();
  } while (p > limit);
  return k - 1;
}

/** Pick a key by cumulative weight, walking keys in the given order */
export function pickWeighted<T extends string>(rng: Rng, weights: Record<T, number>, order: readonly T[]): T {
  const total = order.reduce((sum, key) => sum + weights[key], 0);
  const roll = rng.next() * total;
  let acc = 0;
  for (const key of order) {
    acc += weights[key];
    if (roll < acc) return key;
  }
  return order[order.length - 1];
}

/**
 * Weight-vector generators for the sleep debt window. Index 0 is the oldest
 * night; every generator returns exactly `n` positive weights.
 */
export interface WeightingStrategy {
  readonly name: string;
  weights(n: number): number[];
}

function assertCount(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`Weight count must be a positive integer, got ${n}`);
  }
}

/** Evenly spaced from `oldest` to `newest` (0.5 → 1.0 by default). */
export function linearWeighting(oldest = 0.5, newest = 1.0): WeightingStrategy {
  return {
    name: 'linear',
    weights(n) {
      assertCount(n);
      if (n === 1) return [newest];
      return Array.from({ length: n }, (_, i) => oldest + ((newest - oldest) * i) / (n - 1));
    },
  };
}

/** `e^(k·i)` scaled so the most recent night weighs 1. */
export function exponentialWeighting(decayRate = 0.1): WeightingStrategy {
  return {
    name: 'exponential',
    weights(n) {
      assertCount(n);
      const raw = Array.from({ length: n }, (_, i) => Math.exp(decayRate * i));
      const max = raw[n - 1];
      return raw.map((w) => w / max);
    },
  };
}

/**
 * Last night carries a fixed share of the total (15 % by default); the earlier
 * nights split the remainder evenly.
 */
export function recencyDominantWeighting(lastNightShare = 0.15): WeightingStrategy {
  if (!(lastNightShare > 0 && lastNightShare < 1)) {
    throw new RangeError(`lastNightShare must lie in (0, 1), got ${lastNightShare}`);
  }
  return {
    name: 'recency',
    weights(n) {
      assertCount(n);
      if (n === 1) return [1];
      const earlier = (1 - lastNightShare) / (n - 1);
      return [...Array.from({ length: n - 1 }, () => earlier), lastNightShare];
    },
  };
}

export function uniformWeighting(): WeightingStrategy {
  return {
    name: 'uniform',
    weights(n) {
      assertCount(n);
      return Array.from({ length: n }, () => 1);
    },
  };
}

export type WeightingName = 'linear' | 'exponential' | 'recency' | 'uniform';

export function weightingByName(name: WeightingName): WeightingStrategy {
  switch (name) {
    case 'linear':
      return linearWeighting();
    case 'exponential':
      return exponentialWeighting();
    case 'recency':
      return recencyDominantWeighting();
    case 'uniform':
      return uniformWeighting();
  }
}

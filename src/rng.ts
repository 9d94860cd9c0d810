export type RandomSource = () => number;

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(0.999999, value));
}

/** Uniform integer in `[minInclusive, maxInclusive]`. */
export function randomInt(random: RandomSource, minInclusive: number, maxInclusive: number): number {
  const min = Math.ceil(minInclusive);
  const max = Math.floor(maxInclusive);
  if (max < min) {
    return min;
  }
  return min + Math.floor(clampUnit(random()) * (max - min + 1));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list.');
  }
  const index = Math.floor(clampUnit(random()) * items.length);
  return items[Math.min(index, items.length - 1)];
}

export function chance(random: RandomSource, probability: number): boolean {
  return random() < probability;
}

/**
 * Mulberry32 generator. Used by the balance script and property tests so a
 * seed reproduces the same cavern layout and roll sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let result = Math.imul(state ^ (state >>> 15), 1 | state);
    result ^= result + Math.imul(result ^ (result >>> 7), 61 | result);
    return ((result ^ (result >>> 14)) >>> 0) / 0x1_0000_0000;
  };
}

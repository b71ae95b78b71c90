/**
 * Bounded randomness used by the sensor model.
 */
export interface NoiseSource {
  /** A value in `[min, max)`. */
  uniform(min: number, max: number): number;
}

/** Seeded PRNG (Mulberry32) for deterministic readings. */
export function createSeededNoise(seed: number): NoiseSource {
  let state = seed | 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    uniform: (min, max) => min + (max - min) * next(),
  };
}

export const mathRandomNoise: NoiseSource = {
  uniform: (min, max) => min + (max - min) * Math.random(),
};

/** Always the centre of the range: symmetric noise terms vanish. */
export const ZERO_NOISE: NoiseSource = {
  uniform: (min, max) => (min + max) / 2,
};

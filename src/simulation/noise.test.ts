import { describe, it, expect } from "vitest";
import { createSeededNoise, mathRandomNoise, ZERO_NOISE } from "./noise";

describe("noise sources", () => {
  it("seeded noise stays within the requested range", () => {
    const noise = createSeededNoise(123);
    for (let i = 0; i < 200; i++) {
      const value = noise.uniform(-0.2, 0.2);
      expect(value).toBeGreaterThanOrEqual(-0.2);
      expect(value).toBeLessThan(0.2);
    }
  });

  it("seeded noise repeats per seed and differs across seeds", () => {
    const sample = (seed: number) => {
      const noise = createSeededNoise(seed);
      return Array.from({ length: 5 }, () => noise.uniform(0, 1));
    };
    expect(sample(5)).toEqual(sample(5));
    expect(sample(5)).not.toEqual(sample(6));
  });

  it("zero noise returns the centre of the range", () => {
    expect(ZERO_NOISE.uniform(-10, 10)).toBe(0);
    expect(ZERO_NOISE.uniform(0, 0.1)).toBe(0.05);
  });

  it("Math.random noise stays within the requested range", () => {
    for (let i = 0; i < 50; i++) {
      const value = mathRandomNoise.uniform(280 - 15, 280 + 15);
      expect(value).toBeGreaterThanOrEqual(265);
      expect(value).toBeLessThan(295);
    }
  });
});

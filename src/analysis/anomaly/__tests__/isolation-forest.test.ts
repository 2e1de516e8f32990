import { describe, it, expect } from "vitest";
import { IsolationForest, averagePathLength, quantile } from "../isolation-forest";
import { createRandom, sampleIndices } from "../random";

describe("createRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("stays within [0, 1)", () => {
    const random = createRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = random();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("sampleIndices", () => {
  it("returns distinct indices within range", () => {
    const picked = sampleIndices(createRandom(1), 50, 20);
    expect(picked).toHaveLength(20);
    expect(new Set(picked).size).toBe(20);
    expect(picked.every((i) => i >= 0 && i < 50)).toBe(true);
  });

  it("returns every index when the sample covers the population", () => {
    const picked = sampleIndices(createRandom(1), 5, 10);
    expect([...picked].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
  });
});

describe("averagePathLength", () => {
  it("handles the small cases", () => {
    expect(averagePathLength(0)).toBe(0);
    expect(averagePathLength(1)).toBe(0);
    expect(averagePathLength(2)).toBe(1);
  });

  it("grows with n", () => {
    expect(averagePathLength(256)).toBeGreaterThan(averagePathLength(20));
  });
});

describe("quantile", () => {
  it("interpolates between neighbours", () => {
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantile([0, 10], 0.9)).toBe(9);
  });

  it("returns the extremes at 0 and 1", () => {
    expect(quantile([3, 5, 8], 0)).toBe(3);
    expect(quantile([3, 5, 8], 1)).toBe(8);
  });
});

describe("IsolationForest", () => {
  const features = [[10], [11], [12], [10], [11], [12], [11], [10], [12], [400]];

  it("gives the isolated point the highest score", () => {
    const scores = new IsolationForest().scoreSamples(features, 42);
    const max = Math.max(...scores);
    expect(scores[9]).toBe(max);
    expect(scores.every((s) => s > 0 && s <= 1)).toBe(true);
  });

  it("labels the isolated point as an outlier", () => {
    const predictions = new IsolationForest().fitPredict(features, { seed: 42, contamination: 0.1 });
    expect(predictions).toHaveLength(10);
    expect(predictions[9].label).toBe(-1);
  });

  it("is deterministic for a fixed seed", () => {
    const forest = new IsolationForest();
    expect(forest.fitPredict(features, { seed: 3, contamination: 0.2 })).toEqual(
      forest.fitPredict(features, { seed: 3, contamination: 0.2 }),
    );
  });

  it("rejects fewer than two samples", () => {
    expect(() => new IsolationForest().scoreSamples([[1]], 1)).toThrow(
      "isolation forest needs at least 2 samples, got 1",
    );
  });

  it("rejects non-finite features", () => {
    expect(() => new IsolationForest().scoreSamples([[1], [Number.NaN]], 1)).toThrow(
      "feature matrix must contain finite, non-empty rows",
    );
  });

  it("rejects contamination outside (0, 0.5]", () => {
    expect(() => new IsolationForest().fitPredict(features, { seed: 1, contamination: 0.6 })).toThrow(
      "contamination must be in (0, 0.5], got 0.6",
    );
  });

  it("validates its construction options", () => {
    expect(() => new IsolationForest({ nEstimators: 0 })).toThrow();
    expect(() => new IsolationForest({ maxSamples: 1 })).toThrow();
  });
});

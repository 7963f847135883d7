import { describe, it, expect } from "vitest";
import { computeMetric } from "../src/results/metrics.js";

const classes = { labels: ["a", "b", "c"] };

describe("classification metrics", () => {
  it("computes accuracy and balanced accuracy", () => {
    const input = {
      ...classes,
      truth: ["a", "a", "a", "b"],
      predictions: ["a", "a", "b", "b"],
      probabilities: null
    };
    expect(computeMetric("acc", input)).toBe(0.75);
    expect(computeMetric("balacc", input)).toBeCloseTo((2 / 3 + 1) / 2, 12);
  });

  it("clips probabilities in logloss", () => {
    const value = computeMetric("logloss", {
      ...classes,
      truth: ["a", "b"],
      predictions: ["a", "a"],
      probabilities: [
        [1, 0, 0],
        [1, 0, 0]
      ]
    });
    expect(value).toBeCloseTo((-Math.log(1 - 1e-15) - Math.log(1e-15)) / 2, 10);
  });

  it("requires probabilities for logloss", () => {
    expect(() =>
      computeMetric("logloss", { ...classes, truth: ["a"], predictions: ["a"], probabilities: null })
    ).toThrow("metric logloss requires class probabilities");
  });

  it("ranks ties on average in auc", () => {
    const value = computeMetric("auc", {
      labels: ["neg", "pos"],
      truth: ["neg", "pos", "neg", "pos"],
      predictions: ["neg", "pos", "neg", "pos"],
      probabilities: [
        [0.9, 0.1],
        [0.6, 0.4],
        [0.6, 0.4],
        [0.2, 0.8]
      ]
    });
    expect(value).toBe(0.875);
  });
});

describe("regression metrics", () => {
  const input = { labels: [], truth: [2, 4], predictions: [3, 3], probabilities: null };

  it("computes rmse, mae, mse and r2", () => {
    expect(computeMetric("rmse", input)).toBe(1);
    expect(computeMetric("mae", input)).toBe(1);
    expect(computeMetric("mse", input)).toBe(1);
    expect(computeMetric("r2", input)).toBe(0);
  });
});

describe("computeMetric", () => {
  it("returns null for unknown metrics", () => {
    expect(computeMetric("made_up", { labels: [], truth: [1], predictions: [1], probabilities: null })).toBeNull();
  });

  it("rejects empty folds and misaligned predictions", () => {
    expect(() => computeMetric("acc", { labels: [], truth: [], predictions: [], probabilities: null })).toThrow(
      "cannot score an empty test fold"
    );
    expect(() => computeMetric("acc", { labels: [], truth: [1, 2], predictions: [1], probabilities: null })).toThrow(
      "expected 2 predictions, got 1"
    );
  });
});

import type { TaskConfig } from "../../benchmark/taskConfig.js";
import type { Dataset, TargetValue } from "../../datasets/types.js";
import type { FrameworkAdapter, FrameworkMetaResult } from "../types.js";

export function classPriors(ys: readonly TargetValue[], labels: readonly string[]): number[] {
  const counts = new Map<string, number>(labels.map((l) => [l, 0]));
  for (const y of ys) {
    const key = String(y);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const total = ys.length || 1;
  return labels.map((l) => (counts.get(l) ?? 0) / total);
}

/**
 * Baseline: predicts the most frequent training class (with training class
 * priors as probabilities), or the training mean for regression.
 */
export const constantPredictor: FrameworkAdapter = {
  async run(dataset: Dataset, config: TaskConfig): Promise<FrameworkMetaResult> {
    const started = performance.now();
    const testRows = dataset.test.X.length;
    const trainY = dataset.train.y;

    if (config.type === "classification") {
      const labels = dataset.target.values;
      const priors = classPriors(trainY, labels);
      let best = 0;
      for (let i = 1; i < priors.length; i++) {
        if ((priors[i] ?? 0) > (priors[best] ?? 0)) best = i;
      }
      const label = labels[best];
      if (label === undefined) throw new Error(`no class labels for target ${dataset.target.name}`);
      return {
        predictions: Array.from({ length: testRows }, () => label),
        probabilities: Array.from({ length: testRows }, () => [...priors]),
        modelsCount: 1,
        duration: (performance.now() - started) / 1000
      };
    }

    const numeric = trainY.map((y) => Number(y)).filter((y) => Number.isFinite(y));
    if (!numeric.length) throw new Error(`no numeric training targets for ${dataset.target.name}`);
    const mean = numeric.reduce((a, b) => a + b, 0) / numeric.length;
    return {
      predictions: Array.from({ length: testRows }, () => mean),
      modelsCount: 1,
      duration: (performance.now() - started) / 1000
    };
  }
};

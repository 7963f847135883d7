import type { TargetValue } from "../datasets/types.js";

export interface MetricInput {
  truth: readonly TargetValue[];
  predictions: readonly TargetValue[];
  probabilities: readonly (readonly number[])[] | null;
  labels: readonly string[];
}

export type MetricFn = (input: MetricInput) => number;

const EPS = 1e-15;

function numeric(values: readonly TargetValue[]): number[] {
  return values.map((v) => {
    const n = typeof v === "number" ? v : Number(v);
    if (!Number.isFinite(n)) throw new Error(`non-numeric value for regression metric: ${String(v)}`);
    return n;
  });
}

function requireProbabilities(input: MetricInput, metric: string): readonly (readonly number[])[] {
  if (!input.probabilities) throw new Error(`metric ${metric} requires class probabilities`);
  if (input.probabilities.length !== input.truth.length) {
    throw new Error(`metric ${metric}: expected ${input.truth.length} probability rows, got ${input.probabilities.length}`);
  }
  return input.probabilities;
}

function labelIndex(labels: readonly string[], y: TargetValue): number {
  const idx = labels.indexOf(String(y));
  if (idx < 0) throw new Error(`unknown class label: ${String(y)}`);
  return idx;
}

const acc: MetricFn = ({ truth, predictions }) => {
  let hits = 0;
  truth.forEach((y, i) => {
    if (String(y) === String(predictions[i])) hits++;
  });
  return hits / truth.length;
};

const balacc: MetricFn = ({ truth, predictions }) => {
  const perClass = new Map<string, { hits: number; total: number }>();
  truth.forEach((y, i) => {
    const key = String(y);
    const entry = perClass.get(key) ?? { hits: 0, total: 0 };
    entry.total++;
    if (key === String(predictions[i])) entry.hits++;
    perClass.set(key, entry);
  });
  const recalls = [...perClass.values()].map((e) => e.hits / e.total);
  return recalls.reduce((a, b) => a + b, 0) / recalls.length;
};

const logloss: MetricFn = (input) => {
  const probs = requireProbabilities(input, "logloss");
  let sum = 0;
  input.truth.forEach((y, i) => {
    const p = probs[i]?.[labelIndex(input.labels, y)] ?? 0;
    sum += -Math.log(Math.min(1 - EPS, Math.max(EPS, p)));
  });
  return sum / input.truth.length;
};

/** Binary AUC (Mann-Whitney U with average ranks for ties), positive class = last label. */
const auc: MetricFn = (input) => {
  if (input.labels.length !== 2) throw new Error("metric auc is only defined for binary targets");
  const probs = requireProbabilities(input, "auc");
  const positive = input.labels[1];
  const scored = input.truth.map((y, i) => ({ pos: String(y) === positive, score: probs[i]?.[1] ?? 0 }));
  scored.sort((a, b) => a.score - b.score);

  const ranks = new Array<number>(scored.length);
  let i = 0;
  while (i < scored.length) {
    let j = i;
    while (j + 1 < scored.length && scored[j + 1]?.score === scored[i]?.score) j++;
    const avg = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) ranks[k] = avg;
    i = j + 1;
  }

  let nPos = 0;
  let rankSum = 0;
  scored.forEach((s, idx) => {
    if (s.pos) {
      nPos++;
      rankSum += ranks[idx] ?? 0;
    }
  });
  const nNeg = scored.length - nPos;
  if (nPos === 0 || nNeg === 0) throw new Error("metric auc requires both classes in the test fold");
  return (rankSum - (nPos * (nPos + 1)) / 2) / (nPos * nNeg);
};

const mae: MetricFn = ({ truth, predictions }) => {
  const t = numeric(truth);
  const p = numeric(predictions);
  return t.reduce((sum, y, i) => sum + Math.abs(y - (p[i] ?? 0)), 0) / t.length;
};

const mse = ({ truth, predictions }: MetricInput): number => {
  const t = numeric(truth);
  const p = numeric(predictions);
  return t.reduce((sum, y, i) => sum + (y - (p[i] ?? 0)) ** 2, 0) / t.length;
};

const rmse: MetricFn = (input) => Math.sqrt(mse(input));

const r2: MetricFn = (input) => {
  const t = numeric(input.truth);
  const mean = t.reduce((a, b) => a + b, 0) / t.length;
  const ssTot = t.reduce((sum, y) => sum + (y - mean) ** 2, 0);
  if (ssTot === 0) throw new Error("metric r2 is undefined for a constant target");
  return 1 - (mse(input) * t.length) / ssTot;
};

export const METRICS: Readonly<Record<string, MetricFn>> = Object.freeze({
  acc,
  balacc,
  logloss,
  auc,
  mae,
  mse,
  rmse,
  r2
});

export function computeMetric(name: string, input: MetricInput): number | null {
  const fn = METRICS[name];
  if (!fn) return null;
  if (input.truth.length === 0) throw new Error("cannot score an empty test fold");
  if (input.predictions.length !== input.truth.length) {
    throw new Error(`expected ${input.truth.length} predictions, got ${input.predictions.length}`);
  }
  return fn(input);
}

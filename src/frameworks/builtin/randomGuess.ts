import { createHash } from "crypto";
import type { TaskConfig } from "../../benchmark/taskConfig.js";
import type { Dataset } from "../../datasets/types.js";
import type { FrameworkAdapter, FrameworkMetaResult } from "../types.js";

function seedFrom(parts: string[]): Buffer {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return h.digest();
}

/** First 32 bits of the digest as a number in [0, 1]. */
function unitOf(seed: Buffer): number {
  return seed.readUInt32BE(0) / 0xffffffff;
}

/**
 * Deterministic random baseline: row i draws from a sha256 stream seeded by
 * task name, fold, seed, the optional `salt` framework parameter and row index.
 */
export const randomGuess: FrameworkAdapter = {
  async run(dataset: Dataset, config: TaskConfig): Promise<FrameworkMetaResult> {
    const rows = dataset.test.X.length;
    const salt = config.frameworkParams["salt"];
    const saltText = typeof salt === "string" ? salt : "";
    const draw = (row: number): number =>
      unitOf(seedFrom([config.name, String(config.fold), String(config.seed), saltText, String(row)]));

    if (config.type === "classification") {
      const labels = dataset.target.values;
      if (!labels.length) throw new Error(`no class labels for target ${dataset.target.name}`);
      const predictions: string[] = [];
      const probabilities: number[][] = [];
      for (let row = 0; row < rows; row++) {
        const idx = Math.min(labels.length - 1, Math.floor(draw(row) * labels.length));
        predictions.push(labels[idx] ?? "");
        probabilities.push(labels.map((_, i) => (i === idx ? 1 : 0)));
      }
      return { predictions, probabilities, modelsCount: 0 };
    }

    const ys = dataset.train.y.map((y) => Number(y)).filter((y) => Number.isFinite(y));
    if (!ys.length) throw new Error(`no numeric training targets for ${dataset.target.name}`);
    const min = Math.min(...ys);
    const max = Math.max(...ys);
    return {
      predictions: Array.from({ length: rows }, (_, row) => min + draw(row) * (max - min)),
      modelsCount: 0
    };
  }
};

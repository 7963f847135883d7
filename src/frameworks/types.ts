import type { TaskConfig } from "../benchmark/taskConfig.js";
import type { Dataset, TargetValue } from "../datasets/types.js";

export interface FrameworkMetaResult {
  /** One prediction per test row. */
  predictions: TargetValue[];
  /** Class probabilities per test row, columns ordered as `dataset.target.values`. */
  probabilities?: number[][];
  modelsCount?: number;
  /** Training duration in seconds, when the framework measures it. */
  duration?: number;
  version?: string;
}

export interface FrameworkAdapter {
  run(dataset: Dataset, config: TaskConfig): Promise<FrameworkMetaResult>;
  setup?(setupArgs: string): Promise<void>;
}

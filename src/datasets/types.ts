import type { DatasetRef } from "../benchmark/catalog.js";

export type FeatureValue = number | string | null;
export type TargetValue = number | string;

export interface DatasetSplit {
  readonly X: ReadonlyArray<ReadonlyArray<FeatureValue>>;
  readonly y: readonly TargetValue[];
}

export interface DatasetTarget {
  readonly name: string;
  /** Class labels for categorical targets, in declaration order; empty for continuous targets. */
  readonly values: readonly string[];
  isCategorical(): boolean;
}

/**
 * Exclusively owned by the job that loaded it. `release()` drops the data and
 * may be called any number of times.
 */
export interface Dataset {
  readonly features: readonly string[];
  readonly target: DatasetTarget;
  readonly train: DatasetSplit;
  readonly test: DatasetSplit;
  readonly released: boolean;
  release(): void;
}

export interface DatasetService {
  load(ref: DatasetRef, fold: number): Promise<Dataset>;
}

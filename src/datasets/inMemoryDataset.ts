import type { Dataset, DatasetSplit, DatasetTarget, TargetValue } from "./types.js";

export interface InMemoryDatasetInit {
  features: readonly string[];
  target: { name: string; categorical: boolean; values?: readonly string[] };
  train: DatasetSplit;
  test: DatasetSplit;
  onRelease?: () => void;
}

function distinctLabels(ys: readonly TargetValue[]): string[] {
  return [...new Set(ys.map((y) => String(y)))].sort();
}

export class InMemoryDataset implements Dataset {
  readonly features: readonly string[];
  readonly target: DatasetTarget;
  private splits: { train: DatasetSplit; test: DatasetSplit } | null;
  private readonly onRelease: (() => void) | undefined;

  constructor(init: InMemoryDatasetInit) {
    this.features = Object.freeze([...init.features]);
    const categorical = init.target.categorical;
    const values = categorical
      ? Object.freeze([...(init.target.values ?? distinctLabels([...init.train.y, ...init.test.y]))])
      : Object.freeze([]);
    this.target = Object.freeze({
      name: init.target.name,
      values,
      isCategorical: () => categorical
    });
    this.splits = { train: init.train, test: init.test };
    this.onRelease = init.onRelease;
  }

  private requireSplits(): { train: DatasetSplit; test: DatasetSplit } {
    if (!this.splits) throw new Error("dataset already released");
    return this.splits;
  }

  get train(): DatasetSplit {
    return this.requireSplits().train;
  }

  get test(): DatasetSplit {
    return this.requireSplits().test;
  }

  get released(): boolean {
    return this.splits === null;
  }

  release(): void {
    if (this.splits === null) return;
    this.splits = null;
    this.onRelease?.();
  }
}

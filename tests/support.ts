import os from "os";
import type { DatasetRef } from "../src/benchmark/catalog.js";
import { parseBenchmarkDefinition, type TaskCatalog } from "../src/benchmark/catalog.js";
import { parseFrameworkDefinitions, type FrameworkDefinitions } from "../src/benchmark/frameworks.js";
import type { SystemCapacity } from "../src/benchmark/resources.js";
import { BenchmarkSettings, type BenchmarkConfigInput } from "../src/config/settings.js";
import { UnsupportedDatasetShapeError } from "../src/core/errors.js";
import { InMemoryDataset, type InMemoryDatasetInit } from "../src/datasets/inMemoryDataset.js";
import type { Dataset, DatasetService } from "../src/datasets/types.js";
import type { CommandResult, CommandRunner, CommandSpec } from "../src/execution/backends/types.js";
import { createBuiltinRegistry } from "../src/frameworks/builtin/index.js";
import type { AdapterRegistry } from "../src/frameworks/registry.js";
import type { FrameworkAdapter } from "../src/frameworks/types.js";
import type { ScoredResult } from "../src/results/types.js";

export const FIXED_CAPACITY: SystemCapacity = { cores: 8, memoryTotalMb: 16384, memoryAvailableMb: 8192 };

export function makeSettings(config: Partial<BenchmarkConfigInput> = {}, baseDir = os.tmpdir()): BenchmarkSettings {
  return BenchmarkSettings.fromConfig(
    {
      version: 1,
      input_dir: "input",
      output_dir: "output",
      job_runner: { parallel_jobs: 1, delay_seconds: 0, done_async: true, poll_interval_ms: 5 },
      ...config
    },
    baseDir
  );
}

/** Six training rows (a,a,a,b,b,c) and three test rows (a,b,c), identical for every fold. */
export function blobsFold(): Omit<InMemoryDatasetInit, "onRelease"> {
  return {
    features: ["x"],
    target: { name: "class", categorical: true },
    train: { X: [[1], [2], [3], [4], [5], [6]], y: ["a", "a", "a", "b", "b", "c"] },
    test: { X: [[1], [5], [6]], y: ["a", "b", "c"] }
  };
}

/** Training mean 3; test targets 2 and 4. */
export function rampFold(): Omit<InMemoryDatasetInit, "onRelease"> {
  return {
    features: ["x"],
    target: { name: "y", categorical: false },
    train: { X: [[1], [2], [3], [4]], y: [1, 2, 3, 6] },
    test: { X: [[2], [4]], y: [2, 4] }
  };
}

export const BLOBS_TASK_ID = 1001;
export const RAMP_TASK_ID = 1002;

export class FakeDatasetService implements DatasetService {
  readonly loads: Array<{ ref: DatasetRef; fold: number }> = [];
  released = 0;

  constructor(
    private readonly tasks: Record<number, (fold: number) => Omit<InMemoryDatasetInit, "onRelease">> = {
      [BLOBS_TASK_ID]: blobsFold,
      [RAMP_TASK_ID]: rampFold
    }
  ) {}

  async load(ref: DatasetRef, fold: number): Promise<Dataset> {
    this.loads.push({ ref, fold });
    if (ref.kind !== "openml_task") throw new UnsupportedDatasetShapeError(`unsupported dataset reference: ${ref.kind}`);
    const make = this.tasks[ref.taskId];
    if (!make) throw new Error(`no fixture for task ${ref.taskId}`);
    return new InMemoryDataset({
      ...make(fold),
      onRelease: () => {
        this.released++;
      }
    });
  }
}

export function makeCatalog(settings: BenchmarkSettings): TaskCatalog {
  return parseBenchmarkDefinition(
    "test",
    [
      { name: "blobs", openml_task_id: BLOBS_TASK_ID, folds: 2 },
      { name: "ramp", openml_task_id: RAMP_TASK_ID, folds: 2, metric: ["rmse", "mae", "r2"] },
      { name: "off", openml_task_id: BLOBS_TASK_ID, folds: 1, enabled: false }
    ],
    settings.taskDefaults()
  );
}

export const alwaysThrows: FrameworkAdapter = {
  async run() {
    throw new Error("boom");
  }
};

export function makeFrameworks(): FrameworkDefinitions {
  return parseFrameworkDefinitions({
    constantpredictor: { version: "stable" },
    randomguess: { version: "stable" },
    always_throws: { version: "0.0.1" }
  });
}

export function makeAdapters(): AdapterRegistry {
  return createBuiltinRegistry().register("always_throws", alwaysThrows);
}

export function scoredResult(task: string, fold: number, duration: number): ScoredResult {
  return {
    kind: "scored",
    id: null,
    task,
    framework: "constantpredictor",
    version: "stable",
    fold,
    mode: "local",
    metric: "acc",
    params: {},
    tag: null,
    utcTime: "2024-01-01T00:00:00.000Z",
    duration,
    result: 0.5,
    scores: { acc: 0.5 },
    modelsCount: 1,
    info: null
  };
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];

  constructor(private readonly exitCode = 0) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    const now = new Date().toISOString();
    return {
      exitCode: this.exitCode,
      stdout: "",
      stderr: this.exitCode === 0 ? "" : "setup failed",
      startedAt: now,
      finishedAt: now
    };
  }
}

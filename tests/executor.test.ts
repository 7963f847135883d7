import { describe, it, expect } from "vitest";
import { Executor } from "../src/benchmark/executor.js";
import { taskConfigFromDefinition, type TaskConfig } from "../src/benchmark/taskConfig.js";
import { UnsupportedDatasetShapeError } from "../src/core/errors.js";
import type { BenchmarkSettings } from "../src/config/settings.js";
import { constantPredictor } from "../src/frameworks/builtin/constantPredictor.js";
import type { FrameworkAdapter } from "../src/frameworks/types.js";
import { parseBenchmarkDefinition } from "../src/benchmark/catalog.js";
import {
  FakeDatasetService,
  FIXED_CAPACITY,
  alwaysThrows,
  makeCatalog,
  makeFrameworks,
  makeSettings
} from "./support.js";

const frameworks = makeFrameworks();

function unitFor(settings: BenchmarkSettings, taskName: string, fold = 0) {
  const taskDef = makeCatalog(settings).get(taskName);
  return { taskDef, fold, template: taskConfigFromDefinition(taskDef, fold, settings) };
}

function executorFor(settings: BenchmarkSettings, datasets = new FakeDatasetService()) {
  return new Executor({ settings, datasets, systemCapacity: () => FIXED_CAPACITY });
}

describe("Executor", () => {
  it("scores a successful run with every configured metric", async () => {
    const settings = makeSettings();
    const datasets = new FakeDatasetService();
    const result = await executorFor(settings, datasets).execute(
      unitFor(settings, "blobs"),
      constantPredictor,
      frameworks.get("constantpredictor")
    );

    expect(result.kind).toBe("scored");
    expect(result).toMatchObject({
      id: "openml.org/t/1001",
      task: "blobs",
      framework: "constantpredictor",
      version: "stable",
      fold: 0,
      mode: "local",
      metric: "acc",
      modelsCount: 1,
      info: null
    });
    expect(result.result).toBeCloseTo(1 / 3, 12);
    expect(result.scores.acc).toBeCloseTo(1 / 3, 12);
    expect(result.scores.logloss).toBeCloseTo((Math.log(2) + Math.log(3) + Math.log(6)) / 3, 12);
    expect(datasets.released).toBe(1);
  });

  it("hands the adapter a specialized config", async () => {
    const settings = makeSettings({}, "/work");
    const seen: TaskConfig[] = [];
    const spy: FrameworkAdapter = {
      async run(dataset, config) {
        seen.push(config);
        return constantPredictor.run(dataset, config);
      }
    };
    const unit = unitFor(settings, "ramp", 1);
    await executorFor(settings).execute(unit, spy, frameworks.get("constantpredictor"));

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      type: "regression",
      framework: "constantpredictor",
      cores: 8,
      maxMemSizeMb: 7168,
      outputPredictionsFile: "/work/output/predictions/constantpredictor_ramp_1.csv"
    });
    expect(unit.template.type).toBeNull();
  });

  it("turns an adapter failure into a truncated NoResult", async () => {
    const settings = makeSettings({ results: { save: true, error_max_length: 20 } });
    const datasets = new FakeDatasetService();
    const longFailure: FrameworkAdapter = {
      async run() {
        throw new Error("x".repeat(50));
      }
    };
    const result = await executorFor(settings, datasets).execute(
      unitFor(settings, "blobs"),
      longFailure,
      frameworks.get("always_throws")
    );

    expect(result.kind).toBe("no_result");
    expect(result.info).toBe("Error: xxxxxxxxxx...");
    expect(result.result).toBeNull();
    expect(result.scores).toEqual({});
    expect(result.version).toBe("0.0.1");
    expect(Number.isNaN(result.duration)).toBe(true);
    expect(datasets.released).toBe(1);
  });

  it("keeps short error messages whole", async () => {
    const settings = makeSettings();
    const result = await executorFor(settings).execute(unitFor(settings, "blobs"), alwaysThrows, frameworks.get("always_throws"));
    expect(result.info).toBe("Error: boom");
  });

  it("applies task and framework overrides", async () => {
    const settings = makeSettings({ overrides: { t: { metric: "balacc" }, f: { depth: 2 } } });
    const result = await executorFor(settings).execute(
      unitFor(settings, "blobs"),
      constantPredictor,
      frameworks.get("constantpredictor")
    );
    expect(result.metric).toBe("balacc");
    expect(Object.keys(result.scores)).toEqual(["balacc", "acc", "logloss"]);
    expect(result.result).toBeCloseTo(1 / 3, 12);
    expect(result.scores.acc).toBeCloseTo(1 / 3, 12);
    expect(result.scores.logloss).toBeCloseTo((Math.log(2) + Math.log(3) + Math.log(6)) / 3, 12);
    expect(result.params).toEqual({ depth: 2 });
  });

  it("stores null for unsupported metrics", async () => {
    const settings = makeSettings({ overrides: { t: { metrics: ["acc", "made_up"] } } });
    const result = await executorFor(settings).execute(
      unitFor(settings, "blobs"),
      constantPredictor,
      frameworks.get("constantpredictor")
    );
    expect(result.scores.made_up).toBeNull();
    expect(result.scores.acc).toBeCloseTo(1 / 3, 12);
  });

  it("lets dataset loading failures propagate", async () => {
    const settings = makeSettings();
    const taskDef = parseBenchmarkDefinition("raw", [{ name: "byid", openml_dataset_id: 61 }], settings.taskDefaults()).get(
      "byid"
    );
    await expect(
      executorFor(settings).execute(
        { taskDef, fold: 0, template: taskConfigFromDefinition(taskDef, 0, settings) },
        constantPredictor,
        frameworks.get("constantpredictor")
      )
    ).rejects.toBeInstanceOf(UnsupportedDatasetShapeError);
  });
});

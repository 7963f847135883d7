import { describe, it, expect } from "vitest";
import path from "path";
import {
  applyTaskOverrides,
  mergeFrameworkParams,
  predictionsFilePath,
  specializeTaskConfig,
  taskConfigFromDefinition
} from "../src/benchmark/taskConfig.js";
import { makeCatalog, makeSettings } from "./support.js";

const settings = makeSettings({}, "/work");
const catalog = makeCatalog(settings);

describe("task config", () => {
  it("builds a frozen template per task and fold", () => {
    const template = taskConfigFromDefinition(catalog.get("ramp"), 1, settings);
    expect(template).toEqual({
      name: "ramp",
      fold: 1,
      metrics: ["rmse", "mae", "r2"],
      metric: "rmse",
      seed: 0,
      maxRuntimeSeconds: 600,
      cores: -1,
      maxMemSizeMb: -1,
      inputDir: "/work/input",
      outputDir: "/work/output/predictions",
      outputPredictionsFile: "/work/output/predictions/predictions.csv",
      type: null,
      framework: null,
      frameworkParams: {}
    });
    expect(Object.isFrozen(template)).toBe(true);
  });

  it("applies metric before metrics", () => {
    const template = taskConfigFromDefinition(catalog.get("blobs"), 0, settings);
    expect(applyTaskOverrides(template, { metric: "auc" })).toMatchObject({ metric: "auc", metrics: ["auc", "acc", "logloss"] });
    expect(applyTaskOverrides(template, { metric: "logloss" })).toMatchObject({
      metric: "logloss",
      metrics: ["logloss", "acc"]
    });
    expect(applyTaskOverrides(template, { metric: "auc", metrics: ["balacc", "acc"] })).toMatchObject({
      metric: "balacc",
      metrics: ["balacc", "acc"]
    });
    expect(applyTaskOverrides(template, { seed: 7, max_runtime_seconds: 30 })).toMatchObject({
      seed: 7,
      maxRuntimeSeconds: 30
    });
    expect(applyTaskOverrides(template, null)).toBe(template);
  });

  it("specializes into a copy and leaves the template untouched", () => {
    const template = taskConfigFromDefinition(catalog.get("blobs"), 0, settings);
    const config = specializeTaskConfig(template, {
      type: "classification",
      framework: "ConstantPredictor",
      frameworkParams: { depth: 2 },
      taskOverrides: { seed: 9 },
      resources: { cores: 4, maxMemSizeMb: 1024 }
    });
    expect(config).not.toBe(template);
    expect(Object.isFrozen(config)).toBe(true);
    expect(config).toMatchObject({
      type: "classification",
      framework: "ConstantPredictor",
      frameworkParams: { depth: 2 },
      seed: 9,
      cores: 4,
      maxMemSizeMb: 1024,
      outputPredictionsFile: "/work/output/predictions/constantpredictor_blobs_0.csv"
    });
    expect(template).toMatchObject({ type: null, framework: null, seed: 0, cores: -1, maxMemSizeMb: -1 });
  });

  it("merges framework parameter overrides", () => {
    expect(mergeFrameworkParams({ depth: 3, lr: 0.1 }, { lr: 0.5, extra: "x" })).toEqual({ depth: 3, lr: 0.5, extra: "x" });
    expect(mergeFrameworkParams({ depth: 3 }, null)).toEqual({ depth: 3 });
  });

  it("names prediction files by framework, task and fold", () => {
    expect(predictionsFilePath("/out", "RandomGuess", "blobs", 3)).toBe(path.join("/out", "randomguess_blobs_3.csv"));
  });
});

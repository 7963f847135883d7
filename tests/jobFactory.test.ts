import { describe, it, expect } from "vitest";
import { Executor } from "../src/benchmark/executor.js";
import { JobFactory, resolveFolds } from "../src/benchmark/jobFactory.js";
import { FoldOutOfRangeError, InvalidFoldSpecError } from "../src/core/errors.js";
import { constantPredictor } from "../src/frameworks/builtin/constantPredictor.js";
import { FakeDatasetService, FIXED_CAPACITY, makeCatalog, makeFrameworks, makeSettings } from "./support.js";

const settings = makeSettings();
const catalog = makeCatalog(settings);

describe("resolveFolds", () => {
  const blobs = catalog.get("blobs");

  it("expands every fold when none is given", () => {
    expect(resolveFolds(blobs, undefined)).toEqual([0, 1]);
    expect(resolveFolds(blobs, null)).toEqual([0, 1]);
  });

  it("accepts a single fold or a list", () => {
    expect(resolveFolds(blobs, 1)).toEqual([1]);
    expect(resolveFolds(blobs, [1, 0])).toEqual([1, 0]);
  });

  it("rejects other shapes", () => {
    expect(() => resolveFolds(blobs, "1")).toThrow(InvalidFoldSpecError);
    expect(() => resolveFolds(blobs, 0.5)).toThrow(InvalidFoldSpecError);
    expect(() => resolveFolds(blobs, [0, "1"])).toThrow(InvalidFoldSpecError);
  });

  it("rejects out-of-range folds before anything is built", () => {
    expect(() => resolveFolds(blobs, [0, 2])).toThrow(FoldOutOfRangeError);
    expect(() => resolveFolds(blobs, -1)).toThrow("Fold value -1 is out of range for task blobs.");
  });
});

describe("JobFactory", () => {
  it("creates one deferred job per fold", async () => {
    const datasets = new FakeDatasetService();
    const executor = new Executor({ settings, datasets, systemCapacity: () => FIXED_CAPACITY });
    const factory = new JobFactory({
      settings,
      executor,
      adapter: constantPredictor,
      framework: makeFrameworks().get("constantpredictor")
    });

    const jobs = factory.expand(catalog.get("blobs"));
    expect(jobs.map((j) => j.name)).toEqual(["local_blobs_0_constantpredictor", "local_blobs_1_constantpredictor"]);
    expect(datasets.loads).toHaveLength(0);

    const [first] = jobs;
    if (!first) throw new Error("expected a job");
    const result = await first.run();
    expect(result.fold).toBe(0);
    expect(datasets.loads).toEqual([{ ref: { kind: "openml_task", taskId: 1001 }, fold: 0 }]);
  });
});

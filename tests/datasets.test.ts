import { describe, it, expect } from "vitest";
import path from "path";
import { UnsupportedDatasetShapeError } from "../src/core/errors.js";
import { InMemoryDataset } from "../src/datasets/inMemoryDataset.js";
import { JsonDatasetService, taskFilePath } from "../src/datasets/jsonDatasetService.js";
import { blobsFold } from "./support.js";

const fixtures = path.resolve("tests/fixtures");

describe("InMemoryDataset", () => {
  it("derives sorted class labels when none are declared", () => {
    const dataset = new InMemoryDataset({ ...blobsFold(), test: { X: [[0]], y: ["c"] }, train: { X: [[0], [1]], y: ["b", "a"] } });
    expect(dataset.target.values).toEqual(["a", "b", "c"]);
    expect(dataset.target.isCategorical()).toBe(true);
  });

  it("has no labels for continuous targets", () => {
    const dataset = new InMemoryDataset({ ...blobsFold(), target: { name: "y", categorical: false } });
    expect(dataset.target.values).toEqual([]);
  });

  it("releases its data once", () => {
    let releases = 0;
    const dataset = new InMemoryDataset({
      ...blobsFold(),
      onRelease: () => {
        releases++;
      }
    });
    dataset.release();
    dataset.release();
    expect(releases).toBe(1);
    expect(dataset.released).toBe(true);
    expect(() => dataset.test).toThrow("dataset already released");
  });
});

describe("JsonDatasetService", () => {
  const service = new JsonDatasetService(fixtures);

  it("loads one fold of a task file", async () => {
    const dataset = await service.load({ kind: "openml_task", taskId: 7 }, 1);
    expect(dataset.features).toEqual(["size", "colour"]);
    expect(dataset.target.values).toEqual(["no", "yes"]);
    expect(dataset.train.y).toEqual(["yes", "no", "no"]);
    expect(dataset.test.X).toEqual([[2.5, "red"]]);
  });

  it("rejects folds the file does not hold", async () => {
    await expect(service.load({ kind: "openml_task", taskId: 7 }, 2)).rejects.toThrow(
      `task file ${taskFilePath(fixtures, 7)} has 2 folds, fold 2 requested`
    );
  });

  it("rejects dataset references it cannot serve", async () => {
    await expect(service.load({ kind: "openml_dataset", datasetId: 61 }, 0)).rejects.toThrow(
      new UnsupportedDatasetShapeError("OpenML datasets without task_id are not supported yet.")
    );
    await expect(service.load({ kind: "raw", spec: {} }, 0)).rejects.toThrow("Raw datasets are not supported yet.");
  });
});

import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import type { DatasetRef } from "../benchmark/catalog.js";
import { UnsupportedDatasetShapeError } from "../core/errors.js";
import { getLogger } from "../core/log.js";
import { InMemoryDataset } from "./inMemoryDataset.js";
import type { Dataset, DatasetService } from "./types.js";

const log = getLogger("datasets");

const zFeatureValue = z.union([z.number(), z.string(), z.null()]);
const zTargetValue = z.union([z.number(), z.string()]);
const zSplit = z.object({
  X: z.array(z.array(zFeatureValue)),
  y: z.array(zTargetValue)
});

const zTaskFile = z.object({
  name: z.string().optional(),
  features: z.array(z.string()),
  target: z.object({
    name: z.string(),
    type: z.enum(["categorical", "numeric"]),
    values: z.array(z.string()).optional()
  }),
  folds: z.array(z.object({ train: zSplit, test: zSplit })).min(1)
});

export type TaskFile = z.infer<typeof zTaskFile>;

export function taskFilePath(inputDir: string, taskId: number): string {
  return path.join(inputDir, `task_${taskId}.json`);
}

/**
 * Serves OpenML-style task references from `task_<id>.json` files holding
 * pre-split folds. Dataset ids without a task and raw dataset specs are not
 * supported.
 */
export class JsonDatasetService implements DatasetService {
  constructor(private readonly inputDir: string) {}

  async load(ref: DatasetRef, fold: number): Promise<Dataset> {
    if (ref.kind === "openml_dataset") {
      throw new UnsupportedDatasetShapeError("OpenML datasets without task_id are not supported yet.");
    }
    if (ref.kind === "raw") {
      throw new UnsupportedDatasetShapeError("Raw datasets are not supported yet.");
    }

    const filePath = taskFilePath(this.inputDir, ref.taskId);
    const raw = JSON.parse(await fs.readFile(filePath, "utf8")) as unknown;
    const parsed = zTaskFile.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`invalid task file ${filePath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }

    const file = parsed.data;
    const split = file.folds[fold];
    if (!split) {
      throw new Error(`task file ${filePath} has ${file.folds.length} folds, fold ${fold} requested`);
    }

    log.debug(`Loaded dataset for task_id ${ref.taskId}, fold ${fold}.`);
    return new InMemoryDataset({
      features: file.features,
      target: {
        name: file.target.name,
        categorical: file.target.type === "categorical",
        ...(file.target.values ? { values: file.target.values } : {})
      },
      train: split.train,
      test: split.test
    });
  }
}

import type { BenchmarkSettings } from "../config/settings.js";
import { FoldOutOfRangeError, InvalidFoldSpecError } from "../core/errors.js";
import { Job } from "../execution/job.js";
import type { FrameworkAdapter } from "../frameworks/types.js";
import type { TaskDefinition } from "./catalog.js";
import type { Executor } from "./executor.js";
import type { FrameworkDefinition } from "./frameworks.js";
import { taskConfigFromDefinition } from "./taskConfig.js";

export type FoldSpec = number | readonly number[] | undefined;

function isFold(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * Accepts `undefined` (all folds), a single integer or a list of integers.
 * Every requested fold is checked before any job exists.
 */
export function resolveFolds(taskDef: TaskDefinition, folds: unknown): number[] {
  let requested: number[];
  if (folds === undefined || folds === null) {
    requested = Array.from({ length: taskDef.folds }, (_, i) => i);
  } else if (isFold(folds)) {
    requested = [folds];
  } else if (Array.isArray(folds) && folds.every(isFold)) {
    requested = [...folds];
  } else {
    throw new InvalidFoldSpecError();
  }

  for (const fold of requested) {
    if (fold < 0 || fold >= taskDef.folds) throw new FoldOutOfRangeError(fold, taskDef.name);
  }
  return requested;
}

export interface JobFactoryDeps {
  settings: BenchmarkSettings;
  executor: Executor;
  adapter: FrameworkAdapter;
  framework: FrameworkDefinition;
}

export class JobFactory {
  constructor(private readonly deps: JobFactoryDeps) {}

  expand(taskDef: TaskDefinition, folds?: FoldSpec): Job[] {
    const { settings, executor, adapter, framework } = this.deps;
    return resolveFolds(taskDef, folds).map((fold) => {
      const template = taskConfigFromDefinition(taskDef, fold, settings);
      return new Job({ scope: "local", taskName: taskDef.name, fold, frameworkName: framework.name }, () =>
        executor.execute({ taskDef, fold, template }, adapter, framework)
      );
    });
  }
}

import type { BenchmarkSettings } from "../config/settings.js";
import { getLogger } from "../core/log.js";
import type { DatasetService } from "../datasets/types.js";
import type { FrameworkAdapter } from "../frameworks/types.js";
import { computeScores, errorInfo, noResult, type ResultContext } from "../results/taskResult.js";
import type { TaskResult } from "../results/types.js";
import type { TaskDefinition } from "./catalog.js";
import type { FrameworkDefinition } from "./frameworks.js";
import { estimateResources, logResourceEstimate, readSystemCapacity, type SystemCapacity } from "./resources.js";
import { mergeFrameworkParams, specializeTaskConfig, type TaskConfig } from "./taskConfig.js";

const log = getLogger("executor");

export interface ExecutionUnit {
  taskDef: TaskDefinition;
  fold: number;
  /** Template built once per (task, fold); never mutated. */
  template: TaskConfig;
}

export interface ExecutorDeps {
  settings: BenchmarkSettings;
  datasets: DatasetService;
  /** Defaults to live figures from the os module, read per job. */
  systemCapacity?: () => SystemCapacity;
}

function describeConfig(config: TaskConfig): string {
  return JSON.stringify(config, null, 2);
}

export class Executor {
  private readonly systemCapacity: () => SystemCapacity;

  constructor(private readonly deps: ExecutorDeps) {
    this.systemCapacity = deps.systemCapacity ?? readSystemCapacity;
  }

  /**
   * Runs one framework against one (task, fold). Always resolves with a result
   * once the dataset is loaded; a failing dataset load rejects.
   */
  async execute(unit: ExecutionUnit, adapter: FrameworkAdapter, framework: FrameworkDefinition): Promise<TaskResult> {
    const { taskDef, fold, template } = unit;
    const dataset = await this.deps.datasets.load(taskDef.dataset, fold);

    try {
      const type = dataset.target.isCategorical() ? "classification" : "regression";
      const estimate = estimateResources(
        { cores: template.cores, maxMemSizeMb: template.maxMemSizeMb },
        this.systemCapacity(),
        this.deps.settings.osMemSizeMb()
      );
      logResourceEstimate(taskDef.name, estimate);

      const config = specializeTaskConfig(template, {
        type,
        framework: framework.name,
        frameworkParams: mergeFrameworkParams(framework.params, this.deps.settings.frameworkOverrides()),
        taskOverrides: this.deps.settings.taskOverrides(),
        resources: estimate
      });

      const ctx: ResultContext = {
        taskDef,
        fold,
        framework: framework.name,
        version: framework.version,
        params: config.frameworkParams,
        metrics: config.metrics
      };
      // scoring happens after release, so keep what it needs
      const truth = [...dataset.test.y];
      const labels = [...dataset.target.values];

      try {
        log.info(`Running task ${taskDef.name} on framework ${framework.name} with config:\n${describeConfig(config)}`);
        const meta = await adapter.run(dataset, config);
        dataset.release();
        return computeScores(ctx, meta, truth, labels);
      } catch (e) {
        log.error(`Task ${taskDef.name} (fold ${fold}) failed on framework ${framework.name}.`, e);
        return noResult(ctx, errorInfo(e, this.deps.settings.errorMaxLength()));
      }
    } finally {
      dataset.release();
    }
  }
}

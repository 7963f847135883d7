import path from "path";
import type { BenchmarkSettings, TaskOverrides } from "../config/settings.js";
import { toJsonValue, type JsonObject } from "../core/json.js";
import { metricList, type TaskDefinition } from "./catalog.js";
import type { ResourceEstimate } from "./resources.js";

export type TaskType = "classification" | "regression";

/**
 * Job-specific configuration handed to a framework adapter. Instances are
 * frozen: specialization always returns a copy, so the template built for a
 * (task, fold) pair is shared safely between jobs.
 */
export interface TaskConfig {
  readonly name: string;
  readonly fold: number;
  readonly metrics: readonly string[];
  readonly metric: string;
  readonly seed: number;
  readonly maxRuntimeSeconds: number;
  readonly cores: number;
  readonly maxMemSizeMb: number;
  readonly inputDir: string;
  readonly outputDir: string;
  readonly outputPredictionsFile: string;
  readonly type: TaskType | null;
  readonly framework: string | null;
  readonly frameworkParams: JsonObject;
}

function normalizeMetrics(metric: string | readonly string[]): { metrics: readonly string[]; metric: string } {
  const metrics = metricList(metric);
  const first = metrics[0];
  if (first === undefined) throw new Error("at least one metric is required");
  return { metrics: Object.freeze(metrics), metric: first };
}

export function taskConfigFromDefinition(def: TaskDefinition, fold: number, settings: BenchmarkSettings): TaskConfig {
  const outputDir = settings.predictionsDir();
  return Object.freeze({
    name: def.name,
    fold,
    ...normalizeMetrics(def.metric),
    seed: def.seed,
    maxRuntimeSeconds: def.maxRuntimeSeconds,
    cores: def.cores,
    maxMemSizeMb: def.maxMemSizeMb,
    inputDir: settings.inputDir(),
    outputDir,
    outputPredictionsFile: path.join(outputDir, "predictions.csv"),
    type: null,
    framework: null,
    frameworkParams: Object.freeze({})
  });
}

/**
 * Applies task overrides in a fixed order: max_runtime_seconds, metric,
 * metrics, seed. `metric` changes the main metric and moves it to the front of
 * the scored list; `metrics` replaces the list and its first entry becomes the
 * main metric.
 */
export function applyTaskOverrides(config: TaskConfig, overrides: TaskOverrides | null): TaskConfig {
  if (!overrides) return config;
  let next: TaskConfig = config;
  if (overrides.max_runtime_seconds !== undefined) {
    next = { ...next, maxRuntimeSeconds: overrides.max_runtime_seconds };
  }
  if (overrides.metric !== undefined) {
    const metric = overrides.metric;
    next = { ...next, metric, metrics: Object.freeze([metric, ...next.metrics.filter((m) => m !== metric)]) };
  }
  if (overrides.metrics !== undefined) {
    next = { ...next, ...normalizeMetrics(overrides.metrics) };
  }
  if (overrides.seed !== undefined) {
    next = { ...next, seed: overrides.seed };
  }
  return next === config ? config : Object.freeze(next);
}

export function mergeFrameworkParams(params: JsonObject, overrides: Record<string, unknown> | null): JsonObject {
  if (!overrides) return { ...params };
  const merged: JsonObject = { ...params };
  for (const [key, value] of Object.entries(overrides)) {
    merged[key] = toJsonValue(value ?? null);
  }
  return merged;
}

export function predictionsFilePath(outputDir: string, frameworkName: string, taskName: string, fold: number): string {
  return path.join(outputDir, `${frameworkName.toLowerCase()}_${taskName}_${fold}.csv`);
}

export interface TaskConfigSpecialization {
  type: TaskType;
  framework: string;
  frameworkParams: JsonObject;
  taskOverrides: TaskOverrides | null;
  resources: Pick<ResourceEstimate, "cores" | "maxMemSizeMb">;
}

export function specializeTaskConfig(template: TaskConfig, spec: TaskConfigSpecialization): TaskConfig {
  const withOverrides = applyTaskOverrides(template, spec.taskOverrides);
  return Object.freeze({
    ...withOverrides,
    type: spec.type,
    framework: spec.framework,
    frameworkParams: Object.freeze({ ...spec.frameworkParams }),
    outputPredictionsFile: predictionsFilePath(template.outputDir, spec.framework, template.name, template.fold),
    cores: spec.resources.cores,
    maxMemSizeMb: spec.resources.maxMemSizeMb
  });
}

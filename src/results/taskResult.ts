import type { DatasetRef, TaskDefinition } from "../benchmark/catalog.js";
import { errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { getLogger } from "../core/log.js";
import type { TargetValue } from "../datasets/types.js";
import type { FrameworkMetaResult } from "../frameworks/types.js";
import { computeMetric } from "./metrics.js";
import type { NoResult, ScoredResult } from "./types.js";

const log = getLogger("results");

export const TRUNCATION_MARKER = "...";

export interface ResultContext {
  taskDef: TaskDefinition;
  fold: number;
  framework: string;
  version: string;
  params: JsonObject;
  metrics: readonly string[];
  tag?: string | null;
  now?: () => Date;
}

export function datasetIdOf(ref: DatasetRef): string | null {
  switch (ref.kind) {
    case "openml_task":
      return `openml.org/t/${ref.taskId}`;
    case "openml_dataset":
      return `openml.org/d/${ref.datasetId}`;
    case "raw":
      return null;
  }
}

/** Keeps messages up to `maxLength`; longer ones are cut so that the result, marker included, is exactly `maxLength` long. */
export function truncateMessage(message: string, maxLength: number): string {
  if (message.length <= maxLength) return message;
  return message.slice(0, Math.max(0, maxLength - TRUNCATION_MARKER.length)) + TRUNCATION_MARKER;
}

export function errorInfo(err: unknown, maxLength: number): string {
  return truncateMessage(`Error: ${errorMessage(err)}`, maxLength);
}

function identity(ctx: ResultContext) {
  const metric = ctx.metrics[0] ?? "";
  return {
    id: datasetIdOf(ctx.taskDef.dataset),
    task: ctx.taskDef.name,
    framework: ctx.framework,
    version: ctx.version,
    fold: ctx.fold,
    mode: "local" as const,
    metric,
    params: ctx.params,
    tag: ctx.tag ?? null,
    utcTime: (ctx.now ?? (() => new Date()))().toISOString()
  };
}

export function noResult(ctx: ResultContext, info: string): NoResult {
  return {
    kind: "no_result",
    ...identity(ctx),
    result: null,
    scores: {},
    modelsCount: null,
    info,
    duration: Number.NaN
  };
}

export function computeScores(
  ctx: ResultContext,
  meta: FrameworkMetaResult,
  truth: readonly TargetValue[],
  labels: readonly string[]
): ScoredResult {
  const scores: Record<string, number | null> = {};
  for (const metric of ctx.metrics) {
    const value = computeMetric(metric, {
      truth,
      predictions: meta.predictions,
      probabilities: meta.probabilities ?? null,
      labels
    });
    if (value === null) log.warn(`Metric ${metric} is not supported, no score computed for task ${ctx.taskDef.name}.`);
    scores[metric] = value;
  }

  const id = identity(ctx);
  return {
    kind: "scored",
    ...id,
    version: meta.version ?? id.version,
    result: scores[id.metric] ?? null,
    scores,
    modelsCount: meta.modelsCount ?? null,
    info: null,
    duration: typeof meta.duration === "number" ? meta.duration : Number.NaN
  };
}

import type { JsonObject } from "../core/json.js";

interface ResultIdentity {
  /** `openml.org/t/<id>` for task references, `openml.org/d/<id>` for datasets, null for raw specs. */
  id: string | null;
  task: string;
  framework: string;
  version: string;
  fold: number;
  mode: "local";
  metric: string;
  params: JsonObject;
  tag: string | null;
  utcTime: string;
  /** Seconds; NaN until reconciled when the framework reported none. */
  duration: number;
}

export interface ScoredResult extends ResultIdentity {
  kind: "scored";
  /** Value of the main metric. */
  result: number | null;
  scores: Record<string, number | null>;
  modelsCount: number | null;
  info: null;
}

export interface NoResult extends ResultIdentity {
  kind: "no_result";
  result: null;
  scores: Record<string, never>;
  modelsCount: null;
  info: string;
}

export type TaskResult = ScoredResult | NoResult;

export function isNoResult(result: TaskResult): result is NoResult {
  return result.kind === "no_result";
}

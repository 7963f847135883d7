import type { JsonObject } from "../core/json.js";
import type { TaskResult } from "./types.js";

export type ScoreboardScope =
  | { kind: "task"; taskName: string }
  | { kind: "benchmark"; benchmarkName: string }
  | { kind: "all" };

export function scopeKey(scope: ScoreboardScope): string {
  switch (scope.kind) {
    case "task":
      return `task:${scope.taskName}`;
    case "benchmark":
      return `benchmark:${scope.benchmarkName}`;
    case "all":
      return "all";
  }
}

export const ALL_SCOPE: ScoreboardScope = { kind: "all" };

const PRINT_COLUMNS = ["task", "framework", "fold", "result", "metric", "duration", "info"] as const;

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

export function toJsonRow(result: TaskResult): JsonObject {
  return {
    kind: result.kind,
    id: result.id,
    task: result.task,
    framework: result.framework,
    version: result.version,
    fold: result.fold,
    mode: result.mode,
    metric: result.metric,
    result: finiteOrNull(result.result),
    scores: { ...result.scores },
    models_count: result.modelsCount,
    duration: finiteOrNull(result.duration),
    info: result.info,
    params: result.params,
    tag: result.tag,
    utc_time: result.utcTime
  };
}

function cell(result: TaskResult, column: (typeof PRINT_COLUMNS)[number]): string {
  switch (column) {
    case "result": {
      const v = finiteOrNull(result.result);
      return v === null ? "" : v.toFixed(6);
    }
    case "duration": {
      const v = finiteOrNull(result.duration);
      return v === null ? "" : v.toFixed(1);
    }
    case "fold":
      return String(result.fold);
    case "info":
      return result.info ?? "";
    default:
      return result[column];
  }
}

/** Ordered results for one task or one benchmark run. Immutable; `append` returns a new board. */
export class Scoreboard {
  readonly rows: readonly TaskResult[];

  constructor(
    rows: readonly TaskResult[],
    readonly scope: ScoreboardScope,
    readonly frameworkName: string | null = null
  ) {
    this.rows = Object.freeze([...rows]);
  }

  get scopeKey(): string {
    return scopeKey(this.scope);
  }

  append(other: Scoreboard): Scoreboard {
    return new Scoreboard([...this.rows, ...other.rows], this.scope, this.frameworkName);
  }

  toJsonRows(): JsonObject[] {
    return this.rows.map(toJsonRow);
  }

  toPrintableTable(): string {
    const header: string[] = [...PRINT_COLUMNS];
    const table = [header, ...this.rows.map((r) => PRINT_COLUMNS.map((c) => cell(r, c)))];
    const widths = PRINT_COLUMNS.map((_, i) => Math.max(...table.map((row) => (row[i] ?? "").length)));
    return table.map((row) => row.map((v, i) => v.padEnd(widths[i] ?? 0)).join("  ").trimEnd()).join("\n");
  }
}

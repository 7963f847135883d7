import type { Kysely, Selectable } from "kysely";
import type { BoardId } from "../core/ids.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import type { DB, ResultsTable } from "../db/types.js";
import type { TaskResult } from "../results/types.js";

export interface AppendMeta {
  boardId: BoardId;
  benchmarkUid: string | null;
  settingsHash: string | null;
}

export interface ResultStore {
  appendRows(scope: string, rows: readonly TaskResult[], meta: AppendMeta): Promise<void>;
  loadRows(scope: string): Promise<TaskResult[]>;
}

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

function toScores(value: unknown): Record<string, number | null> {
  const out: Record<string, number | null> = {};
  if (!isJsonObject(value)) return out;
  for (const [k, v] of Object.entries(value)) out[k] = typeof v === "number" ? v : null;
  return out;
}

function toParams(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

function rowToResult(row: Selectable<ResultsTable>): TaskResult {
  const base = {
    id: row.dataset_id,
    task: row.task,
    framework: row.framework,
    version: row.version,
    fold: row.fold,
    mode: "local" as const,
    metric: row.metric,
    params: toParams(row.params),
    tag: row.tag,
    utcTime: row.utc_time,
    duration: row.duration ?? Number.NaN
  };
  if (row.kind === "no_result") {
    return { kind: "no_result", ...base, result: null, scores: {}, modelsCount: null, info: row.info ?? "" };
  }
  return {
    kind: "scored",
    ...base,
    result: row.result,
    scores: toScores(row.scores),
    modelsCount: row.models_count,
    info: null
  };
}

export class PostgresResultStore implements ResultStore {
  constructor(private readonly db: Kysely<DB>) {}

  async appendRows(scope: string, rows: readonly TaskResult[], meta: AppendMeta): Promise<void> {
    if (!rows.length) return;
    await this.db
      .insertInto("results")
      .values(
        rows.map((r) => ({
          scope,
          board_id: meta.boardId,
          benchmark_uid: meta.benchmarkUid,
          settings_hash: meta.settingsHash,
          kind: r.kind,
          task: r.task,
          framework: r.framework,
          version: r.version,
          fold: r.fold,
          dataset_id: r.id,
          mode: r.mode,
          metric: r.metric,
          result: finiteOrNull(r.result),
          duration: finiteOrNull(r.duration),
          models_count: r.modelsCount,
          info: r.info,
          scores: r.scores,
          params: r.params,
          tag: r.tag,
          utc_time: r.utcTime
        }))
      )
      .execute();
  }

  async loadRows(scope: string): Promise<TaskResult[]> {
    const rows = await this.db
      .selectFrom("results")
      .selectAll()
      .where("scope", "=", scope)
      .orderBy("row_id", "asc")
      .execute();
    return rows.map(rowToResult);
  }
}

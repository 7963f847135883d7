import type { BoardId } from "../core/ids.js";
import { newBoardId } from "../core/ids.js";
import type { JobCompletion } from "../execution/runners/types.js";
import type { ResultStore } from "../store/resultStore.js";
import { ALL_SCOPE, Scoreboard, scopeKey } from "./scoreboard.js";
import type { TaskResult } from "./types.js";

export type CollectTarget = { taskName: string } | { benchmarkName: string };

/**
 * Builds a board from a batch, or returns null when no job produced a result.
 * NoResult rows are kept as visible rows.
 */
export function collectResults(
  completions: readonly JobCompletion[],
  frameworkName: string,
  target: CollectTarget
): Scoreboard | null {
  const results = completions
    .map((c) => c.result)
    .filter((r): r is TaskResult => r !== null);
  if (!results.length) return null;

  const scope = "taskName" in target
    ? { kind: "task" as const, taskName: target.taskName }
    : { kind: "benchmark" as const, benchmarkName: target.benchmarkName };
  return new Scoreboard(results, scope, frameworkName);
}

export interface PersistMeta {
  benchmarkUid: string | null;
  settingsHash: string | null;
}

/**
 * Appends the board to its own scope, then merges it into the all-time scope.
 * The two writes are independent.
 */
export async function persistScoreboard(board: Scoreboard, store: ResultStore, meta: PersistMeta): Promise<BoardId> {
  const boardId = newBoardId();
  await store.appendRows(board.scopeKey, board.rows, { boardId, ...meta });
  await store.appendRows(scopeKey(ALL_SCOPE), board.rows, { boardId, ...meta });
  return boardId;
}

export async function loadScoreboard(store: ResultStore, scopeKeyValue: string): Promise<Scoreboard> {
  const rows = await store.loadRows(scopeKeyValue);
  if (scopeKeyValue === "all") return new Scoreboard(rows, ALL_SCOPE);
  if (scopeKeyValue.startsWith("task:")) {
    return new Scoreboard(rows, { kind: "task", taskName: scopeKeyValue.slice("task:".length) });
  }
  if (scopeKeyValue.startsWith("benchmark:")) {
    return new Scoreboard(rows, { kind: "benchmark", benchmarkName: scopeKeyValue.slice("benchmark:".length) });
  }
  throw new Error(`unknown scoreboard scope: ${scopeKeyValue}`);
}

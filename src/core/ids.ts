import { ulid } from "ulid";

export type BoardId = `board_${string}`;

export interface JobKey {
  scope: "local";
  taskName: string;
  fold: number;
  frameworkName: string;
}

export function newBoardId(): BoardId {
  return `board_${ulid()}` as const;
}

export function jobName(key: JobKey): string {
  return [key.scope, key.taskName, String(key.fold), key.frameworkName].join("_");
}

function isoCompact(date: Date): string {
  // 2024-01-31T12:34:56.789Z -> 20240131T123456789
  return date.toISOString().replace(/[-:.Z]/g, "");
}

export function benchmarkUid(frameworkName: string, benchmarkName: string, now: Date = new Date()): string {
  return [frameworkName, benchmarkName, isoCompact(now)].join("-").toLowerCase();
}

import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;

export interface ResultsTable {
  row_id: Generated<number>;
  scope: string;
  board_id: string;
  benchmark_uid: OptionalNullable<string>;
  settings_hash: OptionalNullable<string>;
  kind: string;
  task: string;
  framework: string;
  version: string;
  fold: number;
  dataset_id: OptionalNullable<string>;
  mode: string;
  metric: string;
  result: OptionalNullable<number>;
  duration: OptionalNullable<number>;
  models_count: OptionalNullable<number>;
  info: OptionalNullable<string>;
  scores: Json;
  params: Json;
  tag: OptionalNullable<string>;
  utc_time: string;
  created_at: Generated<string>;
}

export interface DB {
  results: ResultsTable;
}

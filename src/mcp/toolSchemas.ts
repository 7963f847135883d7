import * as z from "zod/v4";
import { SETUP_MODES } from "../benchmark/setup.js";

const zName = z.string().min(1).max(256);
const zFold = z.number().int().min(0);

export const zScopeKey = z
  .string()
  .regex(/^(all|task:.+|benchmark:.+)$/, "scope must be 'all', 'task:<name>' or 'benchmark:<name>'");

export const zResultRow = z.object({
  kind: z.enum(["scored", "no_result"]),
  id: z.string().nullable(),
  task: z.string(),
  framework: z.string(),
  version: z.string(),
  fold: z.number().int(),
  mode: z.literal("local"),
  metric: z.string(),
  result: z.number().nullable(),
  scores: z.record(z.string(), z.number().nullable()),
  models_count: z.number().int().nullable(),
  duration: z.number().nullable(),
  info: z.string().nullable(),
  params: z.record(z.string(), z.unknown()),
  tag: z.string().nullable(),
  utc_time: z.string()
});

export const zTaskSummary = z.object({
  name: z.string(),
  folds: z.number().int(),
  metrics: z.array(z.string()),
  enabled: z.boolean(),
  dataset_id: z.string().nullable()
});

export const zBenchmarkTasksInput = z.object({
  benchmark: zName
});

export const zBenchmarkTasksOutput = z.object({
  benchmark: z.string(),
  tasks: z.array(zTaskSummary)
});

export const zBenchmarkRunInput = z.object({
  framework: zName,
  benchmark: zName,
  task: z.union([zName, z.array(zName).min(1)]).optional(),
  fold: z.union([zFold, z.array(zFold).min(1)]).optional(),
  setup_mode: z.enum(SETUP_MODES).default("auto"),
  parallel_jobs: z.number().int().min(1).max(64).optional()
});

export const zBenchmarkRunOutput = z.object({
  benchmark_uid: z.string(),
  setup_ran: z.boolean(),
  scope: zScopeKey.nullable(),
  rows: z.array(zResultRow)
});

export const zScoreboardGetInput = z.object({
  scope: zScopeKey,
  limit: z.number().int().min(1).max(10_000).default(1000)
});

export const zScoreboardGetOutput = z.object({
  scope: zScopeKey,
  row_count: z.number().int(),
  rows: z.array(zResultRow)
});

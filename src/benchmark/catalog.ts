import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import type { TaskDefaults } from "../config/settings.js";
import { InvalidConfigError, TaskDisabledError, UnknownTaskError } from "../core/errors.js";
import { toJsonObject, type JsonObject } from "../core/json.js";

export type DatasetRef =
  | { kind: "openml_task"; taskId: number }
  | { kind: "openml_dataset"; datasetId: number }
  | { kind: "raw"; spec: JsonObject };

export interface TaskDefinition {
  readonly name: string;
  readonly folds: number;
  readonly metric: string | readonly string[];
  readonly seed: number;
  readonly maxRuntimeSeconds: number;
  readonly cores: number;
  readonly maxMemSizeMb: number;
  readonly enabled?: boolean | string;
  readonly dataset: DatasetRef;
}

const zTaskDefinitionInput = z.object({
  name: z.string().min(1),
  folds: z.number().int().min(1).optional(),
  metric: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  seed: z.number().int().optional(),
  max_runtime_seconds: z.number().int().positive().optional(),
  cores: z.number().int().optional(),
  max_mem_size_mb: z.number().int().optional(),
  enabled: z.union([z.boolean(), z.string()]).optional(),
  openml_task_id: z.number().int().positive().optional(),
  openml_dataset_id: z.number().int().positive().optional(),
  dataset: z.record(z.string(), z.unknown()).optional()
});

export type TaskDefinitionInput = z.input<typeof zTaskDefinitionInput>;

const TRUE_LIKE = new Set(["true", "yes", "on", "1", "y", "t"]);

export function isTaskEnabled(def: Pick<TaskDefinition, "enabled">): boolean {
  if (def.enabled === undefined) return true;
  if (typeof def.enabled === "boolean") return def.enabled;
  return TRUE_LIKE.has(def.enabled.trim().toLowerCase());
}

/** A task may declare a single metric or a list of them. */
export function metricList(metric: string | readonly string[]): string[] {
  return typeof metric === "string" ? [metric] : [...metric];
}

function datasetRefOf(input: z.infer<typeof zTaskDefinitionInput>): DatasetRef {
  const present = [input.openml_task_id, input.openml_dataset_id, input.dataset].filter((v) => v !== undefined);
  if (present.length !== 1) {
    throw new InvalidConfigError(
      `task ${input.name}: tasks should have exactly one property among [openml_task_id, openml_dataset_id, dataset]`
    );
  }
  if (input.openml_task_id !== undefined) return { kind: "openml_task", taskId: input.openml_task_id };
  if (input.openml_dataset_id !== undefined) return { kind: "openml_dataset", datasetId: input.openml_dataset_id };
  return { kind: "raw", spec: toJsonObject(input.dataset) };
}

export function toTaskDefinition(raw: unknown, defaults: TaskDefaults): TaskDefinition {
  const parsed = zTaskDefinitionInput.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new InvalidConfigError(`invalid task definition: ${issues}`);
  }
  const input = parsed.data;
  const metric = input.metric ?? defaults.metric;
  const def: TaskDefinition = {
    name: input.name,
    folds: input.folds ?? defaults.folds,
    metric: typeof metric === "string" ? metric : Object.freeze([...metric]),
    seed: input.seed ?? defaults.seed,
    maxRuntimeSeconds: input.max_runtime_seconds ?? defaults.max_runtime_seconds,
    cores: input.cores ?? defaults.cores,
    maxMemSizeMb: input.max_mem_size_mb ?? defaults.max_mem_size_mb,
    ...(input.enabled !== undefined ? { enabled: input.enabled } : {}),
    dataset: Object.freeze(datasetRefOf(input))
  };
  return Object.freeze(def);
}

export class TaskCatalog {
  private readonly defs: readonly TaskDefinition[];

  constructor(
    readonly benchmarkName: string,
    defs: readonly TaskDefinition[]
  ) {
    const seen = new Set<string>();
    for (const def of defs) {
      if (seen.has(def.name)) {
        throw new InvalidConfigError(`benchmark ${benchmarkName}: duplicate task name ${def.name}`);
      }
      seen.add(def.name);
    }
    this.defs = Object.freeze([...defs]);
  }

  all(): readonly TaskDefinition[] {
    return this.defs;
  }

  listEnabled(): TaskDefinition[] {
    return this.defs.filter((def) => isTaskEnabled(def));
  }

  get(name: string): TaskDefinition {
    const def = this.defs.find((d) => d.name === name);
    if (!def) throw new UnknownTaskError(name);
    if (!isTaskEnabled(def)) throw new TaskDisabledError(name);
    return def;
  }
}

export function parseBenchmarkDefinition(benchmarkName: string, raw: unknown, defaults: TaskDefaults): TaskCatalog {
  if (!Array.isArray(raw)) {
    throw new InvalidConfigError(`benchmark ${benchmarkName}: expected a list of task definitions`);
  }
  return new TaskCatalog(
    benchmarkName,
    raw.map((entry) => toTaskDefinition(entry, defaults))
  );
}

/**
 * Resolves `name` either as a path to a YAML file or as `<benchmarksDir>/<name>.yaml`.
 */
export async function loadBenchmarkDefinition(
  benchmarksDir: string,
  name: string,
  defaults: TaskDefaults
): Promise<TaskCatalog> {
  const isPath = name.endsWith(".yaml") || name.endsWith(".yml");
  const filePath = isPath ? path.resolve(name) : path.join(benchmarksDir, `${name}.yaml`);
  const benchmarkName = isPath ? path.basename(name).replace(/\.ya?ml$/, "") : name;

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new InvalidConfigError(`incorrect benchmark name or path: ${name} (${filePath} not found)`);
    }
    throw e;
  }
  return parseBenchmarkDefinition(benchmarkName, YAML.parse(text) as unknown, defaults);
}

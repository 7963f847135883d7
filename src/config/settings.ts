import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify, type Sha256 } from "../core/fingerprint.js";
import { InvalidConfigError } from "../core/errors.js";

export const zTaskOverrides = z.object({
  max_runtime_seconds: z.number().int().positive().optional(),
  metric: z.string().min(1).optional(),
  metrics: z.array(z.string().min(1)).min(1).optional(),
  seed: z.number().int().optional()
});

export const zOverrides = z.object({
  f: z.record(z.string(), z.unknown()).optional(),
  t: zTaskOverrides.optional()
});

export const zTaskDefaults = z.object({
  folds: z.number().int().min(1).default(10),
  max_runtime_seconds: z.number().int().positive().default(600),
  cores: z.number().int().default(-1),
  max_mem_size_mb: z.number().int().default(-1),
  seed: z.number().int().default(0),
  metric: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).default(["acc", "logloss"])
});

export const zBenchmarkConfig = z.object({
  version: z.literal(1),
  input_dir: z.string().min(1),
  output_dir: z.string().min(1),
  predictions_dir: z.string().min(1).optional(),
  setup_dir: z.string().min(1).optional(),
  frameworks_file: z.string().min(1).default("resources/frameworks.yaml"),
  benchmarks_dir: z.string().min(1).default("resources/benchmarks"),
  results: z
    .object({
      save: z.boolean().default(true),
      error_max_length: z.number().int().min(4).default(200)
    })
    .default({ save: true, error_max_length: 200 }),
  benchmarks: z
    .object({
      os_mem_size_mb: z.number().int().min(0).default(2048),
      defaults: zTaskDefaults.default({
        folds: 10,
        max_runtime_seconds: 600,
        cores: -1,
        max_mem_size_mb: -1,
        seed: 0,
        metric: ["acc", "logloss"]
      })
    })
    .default({
      os_mem_size_mb: 2048,
      defaults: { folds: 10, max_runtime_seconds: 600, cores: -1, max_mem_size_mb: -1, seed: 0, metric: ["acc", "logloss"] }
    }),
  job_runner: z
    .object({
      parallel_jobs: z.number().int().min(1).default(1),
      delay_seconds: z.number().min(0).default(5),
      done_async: z.boolean().default(true),
      poll_interval_ms: z.number().int().min(1).default(100)
    })
    .default({ parallel_jobs: 1, delay_seconds: 5, done_async: true, poll_interval_ms: 100 }),
  overrides: zOverrides.default({})
});

export type BenchmarkConfig = z.infer<typeof zBenchmarkConfig>;
export type BenchmarkConfigInput = z.input<typeof zBenchmarkConfig>;
export type TaskOverrides = z.infer<typeof zTaskOverrides>;
export type Overrides = z.infer<typeof zOverrides>;
export type TaskDefaults = z.infer<typeof zTaskDefaults>;

export interface JobRunnerSettings {
  parallelJobs: number;
  delaySeconds: number;
  doneAsync: boolean;
  pollIntervalMs: number;
}

function expandEnvToken(value: string): string {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return value;
  const v = process.env[varName]?.trim();
  if (!v) throw new InvalidConfigError(`environment variable ${varName} is not set (referenced by ${value})`);
  return v;
}

export function parseBenchmarkConfig(raw: unknown, source = "<inline>"): BenchmarkConfig {
  const parsed = zBenchmarkConfig.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new InvalidConfigError(`invalid benchmark config at ${source}: ${issues}`);
  }
  const config = parsed.data;
  return {
    ...config,
    input_dir: expandEnvToken(config.input_dir),
    output_dir: expandEnvToken(config.output_dir),
    ...(config.predictions_dir !== undefined ? { predictions_dir: expandEnvToken(config.predictions_dir) } : {}),
    ...(config.setup_dir !== undefined ? { setup_dir: expandEnvToken(config.setup_dir) } : {})
  };
}

/**
 * Parses `f.<param>=<value>` / `t.<param>=<value>` strings. Values are read as
 * YAML scalars, so `t.seed=3` yields a number and `f.verbose=true` a boolean.
 */
export function parseOverrides(entries: readonly string[]): Overrides {
  const f: Record<string, unknown> = {};
  const t: Record<string, unknown> = {};
  for (const entry of entries) {
    const eq = entry.indexOf("=");
    if (eq <= 0) throw new InvalidConfigError(`invalid override (expected key=value): ${entry}`);
    const key = entry.slice(0, eq).trim();
    const value = YAML.parse(entry.slice(eq + 1)) as unknown;
    const [group, ...rest] = key.split(".");
    const name = rest.join(".");
    if (!name) throw new InvalidConfigError(`invalid override key: ${key}`);
    if (group === "f") f[name] = value;
    else if (group === "t") t[name] = value;
    else throw new InvalidConfigError(`unknown override group in ${key} (expected f. or t.)`);
  }

  const parsed = zOverrides.safeParse({
    ...(Object.keys(f).length ? { f } : {}),
    ...(Object.keys(t).length ? { t } : {})
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`).join("; ");
    throw new InvalidConfigError(`invalid overrides: ${issues}`);
  }
  return parsed.data;
}

function mergeOverrides(base: Overrides, next: Overrides): Overrides {
  const f = base.f || next.f ? { ...(base.f ?? {}), ...(next.f ?? {}) } : undefined;
  const t = base.t || next.t ? { ...(base.t ?? {}), ...(next.t ?? {}) } : undefined;
  return { ...(f ? { f } : {}), ...(t ? { t } : {}) };
}

export class BenchmarkSettings {
  readonly settingsHash: Sha256;

  constructor(
    private readonly config: BenchmarkConfig,
    private readonly baseDir: string = process.cwd()
  ) {
    this.settingsHash = sha256Prefixed(stableJsonStringify(config));
  }

  static async loadFromFile(filePath: string): Promise<BenchmarkSettings> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = YAML.parse(raw) as unknown;
    return new BenchmarkSettings(parseBenchmarkConfig(parsed, filePath), path.dirname(path.resolve(filePath)));
  }

  static fromConfig(input: BenchmarkConfigInput, baseDir?: string): BenchmarkSettings {
    return new BenchmarkSettings(parseBenchmarkConfig(input), baseDir);
  }

  /** Later overrides win over the ones already present in the config file. */
  withOverrides(overrides: Overrides): BenchmarkSettings {
    return new BenchmarkSettings(
      { ...this.config, overrides: mergeOverrides(this.config.overrides, overrides) },
      this.baseDir
    );
  }

  withJobRunner(patch: Partial<JobRunnerSettings>): BenchmarkSettings {
    const current = this.jobRunner();
    const next = { ...current, ...patch };
    return new BenchmarkSettings(
      {
        ...this.config,
        job_runner: {
          parallel_jobs: next.parallelJobs,
          delay_seconds: next.delaySeconds,
          done_async: next.doneAsync,
          poll_interval_ms: next.pollIntervalMs
        }
      },
      this.baseDir
    );
  }

  private resolvePath(p: string): string {
    return path.resolve(this.baseDir, p);
  }

  inputDir(): string {
    return this.resolvePath(this.config.input_dir);
  }

  outputDir(): string {
    return this.resolvePath(this.config.output_dir);
  }

  predictionsDir(): string {
    return this.config.predictions_dir
      ? this.resolvePath(this.config.predictions_dir)
      : path.join(this.outputDir(), "predictions");
  }

  setupDir(): string {
    return this.config.setup_dir ? this.resolvePath(this.config.setup_dir) : path.join(this.outputDir(), "setup");
  }

  frameworksFile(): string {
    return this.resolvePath(this.config.frameworks_file);
  }

  benchmarksDir(): string {
    return this.resolvePath(this.config.benchmarks_dir);
  }

  saveResults(): boolean {
    return this.config.results.save;
  }

  errorMaxLength(): number {
    return this.config.results.error_max_length;
  }

  osMemSizeMb(): number {
    return this.config.benchmarks.os_mem_size_mb;
  }

  taskDefaults(): TaskDefaults {
    return this.config.benchmarks.defaults;
  }

  jobRunner(): JobRunnerSettings {
    const jr = this.config.job_runner;
    return {
      parallelJobs: jr.parallel_jobs,
      delaySeconds: jr.delay_seconds,
      doneAsync: jr.done_async,
      pollIntervalMs: jr.poll_interval_ms
    };
  }

  frameworkOverrides(): Record<string, unknown> | null {
    return this.config.overrides.f ?? null;
  }

  taskOverrides(): TaskOverrides | null {
    return this.config.overrides.t ?? null;
  }
}

import { BenchmarkContext } from "../src/benchmark/benchmark.js";
import { isSetupMode } from "../src/benchmark/setup.js";
import { BenchmarkSettings, parseOverrides } from "../src/config/settings.js";
import { errorMessage } from "../src/core/errors.js";
import { JsonDatasetService } from "../src/datasets/jsonDatasetService.js";
import { applySqlFile } from "../src/db/bootstrap.js";
import { createDb, createInMemoryPool, createPgPool } from "../src/db/connection.js";
import { createBuiltinRegistry } from "../src/frameworks/builtin/index.js";
import { PostgresResultStore } from "../src/store/resultStore.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/run_benchmark.ts --framework <name> --benchmark <name|file.yaml> [--task <name>]... [--fold <n>]...",
    "                               [--setup auto|skip|force|only] [--parallel-jobs <n>] [--override f.<k>=<v>|t.<k>=<v>]...",
    "                               [--config <file>]",
    "",
    "env:",
    "  FOLDBENCH_CONFIG (default config/benchmark.config.yaml)",
    "  DATABASE_URL (optional, results go to an in-memory database when unset)",
    "  FOLDBENCH_LOG_LEVEL (debug|info|warn|error)",
    ""
  ].join("\n");
}

const REPEATABLE = new Set(["task", "fold", "override"]);

function parseArgs(argv: string[]): Map<string, string[] | true> {
  const out = new Map<string, string[] | true>();
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out.set(key, true);
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    const prev = out.get(key);
    if (Array.isArray(prev) && REPEATABLE.has(key)) prev.push(next);
    else if (prev !== undefined) throw new Error(`--${key} given more than once`);
    else out.set(key, [next]);
    i++;
  }
  return out;
}

function single(args: Map<string, string[] | true>, key: string): string | undefined {
  const v = args.get(key);
  return Array.isArray(v) ? v[0] : undefined;
}

function many(args: Map<string, string[] | true>, key: string): string[] {
  const v = args.get(key);
  return Array.isArray(v) ? v : [];
}

function toInt(value: string, flag: string): number {
  if (!/^[0-9]+$/.test(value)) throw new Error(`invalid --${flag}: ${value}`);
  return Number(value);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.has("help")) {
    process.stdout.write(usage());
    return;
  }

  const framework = single(args, "framework");
  const benchmarkName = single(args, "benchmark");
  if (!framework || !benchmarkName) throw new Error(`--framework and --benchmark are required\n\n${usage()}`);

  const setupMode = single(args, "setup") ?? "auto";
  if (!isSetupMode(setupMode)) throw new Error(`invalid --setup: ${setupMode}`);

  const tasks = many(args, "task");
  const folds = many(args, "fold").map((f) => toInt(f, "fold"));
  const parallelRaw = single(args, "parallel-jobs");

  const configPath = single(args, "config") ?? process.env.FOLDBENCH_CONFIG ?? "config/benchmark.config.yaml";
  const settings = (await BenchmarkSettings.loadFromFile(configPath)).withOverrides(parseOverrides(many(args, "override")));

  const databaseUrl = process.env.DATABASE_URL;
  const pool = databaseUrl ? createPgPool(databaseUrl) : createInMemoryPool();
  const db = createDb(pool);
  try {
    if (!databaseUrl) await applySqlFile(pool);
    const context = await BenchmarkContext.load(settings, {
      adapters: createBuiltinRegistry(),
      datasets: new JsonDatasetService(settings.inputDir()),
      store: new PostgresResultStore(db)
    });
    const benchmark = await context.createBenchmark(
      framework,
      benchmarkName,
      parallelRaw !== undefined ? { parallelJobs: toInt(parallelRaw, "parallel-jobs") } : {}
    );

    await benchmark.setup(setupMode);
    if (setupMode === "only") return;

    const board = await benchmark.run(
      tasks.length ? tasks : undefined,
      folds.length ? folds : undefined
    );
    if (!board) {
      process.exitCode = 1;
      return;
    }
    process.stdout.write(`${board.toPrintableTable()}\n`);
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});

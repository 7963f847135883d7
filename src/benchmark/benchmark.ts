import type { BenchmarkSettings } from "../config/settings.js";
import { NoTaskAvailableError } from "../core/errors.js";
import { benchmarkUid } from "../core/ids.js";
import { getLogger } from "../core/log.js";
import type { DatasetService } from "../datasets/types.js";
import type { CommandRunner } from "../execution/backends/types.js";
import { LocalProcessRunner } from "../execution/backends/localProcess.js";
import { createJobRunner, reconcileDurations, type JobCompletion, type JobRunner } from "../execution/runners/index.js";
import type { AdapterRegistry } from "../frameworks/registry.js";
import type { FrameworkAdapter } from "../frameworks/types.js";
import { collectResults, persistScoreboard, type CollectTarget } from "../results/collector.js";
import type { Scoreboard } from "../results/scoreboard.js";
import type { ResultStore } from "../store/resultStore.js";
import { loadBenchmarkDefinition, type TaskCatalog, type TaskDefinition } from "./catalog.js";
import { Executor } from "./executor.js";
import { loadFrameworkDefinitions, type FrameworkDefinition, type FrameworkDefinitions } from "./frameworks.js";
import { JobFactory, type FoldSpec } from "./jobFactory.js";
import type { SystemCapacity } from "./resources.js";
import { setupFramework, type SetupMode } from "./setup.js";

const log = getLogger("benchmark");

export interface BenchmarkDeps {
  settings: BenchmarkSettings;
  framework: FrameworkDefinition;
  adapter: FrameworkAdapter;
  catalog: TaskCatalog;
  datasets: DatasetService;
  runner: JobRunner;
  store: ResultStore | null;
  commands: CommandRunner;
  systemCapacity?: () => SystemCapacity;
  now?: () => Date;
}

/** One framework against one task catalog. */
export class Benchmark {
  readonly uid: string;
  readonly frameworkName: string;
  readonly benchmarkName: string;
  private readonly factory: JobFactory;

  constructor(private readonly deps: BenchmarkDeps) {
    this.frameworkName = deps.framework.name;
    this.benchmarkName = deps.catalog.benchmarkName;
    this.uid = benchmarkUid(this.frameworkName, this.benchmarkName, (deps.now ?? (() => new Date()))());
    const executor = new Executor({
      settings: deps.settings,
      datasets: deps.datasets,
      ...(deps.systemCapacity ? { systemCapacity: deps.systemCapacity } : {})
    });
    this.factory = new JobFactory({ settings: deps.settings, executor, adapter: deps.adapter, framework: deps.framework });
  }

  setup(mode: SetupMode): Promise<boolean> {
    return setupFramework(this.deps.framework, this.deps.adapter, mode, {
      setupDir: this.deps.settings.setupDir(),
      commands: this.deps.commands
    });
  }

  /**
   * @param taskName one task, a list of tasks, or undefined for every enabled task of the catalog
   * @param fold one fold, a list of folds, or undefined for every fold of each task
   * @returns the board of the whole run when no task is named, otherwise the board of the last named task
   */
  async run(taskName?: string | readonly string[], fold?: FoldSpec): Promise<Scoreboard | null> {
    const { catalog } = this.deps;
    const taskDefs: TaskDefinition[] =
      taskName === undefined
        ? catalog.listEnabled()
        : (typeof taskName === "string" ? [taskName] : [...taskName]).map((name) => catalog.get(name));
    if (!taskDefs.length) throw new NoTaskAvailableError();

    const jobs = taskDefs.flatMap((def) => this.factory.expand(def, fold));
    log.info(`Running ${jobs.length} job(s) for benchmark ${this.uid} with the ${this.deps.runner.kind} runner.`);
    const completions = reconcileDurations(await this.deps.runner.run(jobs));

    if (taskName === undefined) {
      return this.processResults(completions, { benchmarkName: this.benchmarkName });
    }

    let board: Scoreboard | null = null;
    for (const def of taskDefs) {
      const taskCompletions = completions.filter((c) => c.result !== null && c.result.task === def.name);
      board = await this.processResults(taskCompletions, { taskName: def.name });
    }
    return board;
  }

  private async processResults(completions: readonly JobCompletion[], target: CollectTarget): Promise<Scoreboard | null> {
    const board = collectResults(completions, this.frameworkName, target);
    if (!board) {
      log.warn(`No result produced for ${"taskName" in target ? `task ${target.taskName}` : `benchmark ${target.benchmarkName}`}.`);
      return null;
    }

    if (this.deps.settings.saveResults() && this.deps.store) {
      await persistScoreboard(board, this.deps.store, {
        benchmarkUid: this.uid,
        settingsHash: this.deps.settings.settingsHash
      });
    }

    log.info(`Summing up scores for current run:\n${board.toPrintableTable()}`);
    return board;
  }
}

export interface BenchmarkContextDeps {
  settings: BenchmarkSettings;
  frameworks: FrameworkDefinitions;
  adapters: AdapterRegistry;
  datasets: DatasetService;
  store: ResultStore | null;
  commands?: CommandRunner;
  systemCapacity?: () => SystemCapacity;
}

export interface CreateBenchmarkOptions {
  parallelJobs?: number;
  runner?: JobRunner;
}

/**
 * Services shared by every benchmark of a process, built once at startup and
 * passed down explicitly.
 */
export class BenchmarkContext {
  private readonly commands: CommandRunner;

  constructor(private readonly deps: BenchmarkContextDeps) {
    this.commands = deps.commands ?? new LocalProcessRunner();
  }

  static async load(
    settings: BenchmarkSettings,
    services: Omit<BenchmarkContextDeps, "settings" | "frameworks">
  ): Promise<BenchmarkContext> {
    const frameworks = await loadFrameworkDefinitions(settings.frameworksFile());
    return new BenchmarkContext({ ...services, settings, frameworks });
  }

  get settings(): BenchmarkSettings {
    return this.deps.settings;
  }

  get store(): ResultStore | null {
    return this.deps.store;
  }

  frameworkNames(): string[] {
    return this.deps.frameworks.names();
  }

  loadCatalog(benchmarkName: string): Promise<TaskCatalog> {
    return loadBenchmarkDefinition(this.deps.settings.benchmarksDir(), benchmarkName, this.deps.settings.taskDefaults());
  }

  async createBenchmark(
    frameworkName: string,
    benchmark: string | TaskCatalog,
    options: CreateBenchmarkOptions = {}
  ): Promise<Benchmark> {
    const framework = this.deps.frameworks.get(frameworkName);
    const adapter = this.deps.adapters.resolve(framework);
    const catalog = typeof benchmark === "string" ? await this.loadCatalog(benchmark) : benchmark;
    const runnerSettings = this.deps.settings.jobRunner();
    const runner =
      options.runner ??
      createJobRunner(options.parallelJobs !== undefined ? { ...runnerSettings, parallelJobs: options.parallelJobs } : runnerSettings);

    log.debug(`Using framework definition: ${JSON.stringify(framework)}.`);
    return new Benchmark({
      settings: this.deps.settings,
      framework,
      adapter,
      catalog,
      datasets: this.deps.datasets,
      runner,
      store: this.deps.store,
      commands: this.commands,
      ...(this.deps.systemCapacity ? { systemCapacity: this.deps.systemCapacity } : {})
    });
  }
}

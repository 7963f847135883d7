import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { BenchmarkContext } from "../benchmark/benchmark.js";
import { isTaskEnabled, metricList } from "../benchmark/catalog.js";
import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { getLogger } from "../core/log.js";
import { loadScoreboard } from "../results/collector.js";
import { datasetIdOf } from "../results/taskResult.js";
import {
  zBenchmarkRunInput,
  zBenchmarkRunOutput,
  zBenchmarkTasksInput,
  zBenchmarkTasksOutput,
  zScoreboardGetInput,
  zScoreboardGetOutput
} from "./toolSchemas.js";

const log = getLogger("gateway");

export interface GatewayDeps {
  context: BenchmarkContext;
}

/** Configuration mistakes are the caller's fault; everything else propagates as an internal error. */
function asToolError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof ConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  return e;
}

export function createBenchmarkServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "foldbench-gateway",
    version: "0.1.0"
  });
  const { context } = deps;

  mcp.registerTool(
    "benchmark_tasks",
    {
      description: "List the tasks of a benchmark definition.",
      inputSchema: zBenchmarkTasksInput,
      outputSchema: zBenchmarkTasksOutput
    },
    async (args) => {
      try {
        const catalog = await context.loadCatalog(args.benchmark);
        const tasks: JsonObject[] = catalog.all().map((def) => ({
          name: def.name,
          folds: def.folds,
          metrics: metricList(def.metric),
          enabled: isTaskEnabled(def),
          dataset_id: datasetIdOf(def.dataset)
        }));
        return {
          content: [{ type: "text", text: `Benchmark ${catalog.benchmarkName}: ${tasks.length} task(s)` }],
          structuredContent: { benchmark: catalog.benchmarkName, tasks }
        };
      } catch (e) {
        throw asToolError(e);
      }
    }
  );

  mcp.registerTool(
    "benchmark_run",
    {
      description: "Run a framework against a benchmark, a task or a list of tasks, and persist the scoreboard.",
      inputSchema: zBenchmarkRunInput,
      outputSchema: zBenchmarkRunOutput
    },
    async (args) => {
      try {
        const benchmark = await context.createBenchmark(
          args.framework,
          args.benchmark,
          args.parallel_jobs !== undefined ? { parallelJobs: args.parallel_jobs } : {}
        );
        const setupRan = await benchmark.setup(args.setup_mode);
        if (args.setup_mode === "only") {
          return {
            content: [{ type: "text", text: `Setup of ${benchmark.frameworkName} ${setupRan ? "completed" : "skipped"}` }],
            structuredContent: { benchmark_uid: benchmark.uid, setup_ran: setupRan, scope: null, rows: [] }
          };
        }

        const board = await benchmark.run(args.task, args.fold);
        const rows = board ? board.toJsonRows() : [];
        log.info(`benchmark_run ${benchmark.uid} produced ${rows.length} row(s).`);
        return {
          content: [
            { type: "text", text: board ? board.toPrintableTable() : `No result produced for ${benchmark.uid}` }
          ],
          structuredContent: {
            benchmark_uid: benchmark.uid,
            setup_ran: setupRan,
            scope: board ? board.scopeKey : null,
            rows
          }
        };
      } catch (e) {
        throw asToolError(e);
      }
    }
  );

  mcp.registerTool(
    "scoreboard_get",
    {
      description: "Read a persisted scoreboard: 'all', 'task:<name>' or 'benchmark:<name>'.",
      inputSchema: zScoreboardGetInput,
      outputSchema: zScoreboardGetOutput
    },
    async (args) => {
      const store = context.store;
      if (!store) throw new McpError(ErrorCode.InvalidRequest, "results are not persisted by this gateway");
      const board = await loadScoreboard(store, args.scope);
      const rows = board.toJsonRows().slice(-args.limit);
      return {
        content: [{ type: "text", text: `Scoreboard ${board.scopeKey}: ${rows.length} row(s)` }],
        structuredContent: { scope: board.scopeKey, row_count: rows.length, rows }
      };
    }
  );

  return mcp;
}

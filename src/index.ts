#!/usr/bin/env node
import type * as pg from "pg";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BenchmarkContext } from "./benchmark/benchmark.js";
import { BenchmarkSettings } from "./config/settings.js";
import { getLogger } from "./core/log.js";
import { JsonDatasetService } from "./datasets/jsonDatasetService.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createDb, createInMemoryPool, createPgPool } from "./db/connection.js";
import { createBuiltinRegistry } from "./frameworks/builtin/index.js";
import { createBenchmarkServer } from "./mcp/gatewayServer.js";
import { envSnapshot } from "./mcp/envSnapshot.js";
import { PostgresResultStore } from "./store/resultStore.js";

const log = getLogger("main");

function createPool(): pg.Pool {
  const url = process.env.DATABASE_URL;
  if (url) return createPgPool(url);
  return createInMemoryPool();
}

async function main(): Promise<void> {
  const configPath = process.env.FOLDBENCH_CONFIG ?? "config/benchmark.config.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const settings = await BenchmarkSettings.loadFromFile(configPath);
  const pool = createPool();
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySqlFile(pool);
  }

  const store = new PostgresResultStore(createDb(pool));
  const context = await BenchmarkContext.load(settings, {
    adapters: createBuiltinRegistry(),
    datasets: new JsonDatasetService(settings.inputDir()),
    store
  });

  const server = createBenchmarkServer({ context });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`foldbench gateway ready ${JSON.stringify(envSnapshot(settings, configPath))}`);
}

main().catch((err: unknown) => {
  log.error("foldbench gateway failed to start", err);
  process.exitCode = 1;
});

import type { BenchmarkSettings } from "../config/settings.js";
import type { JsonObject } from "../core/json.js";

export function envSnapshot(settings: BenchmarkSettings, configPath: string): JsonObject {
  return {
    node: process.version,
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    config: configPath,
    settings_hash: settings.settingsHash,
    input_dir: settings.inputDir(),
    output_dir: settings.outputDir()
  };
}

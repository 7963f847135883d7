import { promises as fs } from "fs";
import path from "path";
import { FrameworkSetupError } from "../core/errors.js";
import { getLogger } from "../core/log.js";
import type { CommandRunner } from "../execution/backends/types.js";
import type { FrameworkAdapter } from "../frameworks/types.js";
import type { FrameworkDefinition } from "./frameworks.js";

const log = getLogger("setup");

export const SETUP_MODES = ["auto", "skip", "force", "only"] as const;

export type SetupMode = (typeof SETUP_MODES)[number];

export const SETUP_MARKER_FILE = ".marker_setup_safe_to_delete";

export function isSetupMode(value: string): value is SetupMode {
  return SETUP_MODES.some((mode) => mode === value);
}

export function setupMarkerPath(setupDir: string, framework: FrameworkDefinition): string {
  return path.join(setupDir, framework.module.toLowerCase(), SETUP_MARKER_FILE);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export interface SetupDeps {
  setupDir: string;
  commands: CommandRunner;
}

/**
 * Prepares a framework once. `auto` skips when the marker file exists,
 * `force` and `only` always run, `skip` does nothing. Returns whether setup ran.
 */
export async function setupFramework(
  framework: FrameworkDefinition,
  adapter: FrameworkAdapter,
  mode: SetupMode,
  deps: SetupDeps
): Promise<boolean> {
  if (mode === "skip") return false;
  if (!adapter.setup && !framework.setupCmd) return false;

  const marker = setupMarkerPath(deps.setupDir, framework);
  if (mode === "auto" && (await exists(marker))) {
    log.debug(`Framework ${framework.name} already set up (${marker}).`);
    return false;
  }

  log.info(`Setting up framework ${framework.name}.`);
  if (adapter.setup) await adapter.setup(framework.setupArgs);
  if (framework.setupCmd) {
    const res = await deps.commands.run({ shell: framework.setupCmd });
    if (res.stdout.trim()) log.debug(res.stdout.trimEnd());
    if (res.exitCode !== 0) {
      throw new FrameworkSetupError(
        `setup command for ${framework.name} failed (exit ${res.exitCode})${res.stderr ? `: ${res.stderr.trim()}` : ""}`
      );
    }
  }

  await fs.mkdir(path.dirname(marker), { recursive: true });
  await fs.writeFile(marker, "", { flag: "a" });
  log.info(`Setup of framework ${framework.name} completed successfully.`);
  return true;
}

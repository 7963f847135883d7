import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { InvalidConfigError, UnknownFrameworkError } from "../core/errors.js";
import { isJsonObject, toJsonObject, type JsonObject } from "../core/json.js";

export interface FrameworkDefinition {
  readonly name: string;
  readonly version: string;
  /** Adapter key in the AdapterRegistry; defaults to the lower-cased framework name. */
  readonly module: string;
  readonly setupArgs: string;
  readonly setupCmd: string | null;
  readonly params: JsonObject;
  readonly project: string | null;
}

const zFrameworkEntry = z.object({
  extends: z.string().min(1).optional(),
  version: z.union([z.string(), z.number()]).optional(),
  module: z.string().min(1).nullable().optional(),
  setup_args: z.string().nullable().optional(),
  setup_cmd: z.string().nullable().optional(),
  params: z.record(z.string(), z.unknown()).nullable().optional(),
  project: z.string().nullable().optional()
});

type FrameworkEntry = z.infer<typeof zFrameworkEntry>;

export class FrameworkDefinitions {
  private readonly byKey = new Map<string, FrameworkDefinition>();

  constructor(defs: readonly FrameworkDefinition[]) {
    for (const def of defs) this.byKey.set(def.name.toLowerCase(), def);
  }

  /** Lookup is case-insensitive; the returned definition carries the declared name. */
  get(name: string): FrameworkDefinition {
    const def = this.byKey.get(name.toLowerCase());
    if (!def) throw new UnknownFrameworkError(name);
    return def;
  }

  names(): string[] {
    return [...this.byKey.values()].map((d) => d.name);
  }
}

export function parseFrameworkDefinitions(raw: unknown, source = "<inline>"): FrameworkDefinitions {
  if (!isJsonObject(raw)) throw new InvalidConfigError(`invalid frameworks definition at ${source}`);

  const entries = new Map<string, FrameworkEntry>();
  for (const [name, value] of Object.entries(raw)) {
    // entries starting with "__" only document the format
    if (name.startsWith("__")) continue;
    const parsed = zFrameworkEntry.safeParse(value ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`).join("; ");
      throw new InvalidConfigError(`invalid framework ${name} at ${source}: ${issues}`);
    }
    entries.set(name, parsed.data);
  }

  const resolved = new Map<string, FrameworkDefinition>();
  const resolve = (name: string, chain: string[]): FrameworkDefinition => {
    const done = resolved.get(name);
    if (done) return done;
    if (chain.includes(name)) {
      throw new InvalidConfigError(`circular framework inheritance: ${[...chain, name].join(" -> ")}`);
    }
    const entry = entries.get(name);
    if (!entry) throw new InvalidConfigError(`framework ${chain.at(-1) ?? name} extends unknown framework ${name}`);

    const parent = entry.extends ? resolve(entry.extends, [...chain, name]) : null;
    const def: FrameworkDefinition = Object.freeze({
      name,
      version: entry.version !== undefined ? String(entry.version) : parent?.version ?? "latest",
      module: entry.module ?? parent?.module ?? name.toLowerCase(),
      setupArgs: entry.setup_args ?? parent?.setupArgs ?? "",
      setupCmd: entry.setup_cmd ?? parent?.setupCmd ?? null,
      params: { ...(parent?.params ?? {}), ...toJsonObject(entry.params) },
      project: entry.project ?? parent?.project ?? null
    });
    resolved.set(name, def);
    return def;
  };

  return new FrameworkDefinitions([...entries.keys()].map((name) => resolve(name, [])));
}

export async function loadFrameworkDefinitions(filePath: string): Promise<FrameworkDefinitions> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseFrameworkDefinitions(YAML.parse(raw) as unknown, filePath);
}

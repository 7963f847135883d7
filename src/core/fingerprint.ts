import { createHash } from "crypto";

export type Sha256 = `sha256:${string}`;

export function sha256Prefixed(data: string): Sha256 {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}

function sortedKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** JSON text with object keys sorted at every depth; equal settings give equal text. */
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(value, sortedKeys);
}

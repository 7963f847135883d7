export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fromParsed(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (Array.isArray(value)) return value.map(fromParsed);
  if (typeof value !== "object") return null;
  const out: JsonObject = {};
  for (const [key, v] of Object.entries(value)) out[key] = fromParsed(v);
  return out;
}

/** Deep copy through JSON, so non-finite numbers become null and undefined members disappear. */
export function toJsonValue(value: unknown): JsonValue {
  const text = JSON.stringify(value);
  return text === undefined ? null : fromParsed(JSON.parse(text));
}

/** Like toJsonValue, but anything that is not an object yields `{}`. */
export function toJsonObject(value: unknown): JsonObject {
  const copy = toJsonValue(value);
  return isJsonObject(copy) ? copy : {};
}

import type { FrameworkAdapter } from "../types.js";
import { AdapterRegistry } from "../registry.js";
import { constantPredictor } from "./constantPredictor.js";
import { randomGuess } from "./randomGuess.js";

export const builtinAdapters: ReadonlyArray<readonly [string, FrameworkAdapter]> = [
  ["constantpredictor", constantPredictor],
  ["randomguess", randomGuess]
];

export function createBuiltinRegistry(): AdapterRegistry {
  return new AdapterRegistry(builtinAdapters);
}

import type { JobRunnerSettings } from "../../config/settings.js";
import { BoundedConcurrentJobRunner } from "./boundedConcurrent.js";
import { SequentialJobRunner } from "./sequential.js";
import type { JobRunner } from "./types.js";

export type { JobCompletion, JobRunner } from "./types.js";
export { reconcileDurations, runJobTimed } from "./types.js";
export { SequentialJobRunner } from "./sequential.js";
export { BoundedConcurrentJobRunner } from "./boundedConcurrent.js";

export function createJobRunner(settings: JobRunnerSettings): JobRunner {
  if (settings.parallelJobs <= 1) return new SequentialJobRunner();
  return new BoundedConcurrentJobRunner({
    parallelJobs: settings.parallelJobs,
    delaySeconds: settings.delaySeconds,
    doneAsync: settings.doneAsync,
    pollIntervalMs: settings.pollIntervalMs
  });
}

import { getLogger } from "../../core/log.js";
import type { TaskResult } from "../../results/types.js";
import type { Job } from "../job.js";

const log = getLogger("runner");

export interface JobCompletion {
  job: Job;
  /** Wall-clock seconds measured by the runner. */
  durationSeconds: number;
  /** Null only when the job failed outside the executor's safety net (e.g. dataset loading). */
  result: TaskResult | null;
  error: Error | null;
}

export interface JobRunner {
  readonly kind: "sequential" | "bounded_concurrent";
  /** Exactly one completion per submitted job. */
  run(jobs: readonly Job[]): Promise<JobCompletion[]>;
}

export async function runJobTimed(job: Job): Promise<JobCompletion> {
  const started = performance.now();
  try {
    const result = await job.run();
    return { job, durationSeconds: (performance.now() - started) / 1000, result, error: null };
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    log.error(`Job ${job.name} failed before producing a result.`, error);
    return { job, durationSeconds: (performance.now() - started) / 1000, result: null, error };
  }
}

/** Replaces a non-numeric result duration with the duration measured by the runner. */
export function reconcileDurations(completions: readonly JobCompletion[]): JobCompletion[] {
  return completions.map((c) => {
    if (c.result === null) return c;
    if (typeof c.result.duration === "number" && !Number.isNaN(c.result.duration)) return c;
    return { ...c, result: { ...c.result, duration: c.durationSeconds } };
  });
}

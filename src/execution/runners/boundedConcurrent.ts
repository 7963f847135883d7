import { setTimeout as sleep } from "timers/promises";
import { getLogger } from "../../core/log.js";
import type { Job } from "../job.js";
import { runJobTimed, type JobCompletion, type JobRunner } from "./types.js";

const log = getLogger("runner");

export interface BoundedConcurrentOptions {
  parallelJobs: number;
  /** Pause between two submissions. */
  delaySeconds?: number;
  /** Drain by polling for completions instead of a single join. */
  doneAsync?: boolean;
  pollIntervalMs?: number;
}

/**
 * Runs up to `parallelJobs` jobs at once. Completions are returned in the
 * order jobs finish, not the order they were submitted.
 */
export class BoundedConcurrentJobRunner implements JobRunner {
  readonly kind = "bounded_concurrent" as const;
  private readonly parallelJobs: number;
  private readonly delayMs: number;
  private readonly doneAsync: boolean;
  private readonly pollIntervalMs: number;

  constructor(options: BoundedConcurrentOptions) {
    if (!Number.isInteger(options.parallelJobs) || options.parallelJobs < 1) {
      throw new Error(`parallelJobs must be an integer >= 1 (got ${options.parallelJobs})`);
    }
    this.parallelJobs = options.parallelJobs;
    this.delayMs = Math.max(0, (options.delaySeconds ?? 0) * 1000);
    this.doneAsync = options.doneAsync ?? false;
    this.pollIntervalMs = Math.max(1, options.pollIntervalMs ?? 100);
  }

  async run(jobs: readonly Job[]): Promise<JobCompletion[]> {
    const completions: JobCompletion[] = [];
    const inFlight = new Set<Promise<void>>();

    for (const [index, job] of jobs.entries()) {
      while (inFlight.size >= this.parallelJobs) {
        await Promise.race(inFlight);
      }
      if (index > 0 && this.delayMs > 0) await sleep(this.delayMs);

      log.debug(`Submitting job ${job.name} (${inFlight.size + 1}/${this.parallelJobs} slots in use).`);
      const slot: Promise<void> = runJobTimed(job)
        .then((completion) => {
          completions.push(completion);
        })
        .finally(() => {
          inFlight.delete(slot);
        });
      inFlight.add(slot);
    }

    if (this.doneAsync) {
      while (completions.length < jobs.length) {
        await sleep(this.pollIntervalMs);
      }
    } else {
      await Promise.all(inFlight);
    }
    return completions;
  }
}

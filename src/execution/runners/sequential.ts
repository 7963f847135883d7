import type { Job } from "../job.js";
import { runJobTimed, type JobCompletion, type JobRunner } from "./types.js";

export class SequentialJobRunner implements JobRunner {
  readonly kind = "sequential" as const;

  async run(jobs: readonly Job[]): Promise<JobCompletion[]> {
    const completions: JobCompletion[] = [];
    for (const job of jobs) {
      completions.push(await runJobTimed(job));
    }
    return completions;
  }
}

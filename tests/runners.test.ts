import { describe, it, expect } from "vitest";
import { setTimeout as sleep } from "timers/promises";
import { JobAlreadyRunError } from "../src/core/errors.js";
import { Job } from "../src/execution/job.js";
import {
  BoundedConcurrentJobRunner,
  SequentialJobRunner,
  createJobRunner,
  reconcileDurations,
  type JobCompletion
} from "../src/execution/runners/index.js";
import type { TaskResult } from "../src/results/types.js";
import { scoredResult } from "./support.js";

function jobFor(taskName: string, fold: number, body: () => Promise<TaskResult>): Job {
  return new Job({ scope: "local", taskName, fold, frameworkName: "constantpredictor" }, body);
}

function tracked(count: number, delayMs: number) {
  const state = { active: 0, peak: 0 };
  const jobs = Array.from({ length: count }, (_, i) =>
    jobFor(`t${i}`, 0, async () => {
      state.active++;
      state.peak = Math.max(state.peak, state.active);
      await sleep(delayMs);
      state.active--;
      return scoredResult(`t${i}`, 0, 1);
    })
  );
  return { state, jobs };
}

describe("Job", () => {
  it("runs its body at most once", async () => {
    let calls = 0;
    const job = jobFor("blobs", 0, async () => {
      calls++;
      return scoredResult("blobs", 0, 1);
    });
    expect(job.state).toBe("created");
    await job.run();
    expect(job.state).toBe("done");
    await expect(job.run()).rejects.toBeInstanceOf(JobAlreadyRunError);
    expect(calls).toBe(1);
  });
});

describe("SequentialJobRunner", () => {
  it("runs jobs one at a time in submission order", async () => {
    const { state, jobs } = tracked(3, 5);
    const completions = await new SequentialJobRunner().run(jobs);
    expect(state.peak).toBe(1);
    expect(completions.map((c) => c.result?.task)).toEqual(["t0", "t1", "t2"]);
  });

  it("reports a failing job without stopping the batch", async () => {
    const jobs = [
      jobFor("bad", 0, async () => {
        throw new Error("dataset unavailable");
      }),
      jobFor("good", 0, async () => scoredResult("good", 0, 1))
    ];
    const completions = await new SequentialJobRunner().run(jobs);
    expect(completions).toHaveLength(2);
    expect(completions[0]?.result).toBeNull();
    expect(completions[0]?.error?.message).toBe("dataset unavailable");
    expect(completions[1]?.result?.task).toBe("good");
  });
});

describe("BoundedConcurrentJobRunner", () => {
  it("never exceeds the concurrency limit", async () => {
    const { state, jobs } = tracked(5, 20);
    const completions = await new BoundedConcurrentJobRunner({ parallelJobs: 2, doneAsync: true, pollIntervalMs: 2 }).run(jobs);
    expect(completions).toHaveLength(5);
    expect(state.peak).toBe(2);
    expect(completions.map((c) => c.result?.task).sort()).toEqual(["t0", "t1", "t2", "t3", "t4"]);
  });

  it("returns completions in finishing order when joined", async () => {
    const jobs = [
      jobFor("slow", 0, async () => {
        await sleep(40);
        return scoredResult("slow", 0, 1);
      }),
      jobFor("fast", 0, async () => scoredResult("fast", 0, 1))
    ];
    const completions = await new BoundedConcurrentJobRunner({ parallelJobs: 2, doneAsync: false }).run(jobs);
    expect(completions.map((c) => c.result?.task)).toEqual(["fast", "slow"]);
  });

  it("waits between submissions", async () => {
    const { jobs } = tracked(2, 0);
    const started = performance.now();
    await new BoundedConcurrentJobRunner({ parallelJobs: 2, delaySeconds: 0.05 }).run(jobs);
    expect(performance.now() - started).toBeGreaterThanOrEqual(45);
  });

  it("validates its limit", () => {
    expect(() => new BoundedConcurrentJobRunner({ parallelJobs: 0 })).toThrow(
      "parallelJobs must be an integer >= 1 (got 0)"
    );
  });
});

describe("runner selection and durations", () => {
  it("picks a strategy from the job runner settings", () => {
    expect(createJobRunner({ parallelJobs: 1, delaySeconds: 0, doneAsync: true, pollIntervalMs: 10 }).kind).toBe("sequential");
    expect(createJobRunner({ parallelJobs: 4, delaySeconds: 0, doneAsync: true, pollIntervalMs: 10 }).kind).toBe(
      "bounded_concurrent"
    );
  });

  it("fills missing durations from the runner's measurement", () => {
    const job = jobFor("blobs", 0, async () => scoredResult("blobs", 0, 1));
    const completions: JobCompletion[] = [
      { job, durationSeconds: 2.5, result: scoredResult("blobs", 0, Number.NaN), error: null },
      { job, durationSeconds: 2.5, result: scoredResult("blobs", 1, 0.75), error: null },
      { job, durationSeconds: 2.5, result: null, error: new Error("x") }
    ];
    expect(reconcileDurations(completions).map((c) => c.result?.duration ?? null)).toEqual([2.5, 0.75, null]);
  });
});

import { JobAlreadyRunError } from "../core/errors.js";
import { jobName, type JobKey } from "../core/ids.js";
import type { TaskResult } from "../results/types.js";

export type JobState = "created" | "running" | "done";

/**
 * One (task, fold, framework) unit of work. The deferred body runs at most
 * once; a second `run()` rejects without invoking it again.
 */
export class Job {
  readonly name: string;
  private _state: JobState = "created";

  constructor(
    readonly key: JobKey,
    private readonly body: () => Promise<TaskResult>
  ) {
    this.name = jobName(key);
  }

  get state(): JobState {
    return this._state;
  }

  async run(): Promise<TaskResult> {
    if (this._state !== "created") throw new JobAlreadyRunError(this.name);
    this._state = "running";
    try {
      return await this.body();
    } finally {
      this._state = "done";
    }
  }
}

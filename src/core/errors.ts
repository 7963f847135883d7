/**
 * Error taxonomy.
 *
 * ConfigurationError and its subclasses abort a whole invocation before any
 * job runs. UnsupportedDatasetShapeError is fatal for a single job and is raised
 * while loading data, ahead of the per-job safety net in the Executor.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

export class UnknownTaskError extends ConfigurationError {
  constructor(readonly taskName: string) {
    super(`Incorrect task name: ${taskName}.`);
    this.name = "UnknownTaskError";
  }
}

export class TaskDisabledError extends ConfigurationError {
  constructor(readonly taskName: string) {
    super(`Task ${taskName} is disabled, please enable it first.`);
    this.name = "TaskDisabledError";
  }
}

export class InvalidFoldSpecError extends ConfigurationError {
  constructor() {
    super("Fold value should be undefined, an integer, or a list of integers.");
    this.name = "InvalidFoldSpecError";
  }
}

export class FoldOutOfRangeError extends ConfigurationError {
  constructor(
    readonly fold: number,
    readonly taskName: string
  ) {
    super(`Fold value ${fold} is out of range for task ${taskName}.`);
    this.name = "FoldOutOfRangeError";
  }
}

export class NoTaskAvailableError extends ConfigurationError {
  constructor() {
    super("No task available.");
    this.name = "NoTaskAvailableError";
  }
}

export class UnknownFrameworkError extends ConfigurationError {
  constructor(readonly frameworkName: string) {
    super(`Incorrect framework: ${frameworkName}.`);
    this.name = "UnknownFrameworkError";
  }
}

export class UnsupportedDatasetShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedDatasetShapeError";
  }
}

export class FrameworkSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameworkSetupError";
  }
}

export class JobAlreadyRunError extends Error {
  constructor(readonly jobName: string) {
    super(`job ${jobName} was already invoked`);
    this.name = "JobAlreadyRunError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

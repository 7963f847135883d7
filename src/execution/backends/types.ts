export interface CommandSpec {
  /** Either an argv vector or a shell command line run through `sh -c`. */
  argv?: string[];
  shell?: string;
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

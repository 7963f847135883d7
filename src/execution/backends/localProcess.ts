import { spawn } from "child_process";
import type { CommandResult, CommandRunner, CommandSpec } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function capture(state: CaptureState, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function drain(state: CaptureState, label: string): string {
  return Buffer.concat(state.chunks).toString("utf8") + (state.truncated ? `\n[${label} truncated]\n` : "");
}

function resolveArgv(spec: CommandSpec): string[] {
  if (spec.shell !== undefined) return ["sh", "-c", spec.shell];
  if (spec.argv?.length) return spec.argv;
  throw new Error("command spec needs a non-empty argv or a shell command");
}

export class LocalProcessRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<CommandResult> {
    const [command, ...args] = resolveArgv(spec);
    if (!command) throw new Error("command argv must be non-empty");
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const out: CaptureState = { chunks: [], bytes: 0, truncated: false };
    const err: CaptureState = { chunks: [], bytes: 0, truncated: false };
    child.stdout.on("data", (chunk: Buffer) => capture(out, chunk));
    child.stderr.on("data", (chunk: Buffer) => capture(err, chunk));

    const exitCode = await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code ?? 0));
    });

    return {
      exitCode,
      stdout: drain(out, "stdout"),
      stderr: drain(err, "stderr"),
      startedAt,
      finishedAt: new Date().toISOString()
    };
  }
}

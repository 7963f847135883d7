import os from "os";
import { getLogger } from "../core/log.js";

const log = getLogger("resources");

export interface SystemCapacity {
  cores: number;
  memoryTotalMb: number;
  memoryAvailableMb: number;
}

export interface ResourceRequest {
  cores: number;
  /** 0 or negative means unspecified. */
  maxMemSizeMb: number;
}

export type ResourceAdvisory =
  | { kind: "exceeds_available"; assignedMb: number; availableMb: number; totalMb: number }
  | { kind: "within_os_buffer"; assignedMb: number; totalMb: number; bufferMb: number };

export interface ResourceEstimate {
  cores: number;
  maxMemSizeMb: number;
  advisories: ResourceAdvisory[];
  system: SystemCapacity;
}

const MB = 1024 * 1024;

/** Reads live figures; callers must not cache the result across jobs. */
export function readSystemCapacity(): SystemCapacity {
  return {
    cores: os.availableParallelism(),
    memoryTotalMb: Math.floor(os.totalmem() / MB),
    memoryAvailableMb: Math.floor(os.freemem() / MB)
  };
}

export function estimateResources(
  request: ResourceRequest,
  system: SystemCapacity,
  osMemSizeMb: number
): ResourceEstimate {
  const cores = request.cores > 0 ? Math.min(request.cores, system.cores) : system.cores;

  // half of the OS buffer is assumed to be in use already
  const leftForApp = Math.trunc(system.memoryAvailableMb - osMemSizeMb / 2);
  const assigned = Math.round(
    request.maxMemSizeMb > 0 ? request.maxMemSizeMb : leftForApp > 0 ? leftForApp : system.memoryAvailableMb
  );

  const advisories: ResourceAdvisory[] = [];
  if (assigned > system.memoryAvailableMb) {
    advisories.push({
      kind: "exceeds_available",
      assignedMb: assigned,
      availableMb: system.memoryAvailableMb,
      totalMb: system.memoryTotalMb
    });
  } else if (assigned > system.memoryTotalMb - osMemSizeMb) {
    advisories.push({
      kind: "within_os_buffer",
      assignedMb: assigned,
      totalMb: system.memoryTotalMb,
      bufferMb: osMemSizeMb
    });
  }

  return { cores, maxMemSizeMb: assigned, advisories, system };
}

export function describeAdvisory(advisory: ResourceAdvisory): string {
  switch (advisory.kind) {
    case "exceeds_available":
      return (
        `Assigned memory (${advisory.assignedMb}MB) exceeds system available memory ` +
        `(${advisory.availableMb}MB / total=${advisory.totalMb}MB)!`
      );
    case "within_os_buffer":
      return (
        `Assigned memory (${advisory.assignedMb}MB) is within ${advisory.bufferMb}MB of system total memory ` +
        `(${advisory.totalMb}MB): a ${advisory.bufferMb}MB buffer is recommended, ` +
        `otherwise OS memory usage might interfere with the benchmark task.`
      );
  }
}

export function logResourceEstimate(taskName: string, estimate: ResourceEstimate): void {
  log.info(`Assigning ${estimate.cores} cores (total=${estimate.system.cores}) for new task ${taskName}.`);
  log.info(`Assigning ${estimate.maxMemSizeMb}MB (total=${estimate.system.memoryTotalMb}MB) for new ${taskName} task.`);
  for (const advisory of estimate.advisories) log.warn(describeAdvisory(advisory));
}

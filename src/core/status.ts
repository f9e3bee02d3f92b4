import type { JobId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type JobStatus = "unstarted" | "starting" | "running" | "successful" | "failed" | "canceled" | "timeout";

export type TerminalStatus = Extract<JobStatus, "successful" | "failed" | "canceled" | "timeout">;

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["successful", "failed", "canceled", "timeout"]);

const ALLOWED: Record<JobStatus, readonly JobStatus[]> = {
  unstarted: ["starting"],
  starting: ["running", "failed"],
  running: ["successful", "failed", "canceled", "timeout"],
  successful: [],
  failed: [],
  canceled: [],
  timeout: []
};

export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.has(status);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(ALLOWED, value);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED[from].includes(to);
}

export interface StatusTransition {
  status: JobStatus;
  at: string;
}

export interface StatusSnapshot {
  jobId: JobId;
  status: JobStatus;
  returnCode: number | null;
  transitions: StatusTransition[];
  cause: JsonObject | null;
}

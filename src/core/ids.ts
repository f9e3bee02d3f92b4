import { ulid } from "ulid";

export type JobId = string;

const CONTAINER_NAME_PREFIX = "runner_";

export function newJobId(): JobId {
  return `job_${ulid()}`;
}

/**
 * Container runtimes accept `[a-zA-Z0-9][a-zA-Z0-9_.-]*`; the fixed prefix covers the
 * leading character and everything else outside the set becomes `_`.
 */
export function containerNameForJob(jobId: JobId): string {
  return `${CONTAINER_NAME_PREFIX}${jobId.replace(/[^a-zA-Z0-9_.-]/g, "_")}`;
}

export function eventFileStem(counter: number, uuid: string): string {
  return `${counter}-${uuid.replace(/[^a-zA-Z0-9-]/g, "_")}`;
}

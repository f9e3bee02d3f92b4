import type { EventRecord } from "./event.js";
import type { JobStatus, StatusSnapshot } from "./status.js";
import type { FinalizedRun } from "../runs/runHandle.js";

/** Asked once per supervisor tick; returning true irrevocably cancels the job. */
export interface CancelToken {
  isCancelled(): boolean;
}

export interface StatusChange {
  previous: JobStatus;
  status: JobStatus;
  snapshot: StatusSnapshot;
}

export interface StatusObserver {
  onStatus(change: StatusChange): void | Promise<void>;
}

/** Returning false keeps the event out of the artifact store and away from subscribers. */
export interface EventFilter {
  retain(record: EventRecord): boolean | Promise<boolean>;
}

export interface EventSubscriber {
  readonly name?: string;
  observe(record: EventRecord): void | Promise<void>;
}

export interface FinalizeObserver {
  onFinalize(run: FinalizedRun): void | Promise<void>;
}

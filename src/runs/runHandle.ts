import type { ArtifactDirectory } from "../artifacts/artifactStore.js";
import type { EventRecord } from "../core/event.js";
import type { JobId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { JobStatus, StatusSnapshot, TerminalStatus } from "../core/status.js";
import type { StatusMachine } from "../execution/statusMachine.js";

export interface FinalizedRun {
  jobId: JobId;
  status: TerminalStatus;
  returnCode: number | null;
  cause: JsonObject | null;
  eventCount: number;
  snapshot: StatusSnapshot;
  artifacts: ArtifactDirectory;
}

export interface CancelHandle {
  cancel(): void;
  readonly requested: boolean;
}

/**
 * Read surface of a job while it runs. Reads go to the artifact directory, so a
 * concurrent observer sees exactly what a finalized run would show so far.
 */
export class RunHandle {
  private finalized: FinalizedRun | null = null;

  constructor(
    readonly jobId: JobId,
    readonly artifacts: ArtifactDirectory,
    private readonly machine: StatusMachine,
    private readonly completion: Promise<FinalizedRun>
  ) {
    // completion never rejects: failures after launch finalize as a terminal status.
    void this.completion.then((run) => {
      this.finalized = run;
    });
  }

  status(): JobStatus {
    return this.finalized?.status ?? this.machine.status;
  }

  returnCode(): number | null {
    return this.finalized?.returnCode ?? this.machine.snapshot().returnCode;
  }

  snapshot(): StatusSnapshot {
    return this.finalized?.snapshot ?? this.machine.snapshot();
  }

  /** True once the terminal status and every artifact file are persisted. */
  get done(): boolean {
    return this.finalized !== null;
  }

  events(opts: { after?: number; limit?: number } = {}): Promise<EventRecord[]> {
    return this.artifacts.listEvents(opts);
  }

  event(counter: number): Promise<EventRecord | null> {
    return this.artifacts.readEvent(counter);
  }

  stdout(): Promise<string> {
    return this.artifacts.readStdout();
  }

  wait(): Promise<FinalizedRun> {
    return this.completion;
  }
}

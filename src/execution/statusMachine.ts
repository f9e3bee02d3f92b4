import type { StatusChange, StatusObserver } from "../core/capabilities.js";
import type { JobId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import {
  canTransition,
  isTerminalStatus,
  type JobStatus,
  type StatusSnapshot,
  type StatusTransition,
  type TerminalStatus
} from "../core/status.js";

export class StatusMachine {
  private current: JobStatus = "unstarted";
  private returnCode: number | null = null;
  private cause: JsonObject | null = null;
  private readonly transitions: StatusTransition[] = [];
  private chain: Promise<void> = Promise.resolve();

  constructor(
    readonly jobId: JobId,
    private readonly observers: readonly StatusObserver[],
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  get status(): JobStatus {
    return this.current;
  }

  get terminal(): boolean {
    return isTerminalStatus(this.current);
  }

  /** Time of the most recent transition into `status`, if any. */
  enteredAt(status: JobStatus): string | null {
    for (let i = this.transitions.length - 1; i >= 0; i--) {
      const t = this.transitions[i];
      if (t && t.status === status) return t.at;
    }
    return null;
  }

  snapshot(): StatusSnapshot {
    return {
      jobId: this.jobId,
      status: this.current,
      returnCode: this.returnCode,
      transitions: this.transitions.map((t) => ({ ...t })),
      cause: this.cause ? { ...this.cause } : null
    };
  }

  /**
   * Applies `next` if the transition is legal and delivers it to every observer, in
   * order, before resolving. Transitions out of a terminal state and illegal ones are
   * no-ops and resolve false.
   */
  transition(next: JobStatus, detail: { returnCode?: number | null; cause?: JsonObject | null } = {}): Promise<boolean> {
    const result = this.chain.then(() => this.apply(next, detail));
    this.chain = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** The exit code may arrive after a supervisor-forced terminal status; it never changes the status. */
  recordReturnCode(code: number | null): void {
    this.returnCode = code;
  }

  finalize(status: TerminalStatus, detail: { returnCode: number | null; cause?: JsonObject | null }): Promise<boolean> {
    return this.transition(status, detail);
  }

  private async apply(next: JobStatus, detail: { returnCode?: number | null; cause?: JsonObject | null }): Promise<boolean> {
    const previous = this.current;
    if (isTerminalStatus(previous)) {
      this.logger.debug({ from: previous, to: next }, "ignored transition out of terminal status");
      return false;
    }
    if (!canTransition(previous, next)) {
      this.logger.warn({ from: previous, to: next }, "rejected invalid status transition");
      return false;
    }

    this.current = next;
    if (detail.returnCode !== undefined) this.returnCode = detail.returnCode;
    if (detail.cause !== undefined) this.cause = detail.cause;
    this.transitions.push({ status: next, at: this.now().toISOString() });
    this.logger.info({ from: previous, to: next }, "status changed");

    const change: StatusChange = { previous, status: next, snapshot: this.snapshot() };
    for (const observer of this.observers) {
      try {
        await observer.onStatus(change);
      } catch (err) {
        this.logger.warn({ err, status: next }, "status observer failed");
      }
    }
    return true;
  }
}

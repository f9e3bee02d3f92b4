import type { CancelToken } from "../core/capabilities.js";
import type { Logger } from "../core/logger.js";

export type SupervisorDecision = "timeout" | "canceled";

export interface SupervisorOptions {
  intervalMs: number;
  /** null or 0 disables the timeout. */
  timeoutMs: number | null;
  cancel: CancelToken | null;
  logger: Logger;
  now?: () => number;
}

/**
 * Cooperative timeout/cancel checks. `tick()` may be called as often as the caller
 * likes; conditions are evaluated at most once per `intervalMs`, and never again once
 * a decision was made or the supervisor was stopped.
 */
export class Supervisor {
  private decision: SupervisorDecision | null = null;
  private stopped = false;
  private lastCheck = Number.NEGATIVE_INFINITY;
  private runningSince: number | null = null;
  private checks = 0;
  private readonly now: () => number;

  constructor(private readonly opts: SupervisorOptions) {
    this.now = opts.now ?? Date.now;
  }

  get decided(): SupervisorDecision | null {
    return this.decision;
  }

  get tickCount(): number {
    return this.checks;
  }

  markRunning(at: number = this.now()): void {
    this.runningSince = at;
  }

  stop(): void {
    this.stopped = true;
  }

  /** Returns the decision taken on this call, or null. */
  tick(): SupervisorDecision | null {
    if (this.decision || this.stopped) return null;
    const now = this.now();
    if (now - this.lastCheck < this.opts.intervalMs) return null;
    this.lastCheck = now;
    this.checks++;

    const { timeoutMs } = this.opts;
    if (timeoutMs && this.runningSince !== null && now - this.runningSince >= timeoutMs) {
      this.decision = "timeout";
      this.opts.logger.warn({ timeoutMs, elapsedMs: now - this.runningSince }, "job timed out");
      return this.decision;
    }

    if (this.opts.cancel) {
      let cancelled = false;
      try {
        cancelled = this.opts.cancel.isCancelled();
      } catch (err) {
        this.opts.logger.warn({ err }, "cancel predicate failed; continuing");
      }
      if (cancelled) {
        this.decision = "canceled";
        this.opts.logger.info("job cancel requested");
        return this.decision;
      }
    }
    return null;
  }
}

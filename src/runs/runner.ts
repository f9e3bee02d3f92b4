import type { CancelToken, EventFilter, EventSubscriber, FinalizeObserver, StatusObserver } from "../core/capabilities.js";
import { componentLogger, type Logger } from "../core/logger.js";
import { defaultLaunchers, resolveLauncher, type LauncherSet } from "../execution/backends/launchers.js";
import { buildExecutionSpec, type ExecutionSpec, type ExecutionSpecInput } from "../spec/executionSpec.js";
import { LiveJobRegistry } from "../spec/liveJobs.js";
import { JobExecution, type JobCallbacks } from "./jobExecution.js";
import type { CancelHandle, FinalizedRun, RunHandle } from "./runHandle.js";

export interface RunnerOptions {
  runsDir: string;
  pollIntervalMs?: number;
  killGraceMs?: number;
  queueCapacity?: number;
  drainTimeoutMs?: number;
  launchers?: Partial<LauncherSet>;
  /** Share one registry between runners that write into the same runs directory. */
  liveJobs?: LiveJobRegistry;
  statusObservers?: StatusObserver[];
  subscribers?: EventSubscriber[];
  eventFilter?: EventFilter;
  finalizeObservers?: FinalizeObserver[];
  logger?: Logger;
}

/** Per-run additions to the observers the runner was constructed with. */
export interface RunCallbacks {
  cancel?: CancelToken;
  statusObservers?: StatusObserver[];
  subscribers?: EventSubscriber[];
  eventFilter?: EventFilter;
  finalizeObservers?: FinalizeObserver[];
}

export interface AsyncRun {
  cancel: CancelHandle;
  run: RunHandle;
}

/**
 * Entry point of the core. Each call creates an independent {@link JobExecution};
 * runners hold configuration and observers only.
 */
export class Runner {
  readonly liveJobs: LiveJobRegistry;
  private readonly launchers: Partial<LauncherSet>;
  private readonly logger: Logger;

  constructor(private readonly opts: RunnerOptions) {
    this.liveJobs = opts.liveJobs ?? new LiveJobRegistry();
    this.launchers = { ...defaultLaunchers(), ...opts.launchers };
    this.logger = opts.logger ?? componentLogger("runner");
  }

  /** Validates input against this runner's live jobs. Throws InvalidSpecError. */
  buildSpec(input: ExecutionSpecInput): ExecutionSpec {
    return buildExecutionSpec(input, { liveJobs: this.liveJobs });
  }

  /** Blocks until the job is terminal. Rejects only for validation or launch failures. */
  async run(spec: ExecutionSpec, callbacks: RunCallbacks = {}): Promise<FinalizedRun> {
    const { run } = await this.runAsync(spec, callbacks);
    return run.wait();
  }

  /** Resolves once the launch is confirmed; the job continues in the background. */
  async runAsync(spec: ExecutionSpec, callbacks: RunCallbacks = {}): Promise<AsyncRun> {
    const job = new JobExecution(
      spec,
      resolveLauncher(spec.isolation, this.launchers),
      {
        runsDir: this.opts.runsDir,
        pollIntervalMs: this.opts.pollIntervalMs ?? 50,
        killGraceMs: this.opts.killGraceMs ?? 5_000,
        queueCapacity: this.opts.queueCapacity ?? 1024,
        drainTimeoutMs: this.opts.drainTimeoutMs ?? 2_000
      },
      this.callbacksFor(callbacks),
      this.liveJobs,
      this.logger
    );
    const run = await job.start();
    return { cancel: job.cancelHandle, run };
  }

  private callbacksFor(extra: RunCallbacks): JobCallbacks {
    const { opts } = this;
    return {
      cancel: extra.cancel ?? null,
      statusObservers: [...(opts.statusObservers ?? []), ...(extra.statusObservers ?? [])],
      subscribers: [...(opts.subscribers ?? []), ...(extra.subscribers ?? [])],
      eventFilter: extra.eventFilter ?? opts.eventFilter ?? null,
      finalizeObservers: [...(opts.finalizeObservers ?? []), ...(extra.finalizeObservers ?? [])]
    };
  }
}

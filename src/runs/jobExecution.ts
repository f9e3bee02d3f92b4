import { ArtifactDirectory } from "../artifacts/artifactStore.js";
import type { CancelToken, EventFilter, EventSubscriber, FinalizeObserver, StatusObserver } from "../core/capabilities.js";
import { ArtifactWriteError, causeOf, InvalidSpecError, LaunchError, RunnerError } from "../core/errors.js";
import { containerNameForJob } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import type { TerminalStatus } from "../core/status.js";
import { removeAuthFile, writeAuthFile, type AuthFile } from "../execution/authFile.js";
import { delay } from "../execution/backends/childProcess.js";
import type { ProcessHandle, ProcessLauncher } from "../execution/backends/types.js";
import { EventStreamParser } from "../execution/eventStream.js";
import { LineQueue } from "../execution/lineQueue.js";
import { StatusMachine } from "../execution/statusMachine.js";
import { Supervisor, type SupervisorDecision } from "../execution/supervisor.js";
import type { ExecutionSpec } from "../spec/executionSpec.js";
import type { LiveJobRegistry } from "../spec/liveJobs.js";
import { RunHandle, type CancelHandle, type FinalizedRun } from "./runHandle.js";

export interface JobSettings {
  runsDir: string;
  pollIntervalMs: number;
  killGraceMs: number;
  queueCapacity: number;
  /** How long to keep reading output after the process exited. */
  drainTimeoutMs: number;
}

export interface JobCallbacks {
  cancel: CancelToken | null;
  statusObservers: readonly StatusObserver[];
  subscribers: readonly EventSubscriber[];
  eventFilter: EventFilter | null;
  finalizeObservers: readonly FinalizeObserver[];
}

function commandDocument(spec: ExecutionSpec): JsonObject {
  return {
    job_id: spec.jobId,
    command: spec.command,
    args: [...spec.args],
    cwd: spec.cwd,
    env_keys: Object.keys(spec.env).sort(),
    isolation: spec.isolation,
    image: spec.image,
    runtime: spec.isolation === "container" ? spec.runtime : null,
    container_name: spec.isolation === "container" ? containerNameForJob(spec.jobId) : null,
    mounts: spec.mounts.map((m) => ({ host_path: m.hostPath, container_path: m.containerPath, mode: m.mode })),
    timeout_ms: spec.timeoutMs,
    event_data: spec.eventData
  };
}

/**
 * All state of one job: its status machine, artifact directory, launched entity and
 * supervisor. Created per run and discarded afterwards; nothing is shared between jobs
 * except the live-job registry.
 */
export class JobExecution {
  readonly machine: StatusMachine;
  private readonly logger: Logger;
  private readonly supervisor: Supervisor;
  private artifacts: ArtifactDirectory | null = null;
  private auth: AuthFile | null = null;
  private cancelRequested = false;
  private killFailed = false;
  private cause: JsonObject | null = null;

  readonly cancelHandle: CancelHandle;

  constructor(
    readonly spec: ExecutionSpec,
    private readonly launcher: ProcessLauncher,
    private readonly settings: JobSettings,
    private readonly callbacks: JobCallbacks,
    private readonly liveJobs: LiveJobRegistry,
    logger: Logger
  ) {
    this.logger = logger.child({ jobId: spec.jobId });
    this.machine = new StatusMachine(spec.jobId, callbacks.statusObservers, this.logger);

    const userToken = callbacks.cancel;
    this.supervisor = new Supervisor({
      intervalMs: settings.pollIntervalMs,
      timeoutMs: spec.timeoutMs,
      cancel: { isCancelled: () => this.cancelRequested || (userToken?.isCancelled() ?? false) },
      logger: this.logger
    });

    const self = this;
    this.cancelHandle = {
      cancel(): void {
        self.cancelRequested = true;
      },
      get requested(): boolean {
        return self.cancelRequested;
      }
    };
  }

  /**
   * Prepares the artifact directory and starts the launcher. Resolves with a live handle
   * once the entity is confirmed running; rejects with InvalidSpecError, ArtifactWriteError
   * or LaunchError, in which case the job is already finalized as `failed`.
   */
  async start(): Promise<RunHandle> {
    const { spec } = this;
    if (!this.liveJobs.claim(spec.jobId)) {
      throw new InvalidSpecError(`jobId already in use by a live job: ${spec.jobId}`);
    }

    let artifacts: ArtifactDirectory;
    let handle: ProcessHandle;
    try {
      await this.machine.transition("starting");
      artifacts = await ArtifactDirectory.create(this.settings.runsDir, spec.jobId);
      this.artifacts = artifacts;
      await artifacts.writeCommand(commandDocument(spec));
      if (spec.auth) {
        try {
          this.auth = await writeAuthFile(spec.auth, spec.runtime);
        } catch (err) {
          throw new LaunchError(`unable to write registry auth file: ${err instanceof Error ? err.message : String(err)}`, {}, { cause: err });
        }
      }
      handle = await this.launcher.start(spec, { auth: this.auth, logger: this.logger });
    } catch (err) {
      const error = err instanceof RunnerError ? err : new LaunchError(`launch failed: ${String(err)}`, {}, { cause: err });
      await this.abortLaunch(error);
      throw error;
    }

    await this.machine.transition("running");
    this.supervisor.markRunning();
    this.logger.info({ id: handle.id, isolation: spec.isolation }, "job running");

    const completion = this.supervise(handle, artifacts);
    return new RunHandle(spec.jobId, artifacts, this.machine, completion);
  }

  private async abortLaunch(error: RunnerError): Promise<void> {
    this.logger.error({ err: error }, "job launch failed");
    this.cause = causeOf(error);
    try {
      if (this.artifacts) {
        await this.artifacts.finalize({ status: "failed", returnCode: null, cause: this.cause });
      }
    } catch (writeErr) {
      this.logger.error({ err: writeErr }, "unable to persist launch failure");
    } finally {
      await this.releaseResources();
    }
    await this.machine.transition("failed", { cause: this.cause });
  }

  private async releaseResources(): Promise<void> {
    try {
      await removeAuthFile(this.auth);
      this.auth = null;
    } catch (err) {
      this.logger.error({ err }, "unable to remove registry auth file");
    } finally {
      this.liveJobs.release(this.spec.jobId);
    }
  }

  /** Runs a supervisor tick unless a decision already stands; terminates on a new one. */
  private async check(handle: ProcessHandle, current: SupervisorDecision | null): Promise<SupervisorDecision | null> {
    if (current) return current;
    const decision = this.supervisor.tick();
    if (decision) await this.terminate(handle, decision);
    return decision;
  }

  private async terminate(handle: ProcessHandle, decision: SupervisorDecision): Promise<void> {
    this.logger.info({ decision, id: handle.id }, "terminating job");
    try {
      await this.launcher.kill(handle, this.settings.killGraceMs);
    } catch (err) {
      this.killFailed = true;
      this.cause = causeOf(err);
      this.logger.error({ err, decision }, "forced termination failed");
    }
  }

  private async supervise(handle: ProcessHandle, artifacts: ArtifactDirectory): Promise<FinalizedRun> {
    const { settings } = this;
    const parser = new EventStreamParser({
      artifacts,
      machine: this.machine,
      subscribers: this.callbacks.subscribers,
      filter: this.callbacks.eventFilter,
      eventData: this.spec.eventData,
      logger: this.logger
    });
    const queue = new LineQueue(handle.stdout, settings.queueCapacity);

    // Assigned from stream and exit callbacks.
    const io: { exitCode: number | null; writeFailure: unknown } = { exitCode: null, writeFailure: null };

    let stderrWrites: Promise<void> = Promise.resolve();
    handle.stderr.on("data", (chunk: Buffer) => {
      stderrWrites = stderrWrites.then(() =>
        artifacts.appendStderr(chunk).catch((err: unknown) => {
          io.writeFailure ??= err;
        })
      );
    });

    const exitWatch = handle.exited.then((code) => {
      io.exitCode = code;
    });

    let decision: SupervisorDecision | null = null;
    let fatal: unknown = null;
    let exitSeenAt: number | null = null;

    try {
      for (;;) {
        for (const line of queue.take()) {
          await parser.consume(line);
          decision = await this.check(handle, decision);
        }
        if (io.writeFailure !== null) throw io.writeFailure;

        decision = await this.check(handle, decision);

        if (io.exitCode !== null) {
          if (queue.finished) {
            // a read error leaves the capture truncated
            if (queue.error) throw queue.error;
            break;
          }
          exitSeenAt ??= Date.now();
          if (Date.now() - exitSeenAt >= settings.drainTimeoutMs) {
            this.logger.warn({ pending: queue.pending }, "output still open after exit; closing");
            handle.stdout.destroy();
            for (const line of queue.take()) await parser.consume(line);
            break;
          }
          await queue.waitForActivity(settings.pollIntervalMs);
        } else if (this.killFailed) {
          break;
        } else {
          await Promise.race([queue.waitForActivity(settings.pollIntervalMs), exitWatch]);
        }
      }
      this.supervisor.stop();
      await Promise.race([stderrWrites, delay(settings.drainTimeoutMs)]);
      if (io.writeFailure !== null) throw io.writeFailure;
    } catch (err) {
      fatal = err;
      this.supervisor.stop();
      this.logger.error({ err }, "job failed while running");
      if (io.exitCode === null && !this.killFailed) await this.terminate(handle, decision ?? "canceled");
    }

    return this.finish(artifacts, { decision, fatal, exitCode: io.exitCode, eventCount: parser.eventCount });
  }

  private async finish(
    artifacts: ArtifactDirectory,
    outcome: { decision: SupervisorDecision | null; fatal: unknown; exitCode: number | null; eventCount: number }
  ): Promise<FinalizedRun> {
    const { decision, fatal, exitCode } = outcome;

    let status: TerminalStatus;
    if (decision) status = decision;
    else if (fatal !== null) status = "failed";
    else status = exitCode === 0 ? "successful" : "failed";

    if (fatal !== null) this.cause = causeOf(fatal);

    try {
      await artifacts.finalize({ status, returnCode: exitCode, cause: this.cause });
    } catch (err) {
      this.logger.error({ err }, "unable to persist final status");
      this.cause = causeOf(err instanceof ArtifactWriteError ? err : new ArtifactWriteError(artifacts.rootDir, { cause: err }));
      if (!decision) status = "failed";
    } finally {
      await this.releaseResources();
    }

    this.machine.recordReturnCode(exitCode);
    await this.machine.finalize(status, { returnCode: exitCode, cause: this.cause });

    const snapshot = this.machine.snapshot();
    const run: FinalizedRun = {
      jobId: this.spec.jobId,
      status,
      returnCode: exitCode,
      cause: this.cause,
      eventCount: outcome.eventCount,
      snapshot,
      artifacts
    };

    for (const observer of this.callbacks.finalizeObservers) {
      try {
        await observer.onFinalize(run);
      } catch (err) {
        this.logger.warn({ err }, "finalize observer failed");
      }
    }
    this.logger.info({ status, returnCode: exitCode, events: outcome.eventCount }, "job finalized");
    return run;
  }
}

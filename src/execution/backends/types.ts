import type { Readable, Writable } from "stream";
import type { Logger } from "../../core/logger.js";
import type { AuthFile } from "../authFile.js";
import type { ExecutionSpec, IsolationMode } from "../../spec/executionSpec.js";

export type PollResult = { state: "running" } | { state: "exited"; code: number } | { state: "not_found" };

export interface ProcessHandle {
  /** OS process id (local variants) or container name. */
  readonly id: string;
  readonly kind: IsolationMode;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly stdin: Writable | null;
  /** Resolves with the exit code once the entity is gone; never rejects. */
  readonly exited: Promise<number>;
  /** The argv actually executed. */
  readonly argv: readonly string[];
  poll(): Promise<PollResult>;
}

export interface LaunchContext {
  /** Temporary credentials file, when the spec carries an auth payload. */
  auth: AuthFile | null;
  logger: Logger;
}

export interface ProcessLauncher<H extends ProcessHandle = ProcessHandle> {
  readonly kind: IsolationMode;
  /** Resolves only once the entity is confirmed running; rejects with LaunchError otherwise. */
  start(spec: ExecutionSpec, ctx: LaunchContext): Promise<H>;
  /** Idempotent; rejects with KillError when termination cannot be confirmed. */
  kill(handle: H, graceMs: number): Promise<void>;
}

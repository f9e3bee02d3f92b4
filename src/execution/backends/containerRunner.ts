import { execFile } from "child_process";
import { PassThrough, type Readable } from "stream";
import { promisify } from "util";
import { KillError, LaunchError } from "../../core/errors.js";
import { containerNameForJob } from "../../core/ids.js";
import type { Logger } from "../../core/logger.js";
import type { ExecutionSpec, IsolationMode } from "../../spec/executionSpec.js";
import { authArgsFor, type AuthFile } from "../authFile.js";
import { ChildHandle, delay } from "./childProcess.js";
import type { LaunchContext, PollResult, ProcessHandle, ProcessLauncher } from "./types.js";

const execFileAsync = promisify(execFile);

/** `docker run` / `podman run` exit with 125 when the runtime itself fails (bad image, daemon). */
export const RUNTIME_FAILURE_EXIT = 125;

const MAX_DIAGNOSTIC_BYTES = 64 * 1024;

const NO_SUCH_CONTAINER_RE = /no such container|no container with (name or )?id/i;

function stderrOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err) {
    const stderr = err.stderr;
    if (typeof stderr === "string") return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString("utf8");
  }
  return err instanceof Error ? err.message : String(err);
}

export function isNoSuchContainer(err: unknown): boolean {
  return NO_SUCH_CONTAINER_RE.test(stderrOf(err));
}

export function buildContainerArgv(spec: ExecutionSpec, containerName: string, auth: AuthFile | null): string[] {
  if (!spec.image) throw new LaunchError("container isolation requires an image");
  const authArgs = authArgsFor(spec.runtime, auth);

  const argv: string[] = [spec.runtime, ...authArgs.global, "run", "--rm", "--name", containerName, ...authArgs.run];

  if (spec.workdir) {
    argv.push("--workdir", spec.workdir);
  }

  for (const [k, v] of Object.entries(spec.env)) {
    argv.push("--env", `${k}=${v}`);
  }

  for (const m of spec.mounts) {
    argv.push("--volume", `${m.hostPath}:${m.containerPath}:${m.mode}`);
  }

  argv.push(...spec.containerOptions);
  argv.push(spec.image, spec.command, ...spec.args);
  return argv;
}

export class ContainerHandle implements ProcessHandle {
  readonly kind: IsolationMode = "container";
  readonly stdin = null;
  readonly stdout: Readable;
  readonly exited: Promise<number>;

  constructor(
    readonly id: string,
    readonly runtime: string,
    readonly client: ChildHandle,
    readonly stderr: Readable,
    readonly argv: readonly string[],
    private readonly launcher: ContainerLauncher
  ) {
    this.stdout = client.stdout;
    this.exited = client.exited;
  }

  async poll(): Promise<PollResult> {
    const code = this.client.currentExitCode();
    if (code !== null) return { state: "exited", code };
    const running = await this.launcher.inspectRunning(this.runtime, this.id);
    if (running === null) return { state: "not_found" };
    return { state: "running" };
  }
}

export interface ContainerLauncherOptions {
  /** Upper bound on image pull plus container creation. */
  startTimeoutMs?: number;
  inspectIntervalMs?: number;
  confirmWindowMs?: number;
}

export class ContainerLauncher implements ProcessLauncher<ContainerHandle> {
  readonly kind: IsolationMode = "container";

  constructor(private readonly opts: ContainerLauncherOptions = {}) {}

  /** true/false for an existing container, null when the runtime does not know the name. */
  async inspectRunning(runtime: string, containerName: string): Promise<boolean | null> {
    try {
      const { stdout } = await execFileAsync(runtime, ["inspect", "--format", "{{.State.Running}}", containerName]);
      return stdout.trim() === "true";
    } catch {
      return null;
    }
  }

  async start(spec: ExecutionSpec, ctx: LaunchContext): Promise<ContainerHandle> {
    const containerName = containerNameForJob(spec.jobId);
    const argv = buildContainerArgv(spec, containerName, ctx.auth);
    const client = await ChildHandle.spawn(argv, { cwd: spec.cwd, env: process.env, logger: ctx.logger });

    const diagnostics: Buffer[] = [];
    let diagnosticBytes = 0;
    const stderr = new PassThrough();
    client.stderr.pipe(stderr);
    client.stderr.on("data", (chunk: Buffer) => {
      if (diagnosticBytes >= MAX_DIAGNOSTIC_BYTES) return;
      diagnostics.push(chunk);
      diagnosticBytes += chunk.byteLength;
    });

    const handle = new ContainerHandle(containerName, spec.runtime, client, stderr, argv, this);
    await this.confirmRunning(handle, ctx.logger, () => Buffer.concat(diagnostics).toString("utf8"));
    ctx.logger.debug({ container: containerName, image: spec.image }, "container started");
    return handle;
  }

  private async confirmRunning(handle: ContainerHandle, logger: Logger, diagnostics: () => string): Promise<void> {
    const deadline = Date.now() + (this.opts.startTimeoutMs ?? 300_000);
    const interval = this.opts.inspectIntervalMs ?? 100;

    for (;;) {
      const code = handle.client.currentExitCode();
      if (code !== null) {
        if (code === RUNTIME_FAILURE_EXIT) {
          const stderr = diagnostics().trim();
          throw new LaunchError(`${handle.runtime} could not start container ${handle.id}${stderr ? `: ${stderr}` : ""}`, {
            stderr,
            exitCode: code
          });
        }
        return;
      }

      if ((await this.inspectRunning(handle.runtime, handle.id)) === true) return;

      if (Date.now() >= deadline) {
        logger.warn({ container: handle.id }, "container start not confirmed before deadline");
        await this.kill(handle, 0).catch((err: unknown) => logger.error({ err, container: handle.id }, "cleanup kill failed"));
        throw new LaunchError(`container ${handle.id} was not confirmed running in time`, { stderr: diagnostics() });
      }

      await Promise.race([delay(interval), handle.client.exited]);
    }
  }

  async kill(handle: ContainerHandle, graceMs: number): Promise<void> {
    if (handle.client.hasExited()) return;
    const graceSeconds = Math.max(0, Math.ceil(graceMs / 1000));

    try {
      await execFileAsync(handle.runtime, ["stop", "--time", String(graceSeconds), handle.id]);
    } catch (stopErr) {
      if (!isNoSuchContainer(stopErr)) {
        try {
          await execFileAsync(handle.runtime, ["kill", handle.id]);
        } catch (killErr) {
          if (!isNoSuchContainer(killErr)) {
            throw new KillError(`unable to stop container ${handle.id}: ${stderrOf(killErr).trim()}`, { cause: killErr });
          }
        }
      }
    }

    const confirmMs = this.opts.confirmWindowMs ?? 2000;
    if (await handle.client.waitExit(graceMs + confirmMs)) return;

    // The container is gone or stopping; the attached client must follow.
    handle.client.signalGroup("SIGKILL");
    if (await handle.client.waitExit(confirmMs)) return;
    throw new KillError(`runtime client for container ${handle.id} did not exit`);
  }
}

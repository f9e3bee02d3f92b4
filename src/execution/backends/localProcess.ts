import type { Readable } from "stream";
import { KillError } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import type { ExecutionSpec, IsolationMode } from "../../spec/executionSpec.js";
import { ChildHandle } from "./childProcess.js";
import type { LaunchContext, PollResult, ProcessHandle, ProcessLauncher } from "./types.js";

export const REGISTRY_AUTH_ENV = "REGISTRY_AUTH_FILE";

export class LocalProcessHandle implements ProcessHandle {
  readonly id: string;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly stdin = null;
  readonly exited: Promise<number>;

  constructor(
    readonly kind: IsolationMode,
    readonly child: ChildHandle,
    readonly argv: readonly string[],
    logger: Logger,
    onExit: (() => Promise<void>) | null = null
  ) {
    this.id = String(child.pid);
    this.stdout = child.stdout;
    this.stderr = child.stderr;
    this.exited = child.exited.then(async (code) => {
      if (onExit) {
        try {
          await onExit();
        } catch (err) {
          logger.warn({ err, pid: child.pid }, "post-exit cleanup failed");
        }
      }
      return code;
    });
  }

  async poll(): Promise<PollResult> {
    const code = this.child.currentExitCode();
    return code === null ? { state: "running" } : { state: "exited", code };
  }
}

export interface PreparedCommand {
  argv: string[];
  cleanup?: () => Promise<void>;
}

export class LocalProcessLauncher implements ProcessLauncher<LocalProcessHandle> {
  readonly kind: IsolationMode = "none";

  constructor(protected readonly opts: { confirmWindowMs?: number } = {}) {}

  protected async prepare(spec: ExecutionSpec, _ctx: LaunchContext): Promise<PreparedCommand> {
    return { argv: [spec.command, ...spec.args] };
  }

  protected environment(spec: ExecutionSpec, ctx: LaunchContext): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env, ...spec.env };
    if (ctx.auth) env[REGISTRY_AUTH_ENV] = ctx.auth.file;
    return env;
  }

  async start(spec: ExecutionSpec, ctx: LaunchContext): Promise<LocalProcessHandle> {
    const prepared = await this.prepare(spec, ctx);
    let child: ChildHandle;
    try {
      child = await ChildHandle.spawn(prepared.argv, {
        cwd: spec.cwd,
        env: this.environment(spec, ctx),
        logger: ctx.logger
      });
    } catch (err) {
      if (prepared.cleanup) await prepared.cleanup();
      throw err;
    }
    ctx.logger.debug({ pid: child.pid, argv: prepared.argv }, "process started");
    return new LocalProcessHandle(this.kind, child, prepared.argv, ctx.logger, prepared.cleanup ?? null);
  }

  async kill(handle: LocalProcessHandle, graceMs: number): Promise<void> {
    const { child } = handle;
    if (child.hasExited()) return;

    child.signalGroup("SIGTERM");
    if (await child.waitExit(graceMs)) return;

    child.signalGroup("SIGKILL");
    if (await child.waitExit(this.opts.confirmWindowMs ?? 2000)) return;

    throw new KillError(`process ${handle.id} did not terminate after SIGKILL`);
  }
}

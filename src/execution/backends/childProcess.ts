import { spawn, type ChildProcess } from "child_process";
import { constants } from "os";
import type { Readable } from "stream";
import { LaunchError } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Signal deaths report `128 + signo`, as a shell would. */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return 0;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * A spawned child in its own process group, so signals reach whatever the command
 * forks (`sh -c`, engine workers).
 */
export class ChildHandle {
  readonly exited: Promise<number>;
  private exitCode: number | null = null;

  private constructor(
    readonly child: ChildProcess,
    readonly pid: number,
    readonly stdout: Readable,
    readonly stderr: Readable,
    exited: Promise<number>
  ) {
    this.exited = exited.then((code) => {
      this.exitCode = code;
      return code;
    });
  }

  static async spawn(
    argv: readonly string[],
    opts: { cwd?: string; env: NodeJS.ProcessEnv; logger: Logger }
  ): Promise<ChildHandle> {
    const [command, ...args] = argv;
    if (!command) throw new LaunchError("argv must be non-empty");

    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: ["ignore", "pipe", "pipe"] as const,
      detached: true
    });

    const exited = new Promise<number>((resolve) => {
      child.once("exit", (code, signal) => resolve(exitCodeOf(code, signal)));
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off("error", onError);
        resolve();
      };
      const onError = (err: Error): void => {
        child.off("spawn", onSpawn);
        reject(new LaunchError(`unable to start ${command}: ${err.message}`, {}, { cause: err }));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    child.on("error", (err) => opts.logger.warn({ err, pid: child.pid }, "child process error"));

    const { pid, stdout, stderr } = child;
    if (pid === undefined || !stdout || !stderr) {
      throw new LaunchError(`unable to start ${command}: no process handle`);
    }
    return new ChildHandle(child, pid, stdout, stderr, exited);
  }

  hasExited(): boolean {
    return this.exitCode !== null;
  }

  currentExitCode(): number | null {
    return this.exitCode;
  }

  /** Resolves true if the child exits within `ms`. */
  async waitExit(ms: number): Promise<boolean> {
    if (this.hasExited()) return true;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([this.exited.then(() => true as const), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  signalGroup(signal: NodeJS.Signals): void {
    if (this.hasExited()) return;
    try {
      process.kill(-this.pid, signal);
    } catch (err) {
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ESRCH") return;
      this.child.kill(signal);
    }
  }
}

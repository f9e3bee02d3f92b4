import type { IsolationMode } from "../../spec/executionSpec.js";
import { ContainerLauncher, type ContainerLauncherOptions } from "./containerRunner.js";
import { LocalProcessLauncher } from "./localProcess.js";
import { ProcessSandboxLauncher } from "./sandbox.js";
import type { ProcessLauncher } from "./types.js";

export type LauncherSet = Record<IsolationMode, ProcessLauncher>;

export function defaultLaunchers(opts: { container?: ContainerLauncherOptions; confirmWindowMs?: number } = {}): LauncherSet {
  const local = { confirmWindowMs: opts.confirmWindowMs };
  return {
    none: new LocalProcessLauncher(local),
    process: new ProcessSandboxLauncher(local),
    container: new ContainerLauncher({ confirmWindowMs: opts.confirmWindowMs, ...opts.container })
  };
}

export function resolveLauncher(mode: IsolationMode, launchers: Partial<LauncherSet>): ProcessLauncher {
  const launcher = launchers[mode];
  if (!launcher) throw new Error(`no launcher registered for isolation mode: ${mode}`);
  return launcher;
}

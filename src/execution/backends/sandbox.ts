import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { ExecutionSpec, IsolationMode } from "../../spec/executionSpec.js";
import { LocalProcessLauncher, type PreparedCommand } from "./localProcess.js";
import type { LaunchContext } from "./types.js";

export function buildSandboxArgv(spec: ExecutionSpec, emptyDir: string | null): string[] {
  const { sandbox } = spec;
  const argv = [sandbox.executable, "--die-with-parent", "--unshare-pid", "--dev-bind", "/", "/", "--proc", "/proc"];

  for (const p of sandbox.hidePaths) {
    if (emptyDir) argv.push("--bind", emptyDir, path.resolve(p));
  }
  for (const p of sandbox.showPaths) {
    const abs = path.resolve(p);
    argv.push("--bind", abs, abs);
  }
  for (const p of sandbox.roPaths) {
    const abs = path.resolve(p);
    argv.push("--ro-bind", abs, abs);
  }

  argv.push("--chdir", spec.cwd, "--", spec.command, ...spec.args);
  return argv;
}

/** Runs the command on the host under a namespace sandbox (bubblewrap by default). */
export class ProcessSandboxLauncher extends LocalProcessLauncher {
  override readonly kind: IsolationMode = "process";

  protected override async prepare(spec: ExecutionSpec, _ctx: LaunchContext): Promise<PreparedCommand> {
    if (!spec.sandbox.hidePaths.length) return { argv: buildSandboxArgv(spec, null) };

    const emptyDir = await fs.mkdtemp(path.join(os.tmpdir(), "engine_runner_hide_"));
    return {
      argv: buildSandboxArgv(spec, emptyDir),
      cleanup: () => fs.rm(emptyDir, { recursive: true, force: true })
    };
  }
}

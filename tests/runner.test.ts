import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import pino from "pino";
import { PassThrough } from "stream";
import { ArtifactDirectory } from "../src/artifacts/artifactStore.js";
import type { EventSubscriber, FinalizeObserver, StatusObserver } from "../src/core/capabilities.js";
import { ArtifactWriteError, InvalidSpecError, KillError, LaunchError } from "../src/core/errors.js";
import { defaultLaunchers } from "../src/execution/backends/launchers.js";
import { LocalProcessLauncher, type LocalProcessHandle } from "../src/execution/backends/localProcess.js";
import type { PollResult, ProcessLauncher } from "../src/execution/backends/types.js";
import type { FinalizedRun } from "../src/runs/runHandle.js";
import { Runner } from "../src/runs/runner.js";
import type { ExecutionSpecInput } from "../src/spec/executionSpec.js";
import { installFakeRuntime, MISSING_IMAGE, type FakeRuntime } from "./support/fakeRuntime.js";

const logger = pino({ level: "silent" });

function statusRecorder(): StatusObserver & { seen: string[] } {
  const seen: string[] = [];
  return {
    seen,
    onStatus(change) {
      seen.push(change.status);
    }
  };
}

function jsonLines(...payloads: object[]): string {
  return payloads.map((p) => `printf '%s\\n' '${JSON.stringify(p)}'`).join("; ");
}

/** Local launcher that records when it was asked to kill and can report the kill as unconfirmed. */
class RecordingLauncher extends LocalProcessLauncher {
  readonly killedAt: number[] = [];

  constructor(private readonly failKill = false) {
    super();
  }

  async kill(handle: LocalProcessHandle, graceMs: number): Promise<void> {
    this.killedAt.push(Date.now());
    await super.kill(handle, graceMs);
    if (this.failKill) throw new KillError(`termination of ${handle.id} not confirmed`);
  }
}

/** Emits one event, then fails the output stream while the "process" exits 0. */
function brokenOutputLauncher(): ProcessLauncher {
  return {
    kind: "none",
    async start(spec) {
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      let exit: (code: number) => void = () => undefined;
      const exited = new Promise<number>((resolve) => {
        exit = resolve;
      });
      setTimeout(() => {
        stdout.write(`{"event":"partial"}\n`);
        setTimeout(() => {
          stdout.destroy(new Error("output pipe read failed"));
          stderr.end();
          exit(0);
        }, 50);
      }, 50);
      return {
        id: "stub-1",
        kind: "none",
        stdout,
        stderr,
        stdin: null,
        exited,
        argv: [spec.command],
        poll: async (): Promise<PollResult> => ({ state: "running" })
      };
    },
    kill: async () => undefined
  };
}

describe("Runner", () => {
  let dir: string;
  let runsDir: string;
  let fake: FakeRuntime;
  let runner: Runner;

  function build(input: ExecutionSpecInput) {
    return runner.buildSpec(input);
  }

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "engine-runner-runs-"));
    runsDir = path.join(dir, "runs");
    fake = await installFakeRuntime(dir);
    runner = new Runner({
      runsDir,
      pollIntervalMs: 20,
      killGraceMs: 1_000,
      launchers: defaultLaunchers({ container: { inspectIntervalMs: 20 }, confirmWindowMs: 2_000 }),
      logger
    });
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("scenario A: echo ok finishes successfully with no events", async () => {
    const observer = statusRecorder();
    const finalized: FinalizedRun[] = [];
    const onFinalize: FinalizeObserver = { onFinalize: (run) => void finalized.push(run) };

    const run = await runner.run(build({ jobId: "scenario-a", command: "echo", args: ["ok"] }), {
      statusObservers: [observer],
      finalizeObservers: [onFinalize]
    });

    expect(run.status).toBe("successful");
    expect(run.returnCode).toBe(0);
    expect(run.eventCount).toBe(0);
    expect(run.cause).toBeNull();
    expect(await run.artifacts.readStdout()).toBe("ok\n");
    expect(await run.artifacts.listEvents()).toEqual([]);
    expect(await readFile(path.join(runsDir, "scenario-a", "status"), "utf8")).toBe("successful");
    expect(await readFile(path.join(runsDir, "scenario-a", "rc"), "utf8")).toBe("0");
    expect(observer.seen).toEqual(["starting", "running", "successful"]);
    expect(finalized.map((r) => r.jobId)).toEqual(["scenario-a"]);
    expect(runner.liveJobs.list()).toEqual([]);

    const command = await run.artifacts.readCommand();
    expect(command).toMatchObject({ job_id: "scenario-a", command: "echo", args: ["ok"], isolation: "none" });
  });

  it("scenario B: a missing image is a launch error with a failed status and no events", async () => {
    const observer = statusRecorder();
    const spec = build({ jobId: "scenario-b", command: "true", isolation: "container", image: MISSING_IMAGE, runtime: fake.runtime });

    await expect(runner.run(spec, { statusObservers: [observer] })).rejects.toBeInstanceOf(LaunchError);

    const artifacts = ArtifactDirectory.open(runsDir, "scenario-b");
    expect(await artifacts.readStatus()).toBe("failed");
    expect(await artifacts.eventCount()).toBe(0);
    expect(await artifacts.readCause()).toMatchObject({ type: "LaunchError", code: "launch_failed" });
    expect(observer.seen).toEqual(["starting", "failed"]);
    expect(runner.liveJobs.has("scenario-b")).toBe(false);
  });

  it("scenario C: a throwing subscriber does not disturb persistence or status", async () => {
    const throwing: EventSubscriber = {
      name: "always-throws",
      observe: () => {
        throw new Error("subscriber boom");
      }
    };
    const script = jsonLines({ event: "playbook_on_start" }, { event: "runner_on_ok", n: 1 }, { event: "playbook_on_stats" });
    const run = await runner.run(build({ jobId: "scenario-c", command: "sh", args: ["-c", script] }), { subscribers: [throwing] });

    expect(run.status).toBe("successful");
    expect(run.eventCount).toBe(3);
    const events = await run.artifacts.listEvents();
    expect(events.map((e) => [e.counter, e.payload.event])).toEqual([
      [0, "playbook_on_start"],
      [1, "runner_on_ok"],
      [2, "playbook_on_stats"]
    ]);
  });

  it("reports a non-zero exit as failed with the exit code", async () => {
    const run = await runner.run(build({ jobId: "exit-4", command: "sh", args: ["-c", "echo bad >&2; exit 4"] }));
    expect(run.status).toBe("failed");
    expect(run.returnCode).toBe(4);
    expect(await readFile(path.join(runsDir, "exit-4", "rc"), "utf8")).toBe("4");
    expect(await run.artifacts.readStderr()).toBe("bad\n");
  });

  it("cancels when the predicate turns true on its second call", async () => {
    let calls = 0;
    const started = Date.now();
    const run = await runner.run(build({ jobId: "cancel-2", command: "sleep", args: ["10"] }), {
      cancel: { isCancelled: () => ++calls >= 2 }
    });
    expect(run.status).toBe("canceled");
    expect(calls).toBe(2);
    expect(run.returnCode).toBe(143);
    expect(Date.now() - started).toBeLessThan(5_000);
    expect(await readFile(path.join(runsDir, "cancel-2", "status"), "utf8")).toBe("canceled");
  });

  it("keeps the canceled status even when the killed process exits 0", async () => {
    let ready = false;
    const watcher: EventSubscriber = {
      observe: (record) => {
        if (record.payload.event === "ready") ready = true;
      }
    };
    const script = `trap 'exit 0' TERM; ${jsonLines({ event: "ready" })}; sleep 10 & wait`;
    const run = await runner.run(build({ jobId: "cancel-exit-0", command: "sh", args: ["-c", script] }), {
      subscribers: [watcher],
      cancel: { isCancelled: () => ready }
    });
    expect(run.status).toBe("canceled");
    expect(run.returnCode).toBe(0);
    expect(await readFile(path.join(runsDir, "cancel-exit-0", "rc"), "utf8")).toBe("0");
  });

  it("times out a long-running process", async () => {
    const started = Date.now();
    const run = await runner.run(build({ jobId: "timeout-100", command: "sleep", args: ["10"], timeoutMs: 100 }));
    expect(run.status).toBe("timeout");
    expect(Date.now() - started).toBeLessThan(5_000);
    expect(run.snapshot.transitions.map((t) => t.status)).toEqual(["starting", "running", "timeout"]);

    const [, running, timedOut] = run.snapshot.transitions;
    const elapsed = Date.parse(timedOut?.at ?? "") - Date.parse(running?.at ?? "");
    expect(elapsed).toBeGreaterThanOrEqual(100);
    expect(elapsed).toBeLessThan(100 + 20 + 500);
  });

  it("keeps checking the timeout while a backlog of events drains", async () => {
    const launcher = new RecordingLauncher();
    const slow = new Runner({ runsDir, pollIntervalMs: 20, killGraceMs: 1_000, launchers: { none: launcher }, logger });
    const lines = Array.from({ length: 60 }, (_, i) => `{"event":"e${i}"}`).join("\\n");
    const subscriber: EventSubscriber = { observe: () => new Promise<void>((r) => setTimeout(r, 25)) };

    const run = await slow.run(
      slow.buildSpec({ jobId: "backlog", command: "sh", args: ["-c", `printf '${lines}\\n'; sleep 10`], timeoutMs: 100 }),
      { subscribers: [subscriber] }
    );

    expect(run.status).toBe("timeout");
    expect(run.eventCount).toBe(60);
    expect(launcher.killedAt).toHaveLength(1);
    const runningAt = Date.parse(run.snapshot.transitions[1]?.at ?? "");
    expect((launcher.killedAt[0] ?? Number.POSITIVE_INFINITY) - runningAt).toBeLessThan(100 + 20 + 500);
  });

  it("keeps the supervisor's status when the kill cannot be confirmed", async () => {
    const stubborn = new Runner({
      runsDir,
      pollIntervalMs: 20,
      killGraceMs: 1_000,
      launchers: { none: new RecordingLauncher(true) },
      logger
    });

    const timedOut = await stubborn.run(stubborn.buildSpec({ jobId: "kill-fails-timeout", command: "sleep", args: ["10"], timeoutMs: 100 }));
    expect(timedOut.status).toBe("timeout");
    expect(timedOut.cause).toMatchObject({ type: "KillError", code: "kill_failed" });
    expect(await readFile(path.join(runsDir, "kill-fails-timeout", "status"), "utf8")).toBe("timeout");

    const canceled = await stubborn.run(stubborn.buildSpec({ jobId: "kill-fails-cancel", command: "sleep", args: ["10"] }), {
      cancel: { isCancelled: () => true }
    });
    expect(canceled.status).toBe("canceled");
    expect(canceled.cause).toMatchObject({ type: "KillError", code: "kill_failed" });
  });

  it("fails the run and stops the process when an event cannot be written", async () => {
    const eventsDir = path.join(runsDir, "events-broken", "job_events");
    const breaker: EventSubscriber = {
      observe: async (record) => {
        if (record.counter !== 0) return;
        await rm(eventsDir, { recursive: true, force: true });
        await writeFile(eventsDir, "not a directory");
      }
    };
    const script = `${jsonLines({ event: "first" })}; sleep 0.3; ${jsonLines({ event: "second" })}; sleep 10`;
    const started = Date.now();

    const run = await runner.run(build({ jobId: "events-broken", command: "sh", args: ["-c", script] }), { subscribers: [breaker] });

    expect(run.status).toBe("failed");
    expect(run.cause).toMatchObject({ type: "ArtifactWriteError", code: "artifact_write" });
    expect(run.eventCount).toBe(1);
    expect(Date.now() - started).toBeLessThan(5_000);
    expect(await readFile(path.join(runsDir, "events-broken", "status"), "utf8")).toBe("failed");
  });

  it("fails the run when the output stream breaks, even on exit 0", async () => {
    const broken = new Runner({ runsDir, pollIntervalMs: 20, launchers: { none: brokenOutputLauncher() }, logger });
    const run = await broken.run(broken.buildSpec({ jobId: "broken-output", command: "engine" }));

    expect(run.status).toBe("failed");
    expect(run.returnCode).toBe(0);
    expect(run.cause).toMatchObject({ type: "Error", message: "output pipe read failed" });
  });

  it("stores facts for a host named '..' without failing the run", async () => {
    const script = jsonLines({ event: "runner_on_ok", event_data: { host: "..", facts: { os: "linux" } } });
    const run = await runner.run(build({ jobId: "facts-dotdot", command: "sh", args: ["-c", script] }));
    expect(run.status).toBe("successful");
    expect(run.eventCount).toBe(1);
    expect(await run.artifacts.readFactCache("..")).toEqual({ os: "linux" });
  });

  it("times out a container and stops it by name", async () => {
    const spec = build({
      jobId: "container-timeout",
      command: "sleep",
      args: ["10"],
      isolation: "container",
      image: "alpine:3",
      runtime: fake.runtime,
      timeoutMs: 150
    });
    const run = await runner.run(spec);
    expect(run.status).toBe("timeout");
    expect(existsSync(path.join(fake.stateDir, "runner_container-timeout.stop_time"))).toBe(true);
  });

  it("exposes a live handle from runAsync", async () => {
    const script = `${jsonLines({ event: "first" })}; sleep 0.5; ${jsonLines({ event: "second" })}`;
    const { run, cancel } = await runner.runAsync(build({ jobId: "async-1", command: "sh", args: ["-c", script] }));

    expect(cancel.requested).toBe(false);
    expect(run.status()).toBe("running");
    expect(run.done).toBe(false);
    expect(runner.liveJobs.has("async-1")).toBe(true);

    for (let i = 0; i < 100 && (await run.events()).length === 0; i++) {
      await new Promise((r) => setTimeout(r, 20));
    }
    expect((await run.event(0))?.payload).toEqual({ event: "first" });

    const finalized = await run.wait();
    expect(finalized.status).toBe("successful");
    expect(run.done).toBe(true);
    expect(run.status()).toBe("successful");
    expect(run.returnCode()).toBe(0);
    expect((await run.events()).map((e) => e.payload.event)).toEqual(["first", "second"]);
  });

  it("cancels through the handle returned by runAsync", async () => {
    const { run, cancel } = await runner.runAsync(build({ jobId: "async-cancel", command: "sleep", args: ["10"] }));
    cancel.cancel();
    expect(cancel.requested).toBe(true);
    expect((await run.wait()).status).toBe("canceled");
  });

  it("refuses a job id that is still live", async () => {
    const { run, cancel } = await runner.runAsync(build({ jobId: "busy", command: "sleep", args: ["10"] }));
    expect(() => build({ jobId: "busy", command: "true" })).toThrow(InvalidSpecError);
    cancel.cancel();
    await run.wait();
  });

  it("refuses to overwrite the artifacts of a finished job", async () => {
    await runner.run(build({ jobId: "reused", command: "true" }));
    await expect(runner.run(build({ jobId: "reused", command: "false" }))).rejects.toBeInstanceOf(ArtifactWriteError);
    expect(await ArtifactDirectory.open(runsDir, "reused").readStatus()).toBe("successful");
  });

  it("exports the auth file to the process and removes it afterwards", async () => {
    const auth = { auths: { "registry.example": { auth: "test-secret" } } };
    const run = await runner.run(
      build({ jobId: "auth-local", command: "sh", args: ["-c", 'echo "$REGISTRY_AUTH_FILE"; cat "$REGISTRY_AUTH_FILE"'], auth })
    );
    const [authPath, content] = (await run.artifacts.readStdout()).split("\n");
    expect(JSON.parse(content ?? "")).toEqual(auth);
    expect(authPath && existsSync(authPath)).toBe(false);
  });

  it("removes the auth file when the launch fails", async () => {
    const spec = build({
      jobId: "auth-missing-image",
      command: "true",
      isolation: "container",
      image: MISSING_IMAGE,
      runtime: fake.runtime,
      auth: { auths: { "registry.example": { auth: "test-secret" } } }
    });
    await expect(runner.run(spec)).rejects.toBeInstanceOf(LaunchError);
    expect(JSON.parse(await readFile(path.join(fake.stateDir, "runner_auth-missing-image.auth"), "utf8"))).toEqual({
      auths: { "registry.example": { auth: "test-secret" } }
    });
    const authPath = (await readFile(path.join(fake.stateDir, "runner_auth-missing-image.authpath"), "utf8")).trim();
    expect(path.basename(authPath)).toBe("auth.json");
    expect(existsSync(authPath)).toBe(false);
  });

  it("applies the event data policy to persisted events", async () => {
    const script = jsonLines(
      { event: "runner_on_ok", event_data: { host: "web1", res: { secret: "test-secret" } } },
      { event: "runner_on_failed", event_data: { host: "web1", msg: "boom" } }
    );
    const run = await runner.run(build({ jobId: "policy", command: "sh", args: ["-c", script], eventData: "failed_only" }));
    expect((await run.artifacts.listEvents()).map((e) => e.payload)).toEqual([
      { event: "runner_on_ok" },
      { event: "runner_on_failed", event_data: { host: "web1", msg: "boom" } }
    ]);
  });
});

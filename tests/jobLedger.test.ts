import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import type * as pg from "pg";
import pino from "pino";
import { applyLedgerSchema, createLedgerDb, openLedgerPool } from "../src/db/connection.js";
import { Runner } from "../src/runs/runner.js";
import { PostgresJobLedger } from "../src/store/jobLedger.js";

describe.sequential("PostgresJobLedger", () => {
  let tmpDir: string;
  let pool: pg.Pool;
  let ledger: PostgresJobLedger;
  let runner: Runner;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "engine-runner-ledger-"));

    ({ pool } = openLedgerPool());
    await applyLedgerSchema(pool, path.resolve("db/schema.sql"));

    ledger = new PostgresJobLedger(createLedgerDb(pool));
    runner = new Runner({
      runsDir: path.join(tmpDir, "runs"),
      pollIntervalMs: 20,
      statusObservers: [ledger],
      finalizeObservers: [ledger],
      logger: pino({ level: "silent" })
    });
  });

  afterAll(async () => {
    await pool.end();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("registers a job before it starts", async () => {
    const spec = runner.buildSpec({ jobId: "ledger-a", command: "echo", args: ["hello", "world"] });
    await ledger.registerJob(spec, { configHash: "sha256:abc", environment: { platform: "linux" } });

    const job = await ledger.getJob("ledger-a");
    expect(job).toMatchObject({
      jobId: "ledger-a",
      status: "unstarted",
      isolation: "none",
      command: "echo hello world",
      image: null,
      configHash: "sha256:abc",
      environment: { platform: "linux" },
      returnCode: null,
      eventCount: 0,
      startedAt: null,
      finishedAt: null
    });
    expect(job?.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);

    await ledger.registerJob(spec, { configHash: "sha256:other", environment: null });
    expect((await ledger.getJob("ledger-a"))?.configHash).toBe("sha256:abc");
  });

  it("follows a run through its transitions to the terminal record", async () => {
    const spec = runner.buildSpec({ jobId: "ledger-a", command: "echo", args: ["hello", "world"] });
    const run = await runner.run(spec);

    const job = await ledger.getJob("ledger-a");
    expect(job).toMatchObject({ status: "successful", returnCode: 0, eventCount: 0, cause: null, artifactDir: run.artifacts.rootDir });
    expect(job?.startedAt).not.toBeNull();
    expect(job?.finishedAt).not.toBeNull();

    const transitions = await ledger.listTransitions("ledger-a");
    expect(transitions.map((t) => [t.previous, t.status])).toEqual([
      ["unstarted", "starting"],
      ["starting", "running"],
      ["running", "successful"]
    ]);
  });

  it("creates the row on first status when the job was never registered", async () => {
    const run = await runner.run(runner.buildSpec({ jobId: "ledger-b", command: "sh", args: ["-c", "exit 3"] }));
    expect(run.status).toBe("failed");

    const job = await ledger.getJob("ledger-b");
    expect(job).toMatchObject({ status: "failed", returnCode: 3, command: null, isolation: null });
  });

  it("keeps the event count current through the counter subscriber", async () => {
    const script = `printf '%s\\n' '{"event":"a"}' '{"event":"b"}'`;
    const spec = runner.buildSpec({ jobId: "ledger-c", command: "sh", args: ["-c", script] });
    await ledger.registerJob(spec, { configHash: null, environment: null });

    await runner.run(spec, { subscribers: [ledger.eventCounter("ledger-c")] });
    expect((await ledger.getJob("ledger-c"))?.eventCount).toBe(2);
  });

  it("records the cause of a launch failure", async () => {
    const spec = runner.buildSpec({ jobId: "ledger-d", command: path.join(tmpDir, "no-such-binary") });
    await expect(runner.run(spec)).rejects.toThrow();

    const job = await ledger.getJob("ledger-d");
    expect(job?.status).toBe("failed");
    expect(job?.cause).toMatchObject({ type: "LaunchError", code: "launch_failed" });
    expect((await ledger.listTransitions("ledger-d")).map((t) => t.status)).toEqual(["starting", "failed"]);
  });

  it("lists jobs newest first and filters by status", async () => {
    const all = await ledger.listJobs();
    expect(all.map((j) => j.jobId)).toEqual(["ledger-d", "ledger-c", "ledger-b", "ledger-a"]);

    const failed = await ledger.listJobs({ status: "failed" });
    expect(failed.map((j) => j.jobId)).toEqual(["ledger-d", "ledger-b"]);

    expect(await ledger.listJobs({ limit: 1 })).toHaveLength(1);
    expect(await ledger.getJob("missing")).toBeNull();
    expect(await ledger.listTransitions("missing")).toEqual([]);
  });
});

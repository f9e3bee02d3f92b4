import type { Kysely, Selectable } from "kysely";
import type { EventSubscriber, FinalizeObserver, StatusChange, StatusObserver } from "../core/capabilities.js";
import type { EventRecord } from "../core/event.js";
import type { JobId } from "../core/ids.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import { isJobStatus, type JobStatus } from "../core/status.js";
import type { DB, JobsTable, JobTransitionsTable } from "../db/types.js";
import type { FinalizedRun } from "../runs/runHandle.js";
import type { ExecutionSpec } from "../spec/executionSpec.js";

export interface JobRecord {
  jobId: JobId;
  status: JobStatus;
  isolation: string | null;
  command: string | null;
  image: string | null;
  configHash: string | null;
  environment: JsonObject | null;
  returnCode: number | null;
  eventCount: number;
  cause: JsonObject | null;
  artifactDir: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface TransitionRecord {
  jobId: JobId;
  previous: JobStatus;
  status: JobStatus;
  at: string;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function toStatus(value: string): JobStatus {
  if (!isJobStatus(value)) throw new Error(`unknown job status in ledger: ${value}`);
  return value;
}

function toJobRecord(row: Selectable<JobsTable>): JobRecord {
  return {
    jobId: row.job_id,
    status: toStatus(row.status),
    isolation: row.isolation,
    command: row.command,
    image: row.image,
    configHash: row.config_hash,
    environment: isJsonObject(row.environment) ? row.environment : null,
    returnCode: row.return_code,
    eventCount: row.event_count,
    cause: isJsonObject(row.cause) ? row.cause : null,
    artifactDir: row.artifact_dir,
    createdAt: toIso(row.created_at),
    startedAt: toIsoOrNull(row.started_at),
    finishedAt: toIsoOrNull(row.finished_at)
  };
}

function toTransitionRecord(row: Selectable<JobTransitionsTable>): TransitionRecord {
  return {
    jobId: row.job_id,
    previous: toStatus(row.previous),
    status: toStatus(row.status),
    at: toIso(row.at)
  };
}

function commandLine(spec: ExecutionSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

/**
 * Queryable history of every job the process ran. Registered as a status and finalize
 * observer on the runner; per-job event counts come from {@link eventCounter}.
 */
export class PostgresJobLedger implements StatusObserver, FinalizeObserver {
  constructor(private readonly db: Kysely<DB>) {}

  async registerJob(spec: ExecutionSpec, opts: { configHash: string | null; environment: JsonObject | null }): Promise<void> {
    await this.db
      .insertInto("jobs")
      .values({
        job_id: spec.jobId,
        status: "unstarted",
        isolation: spec.isolation,
        command: commandLine(spec),
        image: spec.image,
        config_hash: opts.configHash,
        environment: opts.environment
      })
      .onConflict((oc) => oc.column("job_id").doNothing())
      .execute();
  }

  async onStatus(change: StatusChange): Promise<void> {
    const { snapshot } = change;
    const at = snapshot.transitions.at(-1)?.at ?? new Date().toISOString();

    await this.db
      .insertInto("jobs")
      .values({ job_id: snapshot.jobId, status: change.status })
      .onConflict((oc) => oc.column("job_id").doNothing())
      .execute();

    await this.db
      .updateTable("jobs")
      .set({
        status: change.status,
        ...(change.status === "running" ? { started_at: at } : {}),
        ...(snapshot.cause ? { cause: snapshot.cause } : {})
      })
      .where("job_id", "=", snapshot.jobId)
      .execute();

    await this.db
      .insertInto("job_transitions")
      .values({ job_id: snapshot.jobId, previous: change.previous, status: change.status, at })
      .execute();
  }

  async onFinalize(run: FinalizedRun): Promise<void> {
    await this.db
      .updateTable("jobs")
      .set({
        status: run.status,
        return_code: run.returnCode,
        event_count: run.eventCount,
        cause: run.cause,
        artifact_dir: run.artifacts.rootDir,
        finished_at: run.snapshot.transitions.at(-1)?.at ?? new Date().toISOString()
      })
      .where("job_id", "=", run.jobId)
      .execute();
  }

  /** Subscriber that keeps `event_count` current while the job runs. */
  eventCounter(jobId: JobId): EventSubscriber {
    return {
      name: "ledger",
      observe: async (record: EventRecord) => {
        await this.db
          .updateTable("jobs")
          .set({ event_count: record.counter + 1 })
          .where("job_id", "=", jobId)
          .execute();
      }
    };
  }

  async getJob(jobId: JobId): Promise<JobRecord | null> {
    const row = await this.db.selectFrom("jobs").selectAll().where("job_id", "=", jobId).executeTakeFirst();
    return row ? toJobRecord(row) : null;
  }

  async listJobs(opts: { status?: JobStatus; limit?: number } = {}): Promise<JobRecord[]> {
    let q = this.db.selectFrom("jobs").selectAll();
    if (opts.status) q = q.where("status", "=", opts.status);
    const rows = await q
      .orderBy("created_at", "desc")
      .orderBy("job_id", "desc")
      .limit(opts.limit ?? 50)
      .execute();
    return rows.map(toJobRecord);
  }

  async listTransitions(jobId: JobId): Promise<TransitionRecord[]> {
    const rows = await this.db
      .selectFrom("job_transitions")
      .selectAll()
      .where("job_id", "=", jobId)
      .orderBy("transition_id", "asc")
      .execute();
    return rows.map(toTransitionRecord);
  }
}

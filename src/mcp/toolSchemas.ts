import * as z from "zod/v4";

/** Generated ids are `job_<ULID>`; callers may also pick their own. */
export const zJobId = z.string().regex(/^[A-Za-z0-9_.-]{1,128}$/, "invalid job_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zJobStatus = z.enum(["unstarted", "starting", "running", "successful", "failed", "canceled", "timeout"]);

const zCause = z.record(z.string(), z.unknown()).nullable();

export const zJobRunInput = z.object({
  job_id: zJobId.optional(),
  command: z.string().min(1),
  args: z.array(z.string()).max(1024).default([]),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string(), z.string()).default({}),
  isolation: z.enum(["none", "process", "container"]).default("none"),
  image: z.string().min(1).optional(),
  workdir: z.string().min(1).optional(),
  mounts: z
    .array(
      z.object({
        host_path: z.string().min(1),
        container_path: z.string().min(1),
        mode: z.enum(["ro", "rw"]).default("rw")
      })
    )
    .default([]),
  timeout_ms: z.number().int().nonnegative().optional(),
  event_data: z.enum(["full", "omit", "failed_only"]).optional(),
  registry_auth: z.record(z.string(), z.unknown()).optional()
});

export const zJobSummary = z.object({
  job_id: zJobId,
  status: zJobStatus,
  return_code: z.number().int().nullable(),
  event_count: z.number().int().nonnegative(),
  artifact_dir: z.string().nullable(),
  cause: zCause
});

export const zJobRunOutput = zJobSummary.extend({
  config_hash: zSha256
});

export const zJobStartOutput = z.object({
  job_id: zJobId,
  status: zJobStatus,
  artifact_dir: z.string().nullable(),
  cause: zCause
});

export const zJobIdInput = z.object({
  job_id: zJobId
});

export const zJobStatusOutput = zJobSummary.extend({
  live: z.boolean(),
  transitions: z.array(z.object({ previous: zJobStatus, status: zJobStatus, at: z.string() }))
});

export const zJobEventsInput = z.object({
  job_id: zJobId,
  after: z.number().int().min(-1).default(-1),
  limit: z.number().int().min(1).max(500).default(100)
});

export const zEventRecord = z.object({
  counter: z.number().int().nonnegative(),
  uuid: z.string(),
  line: z.number().int().nonnegative(),
  start_offset: z.number().int().nonnegative(),
  end_offset: z.number().int().nonnegative(),
  payload: z.record(z.string(), z.unknown())
});

export const zJobEventsOutput = z.object({
  job_id: zJobId,
  events: z.array(zEventRecord),
  next_after: z.number().int().min(-1),
  done: z.boolean()
});

export const zJobCancelOutput = z.object({
  job_id: zJobId,
  cancel_requested: z.boolean(),
  status: zJobStatus
});

export const zJobListInput = z.object({
  status: zJobStatus.optional(),
  limit: z.number().int().min(1).max(200).default(50)
});

export const zJobListOutput = z.object({
  jobs: z.array(
    zJobSummary.extend({
      isolation: z.string().nullable(),
      command: z.string().nullable(),
      created_at: z.string()
    })
  )
});

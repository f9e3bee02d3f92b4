import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import { ArtifactDirectory } from "../artifacts/artifactStore.js";
import type { RunnerConfig } from "../config/runnerConfig.js";
import { causeOf, InvalidSpecError, LaunchError, RunnerError } from "../core/errors.js";
import type { EventRecord } from "../core/event.js";
import { newJobId, type JobId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { componentLogger, type Logger } from "../core/logger.js";
import type { LedgerBackend } from "../db/connection.js";
import { isTerminalStatus, type JobStatus, type StatusSnapshot } from "../core/status.js";
import type { CancelHandle, FinalizedRun, RunHandle } from "../runs/runHandle.js";
import type { Runner } from "../runs/runner.js";
import type { ExecutionSpec } from "../spec/executionSpec.js";
import type { PostgresJobLedger } from "../store/jobLedger.js";
import { envSnapshot } from "./envSnapshot.js";
import {
  zJobCancelOutput,
  zJobEventsInput,
  zJobEventsOutput,
  zJobIdInput,
  zJobListInput,
  zJobListOutput,
  zJobRunInput,
  zJobRunOutput,
  zJobStartOutput,
  zJobStatusOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: RunnerConfig;
  runner: Runner;
  ledger: PostgresJobLedger;
  ledgerBackend: LedgerBackend;
  logger?: Logger;
}

interface LiveJob {
  run: RunHandle;
  cancel: CancelHandle;
}

type JobRunArgs = z.output<typeof zJobRunInput>;

function toEventSummary(e: EventRecord): JsonObject {
  return {
    counter: e.counter,
    uuid: e.uuid,
    line: e.line,
    start_offset: e.startOffset,
    end_offset: e.endOffset,
    payload: e.payload
  };
}

function transitionsOf(snapshot: StatusSnapshot): JsonObject[] {
  let previous: JobStatus = "unstarted";
  return snapshot.transitions.map((t) => {
    const row = { previous, status: t.status, at: t.at };
    previous = t.status;
    return row;
  });
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "engine-runner-gateway",
    version: "0.1.0"
  });
  const logger = deps.logger ?? componentLogger("gateway");
  const live = new Map<JobId, LiveJob>();

  function toSpec(args: JobRunArgs): ExecutionSpec {
    deps.config.assertIsolationAllowed(args.isolation);
    if (args.image) deps.config.assertImageAllowed(args.image);

    try {
      return deps.runner.buildSpec({
        jobId: args.job_id ?? newJobId(),
        command: args.command,
        args: args.args,
        cwd: args.cwd,
        env: args.env,
        isolation: args.isolation,
        image: args.image,
        workdir: args.workdir,
        runtime: deps.config.containerRuntime,
        mounts: args.mounts.map((m) => ({ hostPath: m.host_path, containerPath: m.container_path, mode: m.mode })),
        containerOptions: deps.config.containerOptions,
        sandbox: deps.config.sandboxPaths(),
        timeoutMs: args.timeout_ms,
        eventData: args.event_data ?? deps.config.eventData,
        auth: args.registry_auth
      });
    } catch (err) {
      if (err instanceof InvalidSpecError) throw new McpError(ErrorCode.InvalidParams, err.message);
      throw err;
    }
  }

  /** Registers the job and starts it; `job` is null when the launch itself failed. */
  async function launch(args: JobRunArgs): Promise<{ spec: ExecutionSpec; job: LiveJob | null; failure: LaunchError | null }> {
    const spec = toSpec(args);
    if (await deps.ledger.getJob(spec.jobId)) {
      throw new McpError(ErrorCode.InvalidParams, `job_id already exists: ${spec.jobId}`);
    }
    await deps.ledger.registerJob(spec, { configHash: deps.config.configHash, environment: envSnapshot(deps.config, deps.ledgerBackend) });

    try {
      const job = await deps.runner.runAsync(spec, { subscribers: [deps.ledger.eventCounter(spec.jobId)] });
      live.set(spec.jobId, job);
      void job.run.wait().then(() => {
        live.delete(spec.jobId);
      });
      return { spec, job, failure: null };
    } catch (err) {
      if (err instanceof LaunchError) {
        logger.warn({ jobId: spec.jobId, err }, "job launch failed");
        return { spec, job: null, failure: err };
      }
      if (err instanceof InvalidSpecError) throw new McpError(ErrorCode.InvalidParams, err.message);
      if (err instanceof RunnerError) throw new McpError(ErrorCode.InternalError, err.message);
      throw err;
    }
  }

  function artifactDirOf(jobId: JobId): string {
    return ArtifactDirectory.open(deps.config.runsDir, jobId).rootDir;
  }

  function finalizedSummary(run: FinalizedRun): JsonObject {
    return {
      job_id: run.jobId,
      status: run.status,
      return_code: run.returnCode,
      event_count: run.eventCount,
      artifact_dir: run.artifacts.rootDir,
      cause: run.cause
    };
  }

  async function requireKnown(jobId: JobId): Promise<void> {
    if (live.has(jobId)) return;
    if (!(await deps.ledger.getJob(jobId))) {
      throw new McpError(ErrorCode.InvalidParams, `unknown job_id: ${jobId}`);
    }
  }

  mcp.registerTool(
    "job_run",
    {
      description: "Run a command to completion and return its terminal status.",
      inputSchema: zJobRunInput,
      outputSchema: zJobRunOutput
    },
    async (args) => {
      const { spec, job, failure } = await launch(args);
      let structured: JsonObject;
      if (job) {
        const run = await job.run.wait();
        structured = { ...finalizedSummary(run), config_hash: deps.config.configHash };
      } else {
        structured = {
          job_id: spec.jobId,
          status: "failed",
          return_code: null,
          event_count: 0,
          artifact_dir: artifactDirOf(spec.jobId),
          cause: failure ? causeOf(failure) : null,
          config_hash: deps.config.configHash
        };
      }
      return {
        content: [{ type: "text", text: `Job ${spec.jobId} ${String(structured.status)}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "job_start",
    {
      description: "Start a command and return once it is running.",
      inputSchema: zJobRunInput,
      outputSchema: zJobStartOutput
    },
    async (args) => {
      const { spec, job, failure } = await launch(args);
      const structured: JsonObject = {
        job_id: spec.jobId,
        status: job ? job.run.status() : "failed",
        artifact_dir: artifactDirOf(spec.jobId),
        cause: failure ? causeOf(failure) : null
      };
      return {
        content: [{ type: "text", text: `Job ${spec.jobId} ${String(structured.status)}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "job_status",
    {
      description: "Current status, return code and transition history of a job.",
      inputSchema: zJobIdInput,
      outputSchema: zJobStatusOutput
    },
    async (args) => {
      const jobId = args.job_id;
      const job = live.get(jobId);
      let structured: JsonObject;

      if (job) {
        const snapshot = job.run.snapshot();
        structured = {
          job_id: jobId,
          status: job.run.status(),
          return_code: job.run.returnCode(),
          event_count: await job.run.artifacts.eventCount(),
          artifact_dir: job.run.artifacts.rootDir,
          cause: snapshot.cause,
          live: true,
          transitions: transitionsOf(snapshot)
        };
      } else {
        const record = await deps.ledger.getJob(jobId);
        if (!record) throw new McpError(ErrorCode.InvalidParams, `unknown job_id: ${jobId}`);
        const transitions = await deps.ledger.listTransitions(jobId);
        structured = {
          job_id: jobId,
          status: record.status,
          return_code: record.returnCode,
          event_count: record.eventCount,
          artifact_dir: record.artifactDir,
          cause: record.cause,
          live: false,
          transitions: transitions.map((t) => ({ previous: t.previous, status: t.status, at: t.at }))
        };
      }

      return {
        content: [{ type: "text", text: `Job ${jobId} ${String(structured.status)}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "job_events",
    {
      description: "Page through a job's persisted engine-events by counter.",
      inputSchema: zJobEventsInput,
      outputSchema: zJobEventsOutput
    },
    async (args) => {
      const jobId = args.job_id;
      await requireKnown(jobId);

      const job = live.get(jobId);
      const artifacts = job ? job.run.artifacts : ArtifactDirectory.open(deps.config.runsDir, jobId);
      const events = await artifacts.listEvents({ after: args.after, limit: args.limit });
      const last = events.at(-1);
      const status = job ? job.run.status() : await artifacts.readStatus();
      const done = !job && status !== null && isTerminalStatus(status) && events.length < args.limit;

      return {
        content: [{ type: "text", text: `Job ${jobId}: ${events.length} events` }],
        structuredContent: {
          job_id: jobId,
          events: events.map(toEventSummary),
          next_after: last ? last.counter : args.after,
          done
        }
      };
    }
  );

  mcp.registerTool(
    "job_cancel",
    {
      description: "Request cancellation of a running job.",
      inputSchema: zJobIdInput,
      outputSchema: zJobCancelOutput
    },
    async (args) => {
      const jobId = args.job_id;
      const job = live.get(jobId);
      let structured: JsonObject;

      if (job) {
        job.cancel.cancel();
        structured = { job_id: jobId, cancel_requested: true, status: job.run.status() };
      } else {
        const record = await deps.ledger.getJob(jobId);
        if (!record) throw new McpError(ErrorCode.InvalidParams, `unknown job_id: ${jobId}`);
        structured = { job_id: jobId, cancel_requested: false, status: record.status };
      }

      return {
        content: [{ type: "text", text: `Job ${jobId} cancel ${structured.cancel_requested ? "requested" : "ignored"}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "job_list",
    {
      description: "List recent jobs, newest first.",
      inputSchema: zJobListInput,
      outputSchema: zJobListOutput
    },
    async (args) => {
      const records = await deps.ledger.listJobs({ status: args.status, limit: args.limit });
      return {
        content: [{ type: "text", text: `${records.length} jobs` }],
        structuredContent: {
          jobs: records.map((r) => ({
            job_id: r.jobId,
            status: r.status,
            return_code: r.returnCode,
            event_count: r.eventCount,
            artifact_dir: r.artifactDir,
            cause: r.cause,
            isolation: r.isolation,
            command: r.command,
            created_at: r.createdAt
          }))
        }
      };
    }
  );

  return mcp;
}

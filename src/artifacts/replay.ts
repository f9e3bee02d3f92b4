import { ArtifactDirectory } from "./artifactStore.js";
import type { EventRecord } from "../core/event.js";

export interface ReplayOptions {
  after?: number;
  limit?: number;
  /** Emit each persisted record as one JSON line instead of a summary line. */
  json?: boolean;
}

function eventName(record: EventRecord): string {
  return typeof record.payload.event === "string" ? record.payload.event : "-";
}

export function formatEventLine(record: EventRecord): string {
  return `${record.counter}\t${eventName(record)}\t${record.uuid}\tline=${record.line}\tbytes=${record.startOffset}-${record.endOffset}`;
}

/** Renders a job's persisted outcome and events; reads only, so it is safe on a live job. */
export async function replayJob(artifacts: ArtifactDirectory, opts: ReplayOptions = {}): Promise<string[]> {
  const status = await artifacts.readStatus();
  const rc = await artifacts.readReturnCode();
  const events = await artifacts.listEvents({ after: opts.after, limit: opts.limit });

  const lines = [`job ${artifacts.jobId} status=${status ?? "running"} rc=${rc ?? "-"} events=${events.length}`];
  for (const record of events) {
    lines.push(opts.json ? JSON.stringify(record) : formatEventLine(record));
  }
  const cause = await artifacts.readCause();
  if (cause) lines.push(`cause ${JSON.stringify(cause)}`);
  return lines;
}

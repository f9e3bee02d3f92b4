import { randomUUID } from "crypto";
import type { ArtifactDirectory } from "../artifacts/artifactStore.js";
import type { EventFilter, EventSubscriber } from "../core/capabilities.js";
import { EventParseError, SubscriberError } from "../core/errors.js";
import type { EventRecord } from "../core/event.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import { isJobStatus, isTerminalStatus } from "../core/status.js";
import type { EventDataMode } from "../spec/executionSpec.js";
import type { StatusMachine } from "./statusMachine.js";

export type LineClass =
  | { kind: "blank" }
  | { kind: "unstructured"; error: EventParseError }
  | { kind: "status"; status: string; payload: JsonObject }
  | { kind: "engine"; payload: JsonObject };

/** A status-only record: a string `status` and nothing nested, no `event` name. */
export function isStatusPayload(payload: JsonObject): boolean {
  if (typeof payload.status !== "string" || "event" in payload) return false;
  return Object.values(payload).every((v) => v === null || typeof v !== "object");
}

export function classifyLine(text: string, line: number): LineClass {
  const trimmed = text.trim();
  if (!trimmed) return { kind: "blank" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    return { kind: "unstructured", error: new EventParseError(line, { cause: err }) };
  }
  if (!isJsonObject(parsed)) {
    return { kind: "unstructured", error: new EventParseError(line) };
  }
  if (isStatusPayload(parsed) && typeof parsed.status === "string") {
    return { kind: "status", status: parsed.status, payload: parsed };
  }
  return { kind: "engine", payload: parsed };
}

function isFailedEvent(payload: JsonObject): boolean {
  if (typeof payload.event === "string" && payload.event.includes("failed")) return true;
  const data = payload.event_data;
  return isJsonObject(data) && data.failed === true;
}

export function applyEventDataPolicy(payload: JsonObject, mode: EventDataMode): JsonObject {
  if (mode === "full" || !("event_data" in payload)) return payload;
  if (mode === "failed_only" && isFailedEvent(payload)) return payload;
  const { event_data: _dropped, ...rest } = payload;
  return rest;
}

/** `event_data.host` + `event_data.facts` feed the per-target fact cache. */
export function extractFacts(payload: JsonObject): { target: string; facts: JsonObject } | null {
  const data = payload.event_data;
  if (!isJsonObject(data)) return null;
  const { host, facts } = data;
  if (typeof host !== "string" || !host || !isJsonObject(facts)) return null;
  return { target: host, facts };
}

export interface EventStreamOptions {
  artifacts: ArtifactDirectory;
  machine: StatusMachine;
  subscribers: readonly EventSubscriber[];
  filter: EventFilter | null;
  eventData: EventDataMode;
  logger: Logger;
  newUuid?: () => string;
}

/**
 * Turns raw output lines into numbered engine-events. Every line lands in the raw
 * capture; counters are consumed only by retained events, so persisted counters run
 * 0..n-1 without gaps.
 */
export class EventStreamParser {
  private nextCounter = 0;
  private nextLine = 0;
  private readonly newUuid: () => string;

  constructor(private readonly opts: EventStreamOptions) {
    this.newUuid = opts.newUuid ?? randomUUID;
  }

  get eventCount(): number {
    return this.nextCounter;
  }

  get lineCount(): number {
    return this.nextLine;
  }

  /** ArtifactWriteError escapes; everything else is absorbed and logged. */
  async consume(raw: Buffer): Promise<EventRecord | null> {
    const { logger, artifacts } = this.opts;
    const offsets = await artifacts.appendStdout(raw);
    const line = this.nextLine++;
    const cls = classifyLine(raw.toString("utf8"), line);

    switch (cls.kind) {
      case "blank":
        return null;
      case "unstructured":
        logger.debug({ line, err: cls.error }, "unstructured output line");
        return null;
      case "status":
        await this.applyStatus(cls.status, line);
        return null;
      case "engine":
        return this.emit(cls.payload, line, offsets);
    }
  }

  async *parse(lines: AsyncIterable<Buffer>): AsyncGenerator<EventRecord> {
    for await (const raw of lines) {
      const record = await this.consume(raw);
      if (record) yield record;
    }
  }

  private async applyStatus(status: string, line: number): Promise<void> {
    const { machine, logger } = this.opts;
    if (!isJobStatus(status)) {
      logger.debug({ line, status }, "unknown status in output");
      return;
    }
    if (isTerminalStatus(status)) {
      logger.debug({ line, status }, "terminal status in output ignored; exit outcome decides");
      return;
    }
    if (status === machine.status) return;
    await machine.transition(status);
  }

  private async emit(raw: JsonObject, line: number, offsets: { start: number; end: number }): Promise<EventRecord | null> {
    const { artifacts, filter, subscribers, logger } = this.opts;

    const facts = extractFacts(raw);
    if (facts) await artifacts.writeFactSnapshot(facts.target, facts.facts);

    const payload = applyEventDataPolicy(raw, this.opts.eventData);
    const uuid = typeof payload.uuid === "string" && payload.uuid ? payload.uuid : this.newUuid();
    const record: EventRecord = {
      counter: this.nextCounter,
      kind: "engine",
      uuid,
      line,
      startOffset: offsets.start,
      endOffset: offsets.end,
      payload
    };

    if (filter) {
      let retain = true;
      try {
        retain = await filter.retain(record);
      } catch (err) {
        logger.warn({ err: new SubscriberError("event filter", { cause: err }), counter: record.counter }, "event filter failed; event kept");
      }
      if (!retain) return null;
    }

    await artifacts.writeEvent(record);
    this.nextCounter++;

    for (const [i, subscriber] of subscribers.entries()) {
      try {
        await subscriber.observe(record);
      } catch (err) {
        const name = subscriber.name ?? `subscriber#${i}`;
        logger.warn({ err: new SubscriberError(name, { cause: err }), counter: record.counter }, "event subscriber failed");
      }
    }
    return record;
  }
}

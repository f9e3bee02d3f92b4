import { createHash } from "crypto";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import { ArtifactWriteError } from "../core/errors.js";
import type { EventRecord } from "../core/event.js";
import { eventFileStem, type JobId } from "../core/ids.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import { isJobStatus, type JobStatus, type TerminalStatus } from "../core/status.js";
import { atomicWriteFile, atomicWriteJson } from "./atomicWrite.js";

export const ARTIFACT_FILES = {
  command: "command",
  stdout: "stdout",
  stderr: "stderr",
  status: "status",
  rc: "rc",
  cause: "cause.json",
  events: "job_events",
  factCache: "fact_cache"
} as const;

const EVENT_FILE_RE = /^(\d+)-[A-Za-z0-9_-]+\.json$/;

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe artifact path: ${name}`);
  }
  return joined;
}

const MAX_FACT_FILE_NAME = 128;

/**
 * File name for a fact-cache target. Targets are engine host names: characters outside
 * `[A-Za-z0-9_.-]` become `_`, dot-only names get a `_` prefix and long names are cut
 * down with a digest of the original appended.
 */
export function factFileName(target: string): string {
  let name = target.replace(/[^A-Za-z0-9_.-]/g, "_");
  if (/^\.*$/.test(name)) name = `_${name}`;
  if (name.length > MAX_FACT_FILE_NAME) {
    const digest = createHash("sha256").update(target).digest("hex").slice(0, 16);
    name = `${name.slice(0, MAX_FACT_FILE_NAME - digest.length - 1)}-${digest}`;
  }
  return name;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

async function readTextOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

async function readJsonObjectOrNull(filePath: string): Promise<JsonObject | null> {
  const text = await readTextOrNull(filePath);
  if (text === null) return null;
  const parsed: unknown = JSON.parse(text);
  if (!isJsonObject(parsed)) throw new Error(`expected a JSON object in ${filePath}`);
  return parsed;
}

function parseEventRecord(value: unknown, source: string): EventRecord {
  if (
    !isJsonObject(value) ||
    typeof value.counter !== "number" ||
    typeof value.uuid !== "string" ||
    typeof value.line !== "number" ||
    typeof value.startOffset !== "number" ||
    typeof value.endOffset !== "number" ||
    !isJsonObject(value.payload)
  ) {
    throw new Error(`malformed event record: ${source}`);
  }
  return {
    counter: value.counter,
    kind: "engine",
    uuid: value.uuid,
    line: value.line,
    startOffset: value.startOffset,
    endOffset: value.endOffset,
    payload: value.payload
  };
}

interface AppendTarget {
  handle: FileHandle | null;
  bytes: number;
}

/**
 * The durable record of one job: `<runsDir>/<jobId>/`. A single Coordinator owns the
 * write side; any number of readers may open the same directory concurrently.
 */
export class ArtifactDirectory {
  private readonly appends: Record<"stdout" | "stderr", AppendTarget> = {
    stdout: { handle: null, bytes: 0 },
    stderr: { handle: null, bytes: 0 }
  };

  private constructor(
    readonly jobId: JobId,
    readonly rootDir: string
  ) {}

  static async create(runsDir: string, jobId: JobId): Promise<ArtifactDirectory> {
    const rootDir = safeJoin(path.resolve(runsDir), jobId);
    try {
      await fs.mkdir(path.dirname(rootDir), { recursive: true });
      await fs.mkdir(rootDir);
      await fs.mkdir(path.join(rootDir, ARTIFACT_FILES.events));
      await fs.mkdir(path.join(rootDir, ARTIFACT_FILES.factCache));
    } catch (err) {
      throw new ArtifactWriteError(rootDir, { cause: err });
    }
    return new ArtifactDirectory(jobId, rootDir);
  }

  static open(runsDir: string, jobId: JobId): ArtifactDirectory {
    return new ArtifactDirectory(jobId, safeJoin(path.resolve(runsDir), jobId));
  }

  pathOf(name: string): string {
    return safeJoin(this.rootDir, name);
  }

  get eventsDir(): string {
    return path.join(this.rootDir, ARTIFACT_FILES.events);
  }

  get factCacheDir(): string {
    return path.join(this.rootDir, ARTIFACT_FILES.factCache);
  }

  // --- write side -------------------------------------------------------------

  private async append(stream: "stdout" | "stderr", chunk: Buffer): Promise<{ start: number; end: number }> {
    const target = this.appends[stream];
    const filePath = this.pathOf(ARTIFACT_FILES[stream]);
    try {
      if (!target.handle) target.handle = await fs.open(filePath, "a");
      await target.handle.write(chunk);
    } catch (err) {
      throw new ArtifactWriteError(filePath, { cause: err });
    }
    const start = target.bytes;
    target.bytes += chunk.byteLength;
    return { start, end: target.bytes };
  }

  /** Appends raw output and returns the byte range it occupies in the capture. */
  appendStdout(chunk: Buffer): Promise<{ start: number; end: number }> {
    return this.append("stdout", chunk);
  }

  async appendStderr(chunk: Buffer): Promise<void> {
    await this.append("stderr", chunk);
  }

  async writeCommand(doc: JsonObject): Promise<void> {
    await this.guard(ARTIFACT_FILES.command, () => atomicWriteJson(this.pathOf(ARTIFACT_FILES.command), doc));
  }

  async writeEvent(record: EventRecord): Promise<string> {
    const filePath = path.join(this.eventsDir, `${eventFileStem(record.counter, record.uuid)}.json`);
    await this.guard(filePath, () => atomicWriteFile(filePath, JSON.stringify(record)));
    return filePath;
  }

  async writeFactSnapshot(target: string, facts: JsonObject): Promise<void> {
    const filePath = safeJoin(this.factCacheDir, factFileName(target));
    await this.guard(filePath, () => atomicWriteJson(filePath, facts));
  }

  /** `status` is written last so its presence implies `rc` and `cause.json` are complete. */
  async finalize(outcome: { status: TerminalStatus; returnCode: number | null; cause: JsonObject | null }): Promise<void> {
    await this.closeAppends();
    if (outcome.returnCode !== null) {
      const rcPath = this.pathOf(ARTIFACT_FILES.rc);
      await this.guard(rcPath, () => atomicWriteFile(rcPath, `${outcome.returnCode}`));
    }
    if (outcome.cause) {
      const causePath = this.pathOf(ARTIFACT_FILES.cause);
      await this.guard(causePath, () => atomicWriteJson(causePath, outcome.cause));
    }
    const statusPath = this.pathOf(ARTIFACT_FILES.status);
    await this.guard(statusPath, () => atomicWriteFile(statusPath, outcome.status));
  }

  async closeAppends(): Promise<void> {
    for (const target of Object.values(this.appends)) {
      const handle = target.handle;
      target.handle = null;
      if (handle) await handle.close();
    }
  }

  private async guard(target: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      throw new ArtifactWriteError(target, { cause: err });
    }
  }

  // --- read side ---------------------------------------------------------------

  async readStatus(): Promise<JobStatus | null> {
    const text = await readTextOrNull(this.pathOf(ARTIFACT_FILES.status));
    if (text === null) return null;
    const status = text.trim();
    return isJobStatus(status) ? status : null;
  }

  async readReturnCode(): Promise<number | null> {
    const text = await readTextOrNull(this.pathOf(ARTIFACT_FILES.rc));
    if (text === null) return null;
    const n = Number.parseInt(text.trim(), 10);
    return Number.isInteger(n) ? n : null;
  }

  readCause(): Promise<JsonObject | null> {
    return readJsonObjectOrNull(this.pathOf(ARTIFACT_FILES.cause));
  }

  readCommand(): Promise<JsonObject | null> {
    return readJsonObjectOrNull(this.pathOf(ARTIFACT_FILES.command));
  }

  async readStdout(): Promise<string> {
    return (await readTextOrNull(this.pathOf(ARTIFACT_FILES.stdout))) ?? "";
  }

  async readStderr(): Promise<string> {
    return (await readTextOrNull(this.pathOf(ARTIFACT_FILES.stderr))) ?? "";
  }

  readFactCache(target: string): Promise<JsonObject | null> {
    return readJsonObjectOrNull(safeJoin(this.factCacheDir, factFileName(target)));
  }

  private async eventFiles(): Promise<Array<{ counter: number; name: string }>> {
    let names: string[];
    try {
      names = await fs.readdir(this.eventsDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const files: Array<{ counter: number; name: string }> = [];
    for (const name of names) {
      const m = EVENT_FILE_RE.exec(name);
      if (m && m[1] !== undefined) files.push({ counter: Number.parseInt(m[1], 10), name });
    }
    return files.sort((a, b) => a.counter - b.counter);
  }

  async listEvents(opts: { after?: number; limit?: number } = {}): Promise<EventRecord[]> {
    const after = opts.after ?? -1;
    let files = (await this.eventFiles()).filter((f) => f.counter > after);
    if (opts.limit !== undefined) files = files.slice(0, opts.limit);

    const records: EventRecord[] = [];
    for (const f of files) {
      const filePath = path.join(this.eventsDir, f.name);
      records.push(parseEventRecord(JSON.parse(await fs.readFile(filePath, "utf8")), filePath));
    }
    return records;
  }

  async readEvent(counter: number): Promise<EventRecord | null> {
    const file = (await this.eventFiles()).find((f) => f.counter === counter);
    if (!file) return null;
    const filePath = path.join(this.eventsDir, file.name);
    return parseEventRecord(JSON.parse(await fs.readFile(filePath, "utf8")), filePath);
  }

  async eventCount(): Promise<number> {
    return (await this.eventFiles()).length;
  }
}

import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { EventDataMode, IsolationMode, SandboxPaths } from "../spec/executionSpec.js";

const zIsolationMode = z.enum(["none", "process", "container"]);

export const zRunnerConfig = z.object({
  version: z.number().int(),
  runs_dir: z.string().min(1),
  poll_interval_ms: z.number().int().positive().default(50),
  kill_grace_ms: z.number().int().nonnegative().default(5000),
  queue_capacity: z.number().int().positive().default(1024),
  event_data: z.enum(["full", "omit", "failed_only"]).default("full"),
  isolation: z
    .object({
      allowed_modes: z.array(zIsolationMode).min(1)
    })
    .default({ allowed_modes: ["none"] }),
  container: z
    .object({
      runtime: z.string().min(1).default("podman"),
      image_allowlist: z.array(z.string()).default([]),
      options: z.array(z.string()).default([])
    })
    .default({ runtime: "podman", image_allowlist: [], options: [] }),
  process_isolation: z
    .object({
      executable: z.string().min(1).default("bwrap"),
      hide_paths: z.array(z.string()).default([]),
      show_paths: z.array(z.string()).default([]),
      ro_paths: z.array(z.string()).default([])
    })
    .default({ executable: "bwrap", hide_paths: [], show_paths: [], ro_paths: [] })
});

export type RunnerConfigFile = z.output<typeof zRunnerConfig>;

export function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([k, v]) => [k, canonical(v)]));
  }
  return value;
}

/** Key order does not affect the hash. */
export function hashConfig(config: RunnerConfigFile): `sha256:${string}` {
  const digest = createHash("sha256").update(JSON.stringify(canonical(config))).digest("hex");
  return `sha256:${digest}`;
}

function expandPaths(values: string[]): string[] {
  return values.map((p) => expandEnvToken(p)).filter((p): p is string => typeof p === "string" && p.trim().length > 0);
}

function expandConfigEnv(config: RunnerConfigFile, baseDir: string): RunnerConfigFile {
  const runsDir = expandEnvToken(config.runs_dir);
  if (!runsDir) throw new Error(`runs_dir resolves to an unset environment variable: ${config.runs_dir}`);
  const pi = config.process_isolation;
  return {
    ...config,
    runs_dir: path.resolve(baseDir, runsDir),
    process_isolation: {
      ...pi,
      hide_paths: expandPaths(pi.hide_paths),
      show_paths: expandPaths(pi.show_paths),
      ro_paths: expandPaths(pi.ro_paths)
    }
  };
}

/**
 * Deployment settings for the runner and the gateway. The hash is recorded with each
 * job so a ledger row can be tied to the configuration that admitted it.
 */
export class RunnerConfig {
  readonly configHash: `sha256:${string}`;

  constructor(private readonly config: RunnerConfigFile) {
    this.configHash = hashConfig(config);
  }

  static parse(raw: unknown, baseDir: string = process.cwd()): RunnerConfig {
    const parsed = zRunnerConfig.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
      throw new Error(`invalid runner config: ${issues.join("; ")}`);
    }
    return new RunnerConfig(expandConfigEnv(parsed.data, baseDir));
  }

  static async loadFromFile(filePath: string): Promise<RunnerConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed: unknown = YAML.parse(raw);
    try {
      return RunnerConfig.parse(parsed, path.dirname(path.resolve(filePath)));
    } catch (err) {
      throw new Error(`invalid runner config at ${filePath}`, { cause: err });
    }
  }

  snapshot(): RunnerConfigFile {
    return structuredClone(this.config);
  }

  get runsDir(): string {
    return this.config.runs_dir;
  }

  get pollIntervalMs(): number {
    return this.config.poll_interval_ms;
  }

  get killGraceMs(): number {
    return this.config.kill_grace_ms;
  }

  get queueCapacity(): number {
    return this.config.queue_capacity;
  }

  get eventData(): EventDataMode {
    return this.config.event_data;
  }

  get containerRuntime(): string {
    return this.config.container.runtime;
  }

  get containerOptions(): string[] {
    return [...this.config.container.options];
  }

  sandboxPaths(): SandboxPaths {
    const pi = this.config.process_isolation;
    return {
      executable: pi.executable,
      hidePaths: [...pi.hide_paths],
      showPaths: [...pi.show_paths],
      roPaths: [...pi.ro_paths]
    };
  }

  assertIsolationAllowed(mode: IsolationMode): void {
    if (!this.config.isolation.allowed_modes.includes(mode)) {
      throw new McpError(ErrorCode.InvalidRequest, `config denied isolation mode: ${mode}`);
    }
  }

  /** An empty allowlist admits any image. */
  assertImageAllowed(image: string): void {
    const allowlist = this.config.container.image_allowlist;
    if (allowlist.length && !allowlist.includes(image)) {
      throw new McpError(ErrorCode.InvalidRequest, `config denied container image: ${image}`);
    }
  }
}

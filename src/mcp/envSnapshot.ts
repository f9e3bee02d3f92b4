import os from "os";
import type { RunnerConfig } from "../config/runnerConfig.js";
import type { JsonObject } from "../core/json.js";
import type { LedgerBackend } from "../db/connection.js";

/** Host facts stored with each job row, next to the config hash that admitted it. */
export function envSnapshot(config: RunnerConfig, ledger: LedgerBackend): JsonObject {
  return {
    node: process.version,
    platform: process.platform,
    arch: process.arch,
    hostname: os.hostname(),
    ledger,
    runs_dir: config.runsDir,
    container_runtime: config.containerRuntime
  };
}

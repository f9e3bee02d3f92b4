import path from "path";
import { fileURLToPath } from "url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { RunnerConfig } from "./config/runnerConfig.js";
import { rootLogger } from "./core/logger.js";
import { applyLedgerSchema, createLedgerDb, openLedgerPool } from "./db/connection.js";
import { defaultLaunchers } from "./execution/backends/launchers.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { Runner } from "./runs/runner.js";
import { PostgresJobLedger } from "./store/jobLedger.js";

export { Runner, type AsyncRun, type RunCallbacks, type RunnerOptions } from "./runs/runner.js";
export { RunHandle, type CancelHandle, type FinalizedRun } from "./runs/runHandle.js";
export { buildExecutionSpec, type ExecutionSpec, type ExecutionSpecInput } from "./spec/executionSpec.js";
export { LiveJobRegistry } from "./spec/liveJobs.js";
export { ArtifactDirectory } from "./artifacts/artifactStore.js";
export * from "./core/errors.js";
export type * from "./core/capabilities.js";

async function main(): Promise<void> {
  const configPath = process.env.RUNNER_CONFIG_PATH ?? "config/default.runner.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  process.env.RUNS_DIR ??= path.resolve("var/runs");

  const config = await RunnerConfig.loadFromFile(configPath);
  const { pool, backend } = openLedgerPool(process.env.DATABASE_URL);
  if (backend === "pg-mem" || autoSchema) {
    await applyLedgerSchema(pool, "db/schema.sql");
  }

  const ledger = new PostgresJobLedger(createLedgerDb(pool));
  const runner = new Runner({
    runsDir: config.runsDir,
    pollIntervalMs: config.pollIntervalMs,
    killGraceMs: config.killGraceMs,
    queueCapacity: config.queueCapacity,
    launchers: defaultLaunchers(),
    statusObservers: [ledger],
    finalizeObservers: [ledger]
  });

  const server = createGatewayServer({ config, runner, ledger, ledgerBackend: backend });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  rootLogger.info({ configHash: config.configHash, runsDir: config.runsDir, ledger: backend }, "engine-runner gateway ready");
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    rootLogger.fatal({ err }, "gateway failed to start");
    process.exitCode = 1;
  });
}

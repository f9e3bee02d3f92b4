import pino, { type Logger } from "pino";

export type { Logger };

const level = process.env.LOG_LEVEL ?? "info";

// stdout carries the MCP stdio transport, so logs go to stderr.
export const rootLogger: Logger = pino(
  {
    name: "engine-runner",
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination({ dest: 2, sync: true })
);

export function componentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return rootLogger.child({ component, ...bindings });
}

import type { JsonObject } from "./json.js";

export type RunnerErrorCode =
  | "invalid_spec"
  | "launch_failed"
  | "event_parse"
  | "subscriber_failed"
  | "kill_failed"
  | "artifact_write";

export abstract class RunnerError extends Error {
  abstract readonly code: RunnerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): JsonObject {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause === undefined ? null : String(this.cause)
    };
  }
}

export class InvalidSpecError extends RunnerError {
  readonly code = "invalid_spec" as const;

  constructor(
    message: string,
    readonly issues: string[] = [message]
  ) {
    super(message);
  }
}

export class LaunchError extends RunnerError {
  readonly code = "launch_failed" as const;

  constructor(
    message: string,
    readonly detail: { stderr?: string; exitCode?: number | null } = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A single output line that is not a JSON object; the run continues. */
export class EventParseError extends RunnerError {
  readonly code = "event_parse" as const;

  constructor(
    readonly line: number,
    options?: { cause?: unknown }
  ) {
    super(`line ${line} is not a structured record`, options);
  }
}

export class SubscriberError extends RunnerError {
  readonly code = "subscriber_failed" as const;

  constructor(
    readonly subscriber: string,
    options?: { cause?: unknown }
  ) {
    super(`subscriber ${subscriber} failed`, options);
  }
}

export class KillError extends RunnerError {
  readonly code = "kill_failed" as const;
}

export class ArtifactWriteError extends RunnerError {
  readonly code = "artifact_write" as const;

  constructor(
    readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(`unable to write artifact ${target}`, options);
  }
}

export function causeOf(err: unknown): JsonObject {
  if (err instanceof RunnerError) return err.toJSON();
  if (err instanceof Error) return { type: err.name, code: null, message: err.message, cause: null };
  return { type: "Unknown", code: null, message: String(err), cause: null };
}

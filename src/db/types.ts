import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
type Timestamp = ColumnType<Date | string, string, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;

export interface JobsTable {
  job_id: string;
  status: string;
  isolation: OptionalNullable<string>;
  command: OptionalNullable<string>;
  image: OptionalNullable<string>;
  config_hash: OptionalNullable<string>;
  environment: JsonNullable;
  return_code: OptionalNullable<number>;
  event_count: ColumnType<number, number | undefined, number>;
  cause: JsonNullable;
  artifact_dir: OptionalNullable<string>;
  created_at: Generated<Date | string>;
  started_at: TimestampNullable;
  finished_at: TimestampNullable;
}

export interface JobTransitionsTable {
  transition_id: Generated<number>;
  job_id: string;
  previous: string;
  status: string;
  at: Timestamp;
}

export interface DB {
  jobs: JobsTable;
  job_transitions: JobTransitionsTable;
}

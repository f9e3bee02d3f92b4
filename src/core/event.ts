import type { JsonObject } from "./json.js";

/** One numbered engine-event as persisted under `job_events/`. */
export interface EventRecord {
  counter: number;
  kind: "engine";
  uuid: string;
  /** 0-based line index of the record in the raw stdout capture. */
  line: number;
  startOffset: number;
  endOffset: number;
  payload: JsonObject;
}

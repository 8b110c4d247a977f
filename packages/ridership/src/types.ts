import type { Reading } from "tp-shared/types";

/** One provider row as read from the readings CSV, keyed by header name */
export type RawRow = Record<string, string>;

export interface RejectedRow {
  row: number; // 1-based data record, header excluded
  reason: string;
}

export interface LoadedReadings {
  readings: Reading[];
  rejected: RejectedRow[];
}

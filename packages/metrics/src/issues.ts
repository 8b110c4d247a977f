import type { DeviceId, EntityId, GroupingKey, StationId, Timestamp } from "tp-shared/types";

export type MalformedReason =
  | "duplicate-timestamp" // zero-length interval
  | "out-of-order" // timestamp earlier than its predecessor
  | "negative-increment" // negative or non-finite net increment
  | "station-mismatch"; // device reported under a second station

export type InsufficientDataIssue = {
  kind: "insufficient-data";
  scope: "device" | "entity" | "batch";
  id?: DeviceId | EntityId;
  entityKind?: GroupingKey;
  bucket?: Timestamp;
  batchSize?: number;
  message: string;
};

export type DegenerateNormalizationIssue = {
  kind: "degenerate-normalization";
  batchSize: number;
  rawValue: number;
  bucket?: Timestamp;
  message: string;
};

export type UnmappedEntityIssue = {
  kind: "unmapped-entity";
  stationId: StationId;
  droppedRows: number;
  message: string;
};

export type MalformedReadingIssue = {
  kind: "malformed-reading";
  deviceId: DeviceId;
  reason: MalformedReason;
  timestamp: Timestamp;
  previousTimestamp?: Timestamp;
  message: string;
};

export type Issue =
  | InsufficientDataIssue
  | DegenerateNormalizationIssue
  | UnmappedEntityIssue
  | MalformedReadingIssue;

export type IssueKind = Issue["kind"];

/** A stage result together with the data-quality issues it ran into */
export interface Reported<T> {
  value: T;
  issues: Issue[];
}

/**
 * Thrown when every raw priority in a batch is equal, so min-max
 * normalization has no range. Invalidates the batch's priority column.
 */
export class DegenerateNormalizationError extends Error {
  readonly kind = "degenerate-normalization";

  constructor(
    readonly batchSize: number,
    readonly rawValue: number,
    readonly bucket?: Timestamp,
  ) {
    const where = bucket === undefined ? "" : ` in bucket ${new Date(bucket * 1000).toISOString()}`;
    super(
      `Cannot normalize priority${where}: all ${batchSize} raw scores equal ${rawValue}`,
    );
    this.name = "DegenerateNormalizationError";
  }

  toIssue(): DegenerateNormalizationIssue {
    return {
      kind: this.kind,
      batchSize: this.batchSize,
      rawValue: this.rawValue,
      bucket: this.bucket,
      message: this.message,
    };
  }
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid pipeline configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function countIssues(issues: readonly Issue[]): Record<IssueKind, number> {
  const counts: Record<IssueKind, number> = {
    "insufficient-data": 0,
    "degenerate-normalization": 0,
    "unmapped-entity": 0,
    "malformed-reading": 0,
  };
  for (const issue of issues) counts[issue.kind]++;
  return counts;
}

import { compareStrings } from "tp-shared/itertools";
import type { EntityId, GroupingKey, Timestamp } from "tp-shared/types";
import type { BucketAggregate, SummaryAggregate } from "./aggregate";
import type { Scored } from "./priority";

export type TimeSeriesRow = {
  entity: EntityId;
  kind: GroupingKey;
  bucket: string; // ISO-8601, UTC
  totalTraffic: number;
  density: number;
  deviceCount: number;
  coverage: number;
  lowConfidence: boolean;
  priority: number;
};

export type SummaryRow = {
  rank: number; // 1-based, by priority
  entity: EntityId;
  kind: GroupingKey;
  sumTraffic: number;
  meanTraffic: number;
  sumDensity: number;
  meanDensity: number;
  buckets: number;
  priority: number;
};

export const formatBucket = (bucket: Timestamp) => new Date(bucket * 1000).toISOString();

export function projectTimeSeries(scored: readonly Scored<BucketAggregate>[]): TimeSeriesRow[] {
  return scored
    .toSorted((a, b) => compareStrings(a.entity, b.entity) || a.bucket - b.bucket)
    .map((r) => ({
      entity: r.entity,
      kind: r.kind,
      bucket: formatBucket(r.bucket),
      totalTraffic: r.totalTraffic,
      density: r.density,
      deviceCount: r.deviceCount,
      coverage: r.coverage,
      lowConfidence: r.lowConfidence,
      priority: r.priority,
    }));
}

export function projectSummaries(scored: readonly Scored<SummaryAggregate>[]): SummaryRow[] {
  return scored
    .toSorted((a, b) => b.priority - a.priority || compareStrings(a.entity, b.entity))
    .map((r, i) => ({
      rank: i + 1,
      entity: r.entity,
      kind: r.kind,
      sumTraffic: r.totalTraffic,
      meanTraffic: r.meanTraffic,
      sumDensity: r.density,
      meanDensity: r.meanDensity,
      buckets: r.bucketCount,
      priority: r.priority,
    }));
}

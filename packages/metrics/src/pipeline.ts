import * as _ from "radash";
import { emptyTopology, type Reading, type Topology } from "tp-shared/types";
import { type BucketAggregate, aggregateBuckets, summarizeEntities } from "./aggregate";
import { bucketRates } from "./bucket";
import { type PipelineConfig, type PipelineOptions, resolveConfig } from "./config";
import type { Issue } from "./issues";
import { normalizeIntervals } from "./normalize";
import { scoreBatch, scoreByBucket } from "./priority";
import {
  projectSummaries,
  projectTimeSeries,
  type SummaryRow,
  type TimeSeriesRow,
} from "./project";

export interface PipelineStats {
  readings: number;
  devices: number;
  intervals: number;
  bucketedRows: number;
  entities: number;
  buckets: number;
  lowCoverageRows: number;
}

export interface PipelineResult {
  config: PipelineConfig;
  /** Bucket aggregates that went into scoring */
  aggregates: BucketAggregate[];
  timeSeries: TimeSeriesRow[];
  summary: SummaryRow[];
  issues: Issue[];
  stats: PipelineStats;
}

/**
 * Readings in, scored tables out: normalize intervals, snap them to buckets,
 * roll them up to the configured entity and score the time series and the
 * whole-period summary as two separate batches.
 *
 * The two batches fail independently: one whose raw priorities have no
 * spread yields no rows and a `degenerate-normalization` issue, and the other
 * is still returned. Throws `ConfigError` for bad options.
 */
export function runPipeline(
  readings: readonly Reading[],
  topology: Topology = emptyTopology(),
  options: PipelineOptions = {},
): PipelineResult {
  const config = resolveConfig(options);
  const weights = { trafficWeight: config.trafficWeight, densityWeight: config.densityWeight };

  const normalized = normalizeIntervals(readings, {
    anchor: config.anchor,
    dropZeroRates: config.dropZeroRates,
  });
  const bucketed = bucketRates(normalized.value, config.bucketResolution);
  const aggregated = aggregateBuckets(bucketed, {
    groupBy: config.groupingKey,
    topology,
    minCoverage: config.minCoverage,
  });

  const aggregates = config.keepLowCoverage
    ? aggregated.value
    : aggregated.value.filter((row) => !row.lowConfidence);

  const series =
    config.batching === "per-bucket"
      ? scoreByBucket(aggregates, weights)
      : scoreBatch(aggregates, weights);
  const summary = scoreBatch(summarizeEntities(aggregates), weights);

  return {
    config,
    aggregates,
    timeSeries: projectTimeSeries(series.value),
    summary: projectSummaries(summary.value),
    issues: [...normalized.issues, ...aggregated.issues, ...series.issues, ...summary.issues],
    stats: {
      readings: readings.length,
      devices: _.unique(readings.map((r) => r.deviceId)).length,
      intervals: normalized.value.length,
      bucketedRows: bucketed.length,
      entities: _.unique(aggregates.map((r) => r.entity)).length,
      buckets: _.unique(aggregates.map((r) => r.bucket)).length,
      lowCoverageRows: aggregated.value.filter((row) => row.lowConfidence).length,
    },
  };
}

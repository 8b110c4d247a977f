import assert from "node:assert";
import { compareStrings } from "tp-shared/itertools";
import { maxOf, minOf, ratioOrZero } from "tp-shared/math";
import type { EntityId, Timestamp } from "tp-shared/types";
import { DegenerateNormalizationError, type Issue, type Reported } from "./issues";

export type ScoreInput = Readonly<{
  totalTraffic: number;
  density: number;
}>;

export type PriorityFields = Readonly<{
  trafficScore: number;
  densityScore: number;
  rawPriority: number;
  /** min-max normalized over the batch, in [0, 1] */
  priority: number;
}>;

export type Scored<T> = T & PriorityFields;

export interface PriorityWeights {
  trafficWeight?: number;
  densityWeight?: number;
}

/**
 * Rescale values onto [0, 1]: the smallest maps to exactly 0 and the largest
 * to exactly 1. Throws when there is no spread to rescale by.
 */
export function minMaxNormalize(values: readonly number[], bucket?: Timestamp): number[] {
  if (values.length === 0) return [];
  const lo = minOf(values);
  const hi = maxOf(values);
  if (hi === lo) {
    throw new DegenerateNormalizationError(values.length, lo, bucket);
  }
  const range = hi - lo;
  return values.map((v) => (v - lo) / range);
}

/**
 * Score one batch of aggregates. An entity has to be both busy and crowded to
 * rank high: the traffic and density scores are multiplied, after adding the
 * optional weights to each.
 *
 * The batch can be per-bucket rows or per-entity summaries; priorities are
 * only comparable inside the batch they were scored in.
 */
export function scorePriority<T extends ScoreInput>(
  records: readonly T[],
  { trafficWeight = 0, densityWeight = 0 }: PriorityWeights = {},
  bucket?: Timestamp,
): Reported<Scored<T>[]> {
  if (records.length === 0) {
    const issue: Issue = {
      kind: "insufficient-data",
      scope: "batch",
      bucket,
      batchSize: 0,
      message: "Nothing to score: the batch is empty",
    };
    return { value: [], issues: [issue] };
  }

  const maxTraffic = maxOf(records.map((r) => r.totalTraffic));
  const maxDensity = maxOf(records.map((r) => r.density));

  const components = records.map((r) => {
    const trafficScore = ratioOrZero(r.totalTraffic, maxTraffic);
    const densityScore = ratioOrZero(r.density, maxDensity);
    return {
      trafficScore,
      densityScore,
      rawPriority: (trafficScore + trafficWeight) * (densityScore + densityWeight),
    };
  });

  const priorities = minMaxNormalize(
    components.map((c) => c.rawPriority),
    bucket,
  );

  const scored = records.map((r, i) => {
    const c = components[i];
    const priority = priorities[i];
    assert(c && priority !== undefined);
    return { ...r, ...c, priority };
  });
  return { value: scored, issues: [] };
}

/**
 * Like `scorePriority`, but a batch without spread comes back as no rows and a
 * `degenerate-normalization` issue instead of throwing.
 */
export function scoreBatch<T extends ScoreInput>(
  records: readonly T[],
  weights: PriorityWeights = {},
  bucket?: Timestamp,
): Reported<Scored<T>[]> {
  try {
    return scorePriority(records, weights, bucket);
  } catch (err) {
    if (!(err instanceof DegenerateNormalizationError)) throw err;
    return { value: [], issues: [err.toIssue()] };
  }
}

/**
 * Score every bucket as its own batch, ranking entities against each other
 * within a time window. A bucket whose scores cannot be normalized is left
 * out and reported; the remaining buckets are still scored.
 */
export function scoreByBucket<T extends ScoreInput & { entity: EntityId; bucket: Timestamp }>(
  rows: readonly T[],
  weights: PriorityWeights = {},
): Reported<Scored<T>[]> {
  const byBucket = new Map<Timestamp, T[]>();
  for (const row of rows) {
    const batch = byBucket.get(row.bucket);
    if (batch) batch.push(row);
    else byBucket.set(row.bucket, [row]);
  }

  const scored: Scored<T>[] = [];
  const issues: Issue[] = [];
  for (const [bucket, batch] of Array.from(byBucket).sort(([a], [b]) => a - b)) {
    const result = scoreBatch(batch, weights, bucket);
    scored.push(...result.value);
    issues.push(...result.issues);
  }

  scored.sort((a, b) => compareStrings(a.entity, b.entity) || a.bucket - b.bucket);
  return { value: scored, issues };
}

import assert from "node:assert";
import * as _ from "radash";
import { compareStrings } from "tp-shared/itertools";
import {
  type DeviceId,
  type EntityId,
  emptyTopology,
  GroupingKey,
  type StationId,
  type Timestamp,
  type Topology,
} from "tp-shared/types";
import type { BucketedRate } from "./bucket";
import type { Issue, Reported } from "./issues";

export type BucketAggregate = Readonly<{
  entity: EntityId;
  kind: GroupingKey;
  bucket: Timestamp;
  totalTraffic: number;
  density: number;
  deviceCount: number;
  /** Distinct entities reporting in this bucket */
  coverage: number;
  lowConfidence: boolean;
}>;

export type SummaryAggregate = Readonly<{
  entity: EntityId;
  kind: GroupingKey;
  totalTraffic: number;
  density: number;
  meanTraffic: number;
  meanDensity: number;
  deviceCount: number;
  bucketCount: number;
  firstBucket: Timestamp;
  lastBucket: Timestamp;
}>;

export interface AggregateOptions {
  groupBy: GroupingKey;
  topology?: Topology;
  minCoverage?: number;
}

function getOrInsert<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

/**
 * Running (entity, bucket) totals. Shards of a reading set can be added to
 * separate accumulators and merged; densities are only computed in `finish`,
 * once every device of an entity has been seen.
 */
export class TrafficAccumulator {
  private readonly traffic = new Map<EntityId, Map<Timestamp, number>>();
  private readonly devices = new Map<EntityId, Map<StationId, Set<DeviceId>>>();
  private readonly unmapped = new Map<StationId, number>();

  constructor(
    readonly groupBy: GroupingKey,
    private readonly topology: Topology = emptyTopology(),
  ) {}

  /** Entity a station rolls up to, or undefined when it has no complex */
  resolveEntity(stationId: StationId): EntityId | undefined {
    return this.groupBy === GroupingKey.Station ? stationId : this.topology.complexes.get(stationId);
  }

  add(records: Iterable<BucketedRate>): this {
    for (const r of records) {
      const entity = this.resolveEntity(r.stationId);
      if (entity === undefined) {
        this.unmapped.set(r.stationId, (this.unmapped.get(r.stationId) ?? 0) + 1);
        continue;
      }
      const buckets = getOrInsert(this.traffic, entity, () => new Map<Timestamp, number>());
      buckets.set(r.bucket, (buckets.get(r.bucket) ?? 0) + r.rate);

      const stations = getOrInsert(this.devices, entity, () => new Map<StationId, Set<DeviceId>>());
      getOrInsert(stations, r.stationId, () => new Set<DeviceId>()).add(r.deviceId);
    }
    return this;
  }

  merge(other: TrafficAccumulator): this {
    assert(
      other.groupBy === this.groupBy,
      `Cannot merge ${other.groupBy} totals into ${this.groupBy} totals`,
    );

    for (const [entity, buckets] of other.traffic) {
      const mine = getOrInsert(this.traffic, entity, () => new Map<Timestamp, number>());
      for (const [bucket, rate] of buckets) {
        mine.set(bucket, (mine.get(bucket) ?? 0) + rate);
      }
    }
    for (const [entity, stations] of other.devices) {
      const mine = getOrInsert(this.devices, entity, () => new Map<StationId, Set<DeviceId>>());
      for (const [stationId, devices] of stations) {
        const set = getOrInsert(mine, stationId, () => new Set<DeviceId>());
        for (const d of devices) set.add(d);
      }
    }
    for (const [stationId, rows] of other.unmapped) {
      this.unmapped.set(stationId, (this.unmapped.get(stationId) ?? 0) + rows);
    }
    return this;
  }

  /** Density divisor: the topology's station count where given, else devices observed */
  deviceCount(entity: EntityId): number {
    const stations = this.devices.get(entity);
    if (!stations) return 0;
    let count = 0;
    for (const [stationId, devices] of stations) {
      count += this.topology.deviceCounts.get(stationId) ?? devices.size;
    }
    return count;
  }

  finish(minCoverage = 0): Reported<BucketAggregate[]> {
    const issues: Issue[] = [];

    const unmapped = Array.from(this.unmapped).sort(([a], [b]) => compareStrings(a, b));
    for (const [stationId, droppedRows] of unmapped) {
      issues.push({
        kind: "unmapped-entity",
        stationId,
        droppedRows,
        message: `Station ${stationId} has no complex; ${droppedRows} bucketed row(s) left out of complex totals`,
      });
    }

    const totals: Omit<BucketAggregate, "coverage" | "lowConfidence">[] = [];
    for (const entity of Array.from(this.traffic.keys()).sort(compareStrings)) {
      const deviceCount = this.deviceCount(entity);
      const buckets = this.traffic.get(entity);
      if (!buckets) continue;
      if (!(deviceCount > 0)) {
        issues.push({
          kind: "insufficient-data",
          scope: "entity",
          id: entity,
          entityKind: this.groupBy,
          batchSize: buckets.size,
          message: `${this.groupBy} ${entity} has no devices; density undefined, entity left out`,
        });
        continue;
      }
      for (const bucket of Array.from(buckets.keys()).sort((a, b) => a - b)) {
        const totalTraffic = buckets.get(bucket) ?? 0;
        totals.push({
          entity,
          kind: this.groupBy,
          bucket,
          totalTraffic,
          density: totalTraffic / deviceCount,
          deviceCount,
        });
      }
    }

    const coverage = _.counting(totals, (row) => row.bucket);
    const rows = totals.map((row) => {
      const entities = coverage[row.bucket] ?? 0;
      return { ...row, coverage: entities, lowConfidence: entities < minCoverage };
    });

    return { value: rows, issues };
  }
}

/** Roll bucketed device rates up to stations or complexes */
export function aggregateBuckets(
  records: readonly BucketedRate[],
  { groupBy, topology, minCoverage = 0 }: AggregateOptions,
): Reported<BucketAggregate[]> {
  return new TrafficAccumulator(groupBy, topology).add(records).finish(minCoverage);
}

/**
 * Collapse every bucket of an entity into one row for whole-period ranking.
 * Traffic and density are summed over the buckets; means are kept alongside.
 */
export function summarizeEntities(rows: readonly BucketAggregate[]): SummaryAggregate[] {
  const byEntity = _.group<BucketAggregate, string>(rows, (row) => `${row.kind}\u0000${row.entity}`);

  const summaries: SummaryAggregate[] = [];
  for (const key of Object.keys(byEntity).sort(compareStrings)) {
    const entityRows = byEntity[key];
    const first = entityRows?.[0];
    if (!entityRows || !first) continue;

    const totalTraffic = _.sum(entityRows, (r) => r.totalTraffic);
    const density = _.sum(entityRows, (r) => r.density);
    const buckets = entityRows.map((r) => r.bucket);
    summaries.push({
      entity: first.entity,
      kind: first.kind,
      totalTraffic,
      density,
      meanTraffic: totalTraffic / entityRows.length,
      meanDensity: density / entityRows.length,
      deviceCount: first.deviceCount,
      bucketCount: entityRows.length,
      firstBucket: _.min(buckets) ?? first.bucket,
      lastBucket: _.max(buckets) ?? first.bucket,
    });
  }
  return summaries;
}

import * as _ from "radash";
import { compareStrings } from "tp-shared/itertools";
import { mean } from "tp-shared/math";
import type { EntityId, GroupingKey } from "tp-shared/types";
import type { BucketAggregate } from "./aggregate";
import { dayOf, type Weekday, weekdayOf } from "./calendar";

export type DailyShare = Readonly<{
  entity: EntityId;
  kind: GroupingKey;
  day: string;
  weekday: Weekday;
  traffic: number;
  dayTotal: number;
  /** fraction of the day's traffic over all entities */
  share: number;
}>;

export type CoveragePoint = Readonly<{
  rank: number;
  entity: EntityId;
  kind: GroupingKey;
  meanShare: number;
  /** share of all traffic carried by the top `rank` entities */
  cumulativeShare: number;
}>;

/** Total traffic over every entity, per UTC day, in day order */
export function dailyTotals(rows: readonly BucketAggregate[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const day = dayOf(row.bucket);
    totals.set(day, (totals.get(day) ?? 0) + row.totalTraffic);
  }
  return new Map(Array.from(totals).sort(([a], [b]) => compareStrings(a, b)));
}

/**
 * Each entity's fraction of the day's traffic. Days with no traffic at all
 * have no meaningful share and are skipped. Ordered by day, then by share
 * (largest first).
 */
export function dailyShares(rows: readonly BucketAggregate[]): DailyShare[] {
  const totals = dailyTotals(rows);
  const byEntityDay = _.group(rows, (row) => `${dayOf(row.bucket)}\u0000${row.kind}\u0000${row.entity}`);

  const shares: DailyShare[] = [];
  for (const entityRows of Object.values(byEntityDay)) {
    const first = entityRows?.[0];
    if (!entityRows || !first) continue;
    const day = dayOf(first.bucket);
    const dayTotal = totals.get(day) ?? 0;
    if (dayTotal === 0) continue;

    const traffic = _.sum(entityRows, (r) => r.totalTraffic);
    shares.push({
      entity: first.entity,
      kind: first.kind,
      day,
      weekday: weekdayOf(first.bucket),
      traffic,
      dayTotal,
      share: traffic / dayTotal,
    });
  }

  return shares.sort(
    (a, b) => compareStrings(a.day, b.day) || b.share - a.share || compareStrings(a.entity, b.entity),
  );
}

/**
 * How concentrated ridership is: entities ranked by their mean daily share,
 * each with the share carried by it and every entity ranked above it.
 */
export function topCoverage(shares: readonly DailyShare[]): CoveragePoint[] {
  const byEntity = _.group(shares, (s) => `${s.kind}\u0000${s.entity}`);

  const means = Object.values(byEntity).flatMap((entityShares) => {
    const first = entityShares?.[0];
    if (!entityShares || !first) return [];
    return [
      {
        entity: first.entity,
        kind: first.kind,
        meanShare: mean(entityShares.map((s) => s.share)),
      },
    ];
  });
  means.sort((a, b) => b.meanShare - a.meanShare || compareStrings(a.entity, b.entity));

  let cumulativeShare = 0;
  return means.map((m, i) => {
    cumulativeShare += m.meanShare;
    return { rank: i + 1, ...m, cumulativeShare };
  });
}

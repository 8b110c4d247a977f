import * as _ from "radash";
import { compareStrings } from "tp-shared/itertools";
import { mean } from "tp-shared/math";
import type { EntityId, GroupingKey } from "tp-shared/types";
import type { BucketAggregate } from "./aggregate";
import { dayOf, timeOfDay } from "./calendar";

export type ProfileRow = Readonly<{
  entity: EntityId;
  kind: GroupingKey;
  /** UTC time of day, "HH:MM" */
  slot: string;
  meanTraffic: number;
  meanDensity: number;
  days: number;
}>;

/**
 * Typical day per entity: buckets falling at the same time of day are
 * averaged across the days they were observed on.
 */
export function timeOfDayProfile(rows: readonly BucketAggregate[]): ProfileRow[] {
  const bySlot = _.group(rows, (row) => `${row.kind}\u0000${row.entity}\u0000${timeOfDay(row.bucket)}`);

  const profile: ProfileRow[] = [];
  for (const slotRows of Object.values(bySlot)) {
    const first = slotRows?.[0];
    if (!slotRows || !first) continue;
    profile.push({
      entity: first.entity,
      kind: first.kind,
      slot: timeOfDay(first.bucket),
      meanTraffic: mean(slotRows.map((r) => r.totalTraffic)),
      meanDensity: mean(slotRows.map((r) => r.density)),
      days: _.unique(slotRows.map((r) => dayOf(r.bucket))).length,
    });
  }

  return profile.sort((a, b) => compareStrings(a.entity, b.entity) || compareStrings(a.slot, b.slot));
}

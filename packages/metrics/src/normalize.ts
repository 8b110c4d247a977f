import * as _ from "radash";
import { compareStrings, pairs } from "tp-shared/itertools";
import { SECONDS_PER_HOUR } from "tp-shared/math";
import type { DeviceId, Reading, StationId, Timestamp } from "tp-shared/types";
import type { Anchor } from "./config";
import type { Issue, MalformedReadingIssue, MalformedReason, Reported } from "./issues";

/** Hourly rate observed by one device over one reading interval */
export type RateRecord = Readonly<{
  deviceId: DeviceId;
  stationId: StationId;
  /** Interval end, or start when anchored to the start */
  timestamp: Timestamp;
  intervalStart: Timestamp;
  intervalEnd: Timestamp;
  deltaHours: number;
  /** increments per hour */
  rate: number;
}>;

export interface NormalizeOptions {
  anchor?: Anchor;
  dropZeroRates?: boolean;
}

const iso = (t: Timestamp) => new Date(t * 1000).toISOString();

function checkInterval(
  prev: Reading,
  curr: Reading,
  stationId: StationId | undefined,
): MalformedReason | undefined {
  if (curr.timestamp < prev.timestamp) return "out-of-order";
  if (curr.timestamp === prev.timestamp) return "duplicate-timestamp";
  if (!Number.isFinite(curr.netIncrement) || curr.netIncrement < 0) return "negative-increment";
  if (curr.stationId !== stationId) return "station-mismatch";
  return undefined;
}

function malformed(prev: Reading, curr: Reading, reason: MalformedReason): MalformedReadingIssue {
  const details: Record<MalformedReason, string> = {
    "out-of-order": `timestamp ${iso(curr.timestamp)} precedes ${iso(prev.timestamp)}`,
    "duplicate-timestamp": `duplicate timestamp ${iso(curr.timestamp)}`,
    "negative-increment": `net increment ${curr.netIncrement} at ${iso(curr.timestamp)}`,
    "station-mismatch": `reported under station ${curr.stationId} at ${iso(curr.timestamp)}`,
  };
  return {
    kind: "malformed-reading",
    deviceId: curr.deviceId,
    reason,
    timestamp: curr.timestamp,
    previousTimestamp: prev.timestamp,
    message: `Device ${curr.deviceId}: ${details[reason]}; interval dropped`,
  };
}

/**
 * Turn one device's readings (sorted by timestamp) into hourly rates.
 *
 * Each reading after the first closes an interval with its predecessor. The
 * first reading has nothing to pair with and yields no rate. Intervals that
 * cannot carry a rate are dropped and reported; long gaps are kept as the true
 * average over the gap.
 */
export function normalizeDevice(
  readings: readonly Reading[],
  { anchor = "end", dropZeroRates = false }: NormalizeOptions = {},
): Reported<RateRecord[]> {
  const records: RateRecord[] = [];
  const issues: Issue[] = [];
  const stationId = readings[0]?.stationId;

  for (const [prev, curr] of pairs(readings)) {
    const reason = checkInterval(prev, curr, stationId);
    if (reason) {
      issues.push(malformed(prev, curr, reason));
      continue;
    }

    const deltaHours = (curr.timestamp - prev.timestamp) / SECONDS_PER_HOUR;
    const rate = curr.netIncrement / deltaHours;
    if (dropZeroRates && rate === 0) continue;

    records.push({
      deviceId: curr.deviceId,
      stationId: curr.stationId,
      timestamp: anchor === "start" ? prev.timestamp : curr.timestamp,
      intervalStart: prev.timestamp,
      intervalEnd: curr.timestamp,
      deltaHours,
      rate,
    });
  }

  return { value: records, issues };
}

/**
 * Normalize every device in a reading set. Devices are independent, so each
 * is sorted and converted on its own; output is ordered by device, then time.
 */
export function normalizeIntervals(
  readings: readonly Reading[],
  options: NormalizeOptions = {},
): Reported<RateRecord[]> {
  const byDevice = _.group(readings, (r) => r.deviceId);
  const deviceIds = Object.keys(byDevice).sort(compareStrings);

  const records: RateRecord[] = [];
  const issues: Issue[] = [];
  for (const deviceId of deviceIds) {
    const deviceReadings = (byDevice[deviceId] ?? []).toSorted((a, b) => a.timestamp - b.timestamp);
    const { value, issues: deviceIssues } = normalizeDevice(deviceReadings, options);
    issues.push(...deviceIssues);

    if (value.length === 0) {
      issues.push({
        kind: "insufficient-data",
        scope: "device",
        id: deviceId,
        batchSize: deviceReadings.length,
        message: `Device ${deviceId}: ${deviceReadings.length} reading(s) gave no valid interval`,
      });
      continue;
    }
    records.push(...value);
  }

  return { value: records, issues };
}

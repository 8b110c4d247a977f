import { compareStrings } from "tp-shared/itertools";
import type { DeviceId, StationId, Timestamp } from "tp-shared/types";
import type { RateRecord } from "./normalize";

export type BucketedRate = Readonly<{
  deviceId: DeviceId;
  stationId: StationId;
  /** Bucket boundary, a multiple of the resolution */
  bucket: Timestamp;
  rate: number;
  /** Number of intervals folded into this bucket; 1 for clean input */
  samples: number;
}>;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * Parse a bucket width into whole seconds.
 * Accepts a number of seconds or a string like "1h", "2h", "15m", "90s", "1d".
 * Returns null when the input is not a positive whole number of seconds.
 */
export function parseResolution(input: number | string): number | null {
  let seconds: number;
  if (typeof input === "number") {
    seconds = input;
  } else {
    const m = /^\s*(\d+(?:\.\d+)?)\s*([smhd])\s*$/i.exec(input);
    if (!m?.[1] || !m[2]) return null;
    seconds = parseFloat(m[1]) * (UNIT_SECONDS[m[2].toLowerCase()] ?? Number.NaN);
  }
  return Number.isInteger(seconds) && seconds > 0 ? seconds : null;
}

/** Snap a timestamp to the nearest bucket boundary, halves rounding up */
export function snapToBucket(timestamp: Timestamp, resolution: number): Timestamp {
  return Math.floor((timestamp + resolution / 2) / resolution) * resolution;
}

/**
 * Put every rate record on the bucket grid. Rates are already hourly, so
 * moving a record to its boundary keeps its meaning. Two records of one
 * device that land in the same bucket are summed.
 */
export function bucketRates(records: readonly RateRecord[], resolution: number): BucketedRate[] {
  const merged = new Map<string, Mutable<BucketedRate>>();

  for (const r of records) {
    const bucket = snapToBucket(r.timestamp, resolution);
    const key = `${r.deviceId}\u0000${bucket}`;
    const existing = merged.get(key);
    if (existing) {
      existing.rate += r.rate;
      existing.samples++;
    } else {
      merged.set(key, {
        deviceId: r.deviceId,
        stationId: r.stationId,
        bucket,
        rate: r.rate,
        samples: 1,
      });
    }
  }

  return Array.from(merged.values()).sort(
    (a, b) => compareStrings(a.deviceId, b.deviceId) || a.bucket - b.bucket,
  );
}

import { describe, expect, it } from "vitest";
import { bucketRates, parseResolution, snapToBucket } from "./bucket";
import type { RateRecord } from "./normalize";

const rate = (deviceId: string, timestamp: number, value: number): RateRecord => ({
  deviceId,
  stationId: "S1",
  timestamp,
  intervalStart: timestamp - 3600,
  intervalEnd: timestamp,
  deltaHours: 1,
  rate: value,
});

describe("parseResolution", () => {
  it("reads unit suffixes", () => {
    expect(parseResolution("1h")).toBe(3600);
    expect(parseResolution("2h")).toBe(7200);
    expect(parseResolution("15m")).toBe(900);
    expect(parseResolution("1m")).toBe(60);
    expect(parseResolution("90s")).toBe(90);
    expect(parseResolution("1d")).toBe(86400);
    expect(parseResolution(" 1.5H ")).toBe(5400);
  });

  it("takes plain seconds", () => {
    expect(parseResolution(3600)).toBe(3600);
  });

  it("rejects widths that are not whole positive seconds", () => {
    expect(parseResolution("0h")).toBeNull();
    expect(parseResolution("0.5s")).toBeNull();
    expect(parseResolution(-60)).toBeNull();
    expect(parseResolution("hourly")).toBeNull();
    expect(parseResolution("")).toBeNull();
  });
});

describe("snapToBucket", () => {
  it("rounds to the nearest boundary", () => {
    expect(snapToBucket(0, 3600)).toBe(0);
    expect(snapToBucket(1799, 3600)).toBe(0);
    expect(snapToBucket(5399, 3600)).toBe(3600);
    expect(snapToBucket(3605, 3600)).toBe(3600);
  });

  it("rounds halves up", () => {
    expect(snapToBucket(1800, 3600)).toBe(3600);
    expect(snapToBucket(5400, 3600)).toBe(7200);
  });

  it("works at minute resolution", () => {
    expect(snapToBucket(89, 60)).toBe(60);
    expect(snapToBucket(90, 60)).toBe(120);
  });
});

describe("bucketRates", () => {
  it("snaps every record onto the grid", () => {
    const buckets = bucketRates([rate("A", 3590, 12), rate("A", 7215, 4)], 3600);
    expect(buckets).toEqual([
      { deviceId: "A", stationId: "S1", bucket: 3600, rate: 12, samples: 1 },
      { deviceId: "A", stationId: "S1", bucket: 7200, rate: 4, samples: 1 },
    ]);
  });

  it("sums records of one device landing in the same bucket", () => {
    const buckets = bucketRates([rate("B", 3600, 7), rate("A", 3500, 10), rate("A", 3700, 5)], 3600);
    expect(buckets).toEqual([
      { deviceId: "A", stationId: "S1", bucket: 3600, rate: 15, samples: 2 },
      { deviceId: "B", stationId: "S1", bucket: 3600, rate: 7, samples: 1 },
    ]);
  });
});

import { describe, expect, it } from "vitest";
import { DegenerateNormalizationError } from "./issues";
import { minMaxNormalize, scoreBatch, scoreByBucket, scorePriority } from "./priority";

const entity = (id: string, totalTraffic: number, density: number, bucket = 0) => ({
  entity: id,
  bucket,
  totalTraffic,
  density,
});

describe("minMaxNormalize", () => {
  it("maps the smallest value to 0 and the largest to 1", () => {
    const [lo, mid, hi] = minMaxNormalize([0.2, 0.5, 0.8]);
    expect(lo).toBe(0);
    expect(mid).toBeCloseTo(0.5, 12);
    expect(hi).toBe(1);
  });

  it("throws when every value is equal", () => {
    expect(() => minMaxNormalize([0.4, 0.4, 0.4])).toThrow(DegenerateNormalizationError);
    try {
      minMaxNormalize([0.4, 0.4, 0.4]);
    } catch (err) {
      expect(err).toBeInstanceOf(DegenerateNormalizationError);
      if (err instanceof DegenerateNormalizationError) {
        expect(err.batchSize).toBe(3);
        expect(err.rawValue).toBe(0.4);
        expect(err.message).toBe("Cannot normalize priority: all 3 raw scores equal 0.4");
      }
    }
  });

  it("returns nothing for nothing", () => {
    expect(minMaxNormalize([])).toEqual([]);
  });
});

describe("scorePriority", () => {
  const batch = [entity("A", 100, 50), entity("B", 50, 50), entity("C", 100, 10)];

  it("multiplies traffic and density scores", () => {
    const { value, issues } = scorePriority(batch);
    expect(issues).toEqual([]);
    expect(value.map((r) => [r.entity, r.trafficScore, r.densityScore, r.rawPriority])).toEqual([
      ["A", 1, 1, 1],
      ["B", 0.5, 1, 0.5],
      ["C", 1, 0.2, 0.2],
    ]);
    expect(value.map((r) => r.priority)).toEqual([1, expect.closeTo(0.375, 12), 0]);
  });

  it("keeps every priority inside [0, 1]", () => {
    const { value } = scorePriority([
      entity("A", 12, 3),
      entity("B", 900, 45),
      entity("C", 0, 0),
      entity("D", 310, 77),
      entity("E", 58, 58),
    ]);
    for (const r of value) {
      expect(r.priority).toBeGreaterThanOrEqual(0);
      expect(r.priority).toBeLessThanOrEqual(1);
    }
    expect(value.filter((r) => r.priority === 0)).toHaveLength(1);
    expect(value.filter((r) => r.priority === 1)).toHaveLength(1);
  });

  it("softens the penalty for being low on one axis with weights", () => {
    const plain = scorePriority(batch).value;
    const weighted = scorePriority(batch, { densityWeight: 1 }).value;

    // unweighted, B (half traffic, full density) beats C (full traffic, low density)
    expect(plain[1]?.priority).toBeGreaterThan(plain[2]?.priority ?? 1);
    // with densityWeight = 1: A = 1 * 2, B = 0.5 * 2, C = 1 * 1.2
    expect(weighted.map((r) => r.rawPriority)).toEqual([2, 1, 1.2]);
    expect(weighted[1]?.priority).toBe(0);
    expect(weighted[2]?.priority).toBeCloseTo(0.2, 12);
  });

  it("refuses a batch whose raw scores are all equal", () => {
    expect(() => scorePriority([entity("A", 10, 5), entity("B", 10, 5), entity("C", 10, 5)])).toThrow(
      DegenerateNormalizationError,
    );
  });

  it("refuses a single-record batch", () => {
    expect(() => scorePriority([entity("A", 10, 5)])).toThrow(DegenerateNormalizationError);
  });

  it("does not divide by a zero maximum", () => {
    expect(() => scorePriority([entity("A", 0, 0), entity("B", 0, 0)])).toThrow(
      "Cannot normalize priority: all 2 raw scores equal 0",
    );
  });

  it("reports an empty batch instead of scoring it", () => {
    expect(scorePriority([])).toEqual({
      value: [],
      issues: [
        {
          kind: "insufficient-data",
          scope: "batch",
          bucket: undefined,
          batchSize: 0,
          message: "Nothing to score: the batch is empty",
        },
      ],
    });
  });
});

describe("scoreBatch", () => {
  it("scores a batch with spread like scorePriority", () => {
    const batch = [entity("A", 100, 50), entity("B", 50, 50), entity("C", 100, 10)];
    expect(scoreBatch(batch)).toEqual(scorePriority(batch));
  });

  it("turns a batch without spread into an issue", () => {
    expect(scoreBatch([entity("A", 10, 5), entity("B", 10, 5), entity("C", 10, 5)])).toEqual({
      value: [],
      issues: [
        {
          kind: "degenerate-normalization",
          batchSize: 3,
          rawValue: 1,
          bucket: undefined,
          message: "Cannot normalize priority: all 3 raw scores equal 1",
        },
      ],
    });
  });
});

describe("scoreByBucket", () => {
  it("normalizes each bucket on its own and skips degenerate ones", () => {
    const { value, issues } = scoreByBucket([
      entity("B", 10, 10, 0),
      entity("A", 40, 20, 0),
      entity("A", 30, 30, 3600),
      entity("A", 5, 5, 7200),
      entity("B", 50, 25, 7200),
    ]);

    expect(value.map((r) => [r.entity, r.bucket, r.priority])).toEqual([
      ["A", 0, 1],
      ["A", 7200, 0],
      ["B", 0, 0],
      ["B", 7200, 1],
    ]);
    expect(issues).toEqual([
      {
        kind: "degenerate-normalization",
        batchSize: 1,
        rawValue: 1,
        bucket: 3600,
        message: "Cannot normalize priority in bucket 1970-01-01T01:00:00.000Z: all 1 raw scores equal 1",
      },
    ]);
  });
});

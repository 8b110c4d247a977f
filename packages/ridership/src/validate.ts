import { countIssues, formatBucket, type Issue, type IssueKind } from "tp-metrics";
import { pairs } from "tp-shared/itertools";

/**
 * Buckets missing between the first and last observed bucket. A gap means no
 * entity reported in that window, usually an outage upstream.
 */
export function checkBucketContinuity(
  rows: readonly { bucket: number }[],
  resolution: number,
): string[] {
  const buckets = Array.from(new Set(rows.map((r) => r.bucket))).sort((a, b) => a - b);
  const missingBuckets: string[] = [];
  for (const [prev, curr] of pairs(buckets)) {
    for (let expected = prev + resolution; expected < curr; expected += resolution) {
      missingBuckets.push(formatBucket(expected));
    }
  }
  if (missingBuckets.length > 0) {
    console.log(`Missing buckets detected (${missingBuckets.length}):`, missingBuckets.slice(0, 10));
  } else {
    console.log("No missing buckets detected.");
  }
  return missingBuckets;
}

/** Log issue counts per kind with the first few messages of each */
export function reportIssues(issues: readonly Issue[], limit = 5): Record<IssueKind, number> {
  const counts = countIssues(issues);
  for (const [kind, count] of Object.entries(counts)) {
    if (count === 0) continue;
    console.warn(`${count} ${kind} issue(s)`);
    for (const issue of issues.filter((i) => i.kind === kind).slice(0, limit)) {
      console.warn(`  ${issue.message}`);
    }
  }
  return counts;
}

import { Classification, LatencyBucket } from "../types/histogram";
import { PhaseResult } from "../types/probe";

/**
 * Durations at or above this are classified as failures. Slow past this
 * point is treated the same as down.
 */
export const FAILURE_CEILING_MS = 5000;

export const DEFAULT_BUCKETS: readonly LatencyBucket[] = Object.freeze([
  Object.freeze({ label: "<1s", minMs: 0, maxMs: 1000 }),
  Object.freeze({ label: "1-5s", minMs: 1000, maxMs: FAILURE_CEILING_MS }),
]);

/**
 * Checks that buckets form a sorted, gap-free, non-overlapping partition of
 * [0, ceiling) with unique labels. Returns the problems found.
 */
export function validateBuckets(
  buckets: readonly LatencyBucket[],
  ceilingMs: number = FAILURE_CEILING_MS
): string[] {
  const errors: string[] = [];

  if (buckets.length === 0) {
    return ["At least one latency bucket is required"];
  }

  const labels = new Set<string>();
  let expectedMin = 0;

  buckets.forEach((bucket, index) => {
    if (labels.has(bucket.label)) {
      errors.push(`Duplicate bucket label "${bucket.label}"`);
    }
    labels.add(bucket.label);

    if (bucket.minMs !== expectedMin) {
      errors.push(
        `Bucket "${bucket.label}" starts at ${bucket.minMs}ms, expected ${expectedMin}ms`
      );
    }
    if (bucket.maxMs <= bucket.minMs) {
      errors.push(`Bucket "${bucket.label}" is empty or inverted`);
    }
    if (index === buckets.length - 1 && bucket.maxMs !== ceilingMs) {
      errors.push(
        `Last bucket "${bucket.label}" ends at ${bucket.maxMs}ms, expected the ${ceilingMs}ms ceiling`
      );
    }
    expectedMin = bucket.maxMs;
  });

  return errors;
}

/**
 * Maps a raw duration to its bucket, or to failure once it reaches the
 * ceiling. Buckets are assumed to be validated.
 */
export function classifyDuration(
  durationMs: number,
  buckets: readonly LatencyBucket[] = DEFAULT_BUCKETS,
  ceilingMs: number = FAILURE_CEILING_MS
): Classification {
  if (durationMs >= ceilingMs) {
    return { kind: "failure", reason: "ceiling" };
  }

  // negative spans only come from an injected clock; count them as instant
  const value = Math.max(0, durationMs);
  const bucket = buckets.find((b) => value >= b.minMs && value < b.maxMs);

  return bucket
    ? { kind: "bucket", bucket }
    : { kind: "failure", reason: "ceiling" };
}

export function classifyPhase(
  result: PhaseResult,
  buckets: readonly LatencyBucket[] = DEFAULT_BUCKETS,
  ceilingMs: number = FAILURE_CEILING_MS
): Classification {
  if (result.status === "failed") {
    return { kind: "failure", reason: "failed" };
  }
  return classifyDuration(result.durationMs, buckets, ceilingMs);
}

export function describeClassification(classification: Classification): string {
  if (classification.kind === "bucket") {
    return classification.bucket.label;
  }
  return classification.reason === "ceiling" ? "failed (too slow)" : "failed";
}

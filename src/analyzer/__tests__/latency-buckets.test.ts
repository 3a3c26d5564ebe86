import { describe, it, expect } from "vitest";
import {
  DEFAULT_BUCKETS,
  FAILURE_CEILING_MS,
  classifyDuration,
  classifyPhase,
  describeClassification,
  validateBuckets,
} from "../latency-buckets";
import { DnsResolutionFailure } from "../../types/errors";

function bucketLabel(durationMs: number): string | null {
  const result = classifyDuration(durationMs);
  return result.kind === "bucket" ? result.bucket.label : null;
}

describe("latency buckets", () => {
  describe("DEFAULT_BUCKETS", () => {
    it("should partition [0, ceiling) without gaps", () => {
      expect(validateBuckets(DEFAULT_BUCKETS)).toEqual([]);
      expect(DEFAULT_BUCKETS.map((b) => b.label)).toEqual(["<1s", "1-5s"]);
      expect(FAILURE_CEILING_MS).toBe(5000);
    });
  });

  describe("classifyDuration", () => {
    it("should place fast durations in the first bucket", () => {
      expect(bucketLabel(0)).toBe("<1s");
      expect(bucketLabel(50)).toBe("<1s");
      expect(bucketLabel(999.999)).toBe("<1s");
    });

    it("should treat the lower bound as inclusive", () => {
      expect(bucketLabel(1000)).toBe("1-5s");
      expect(bucketLabel(1200)).toBe("1-5s");
      expect(bucketLabel(4999.9)).toBe("1-5s");
    });

    it("should classify the ceiling and above as failure", () => {
      expect(classifyDuration(5000)).toEqual({ kind: "failure", reason: "ceiling" });
      expect(classifyDuration(12_000)).toEqual({ kind: "failure", reason: "ceiling" });
    });

    it("should match exactly one bucket for every duration below the ceiling", () => {
      for (let d = 0; d < FAILURE_CEILING_MS; d += 97) {
        const matches = DEFAULT_BUCKETS.filter((b) => d >= b.minMs && d < b.maxMs);
        expect(matches).toHaveLength(1);
        expect(bucketLabel(d)).toBe(matches[0].label);
      }
    });

    it("should count a negative span as instant", () => {
      expect(bucketLabel(-0.5)).toBe("<1s");
    });
  });

  describe("classifyPhase", () => {
    it("should classify a failed phase as failure without looking at time", () => {
      const result = classifyPhase({
        status: "failed",
        error: new DnsResolutionFailure("nowhere.invalid"),
      });
      expect(result).toEqual({ kind: "failure", reason: "failed" });
    });

    it("should bucket a successful phase by duration", () => {
      const result = classifyPhase({ status: "ok", durationMs: 10 });
      expect(result.kind).toBe("bucket");
      expect(describeClassification(result)).toBe("<1s");
    });
  });

  describe("validateBuckets", () => {
    it("should reject an empty set", () => {
      expect(validateBuckets([])).toEqual(["At least one latency bucket is required"]);
    });

    it("should report gaps, overlaps and a wrong upper end", () => {
      const errors = validateBuckets([
        { label: "fast", minMs: 0, maxMs: 500 },
        { label: "medium", minMs: 600, maxMs: 2000 },
      ]);
      expect(errors).toEqual([
        'Bucket "medium" starts at 600ms, expected 500ms',
        'Last bucket "medium" ends at 2000ms, expected the 5000ms ceiling',
      ]);
    });

    it("should reject duplicate labels", () => {
      const errors = validateBuckets([
        { label: "a", minMs: 0, maxMs: 1000 },
        { label: "a", minMs: 1000, maxMs: 5000 },
      ]);
      expect(errors).toEqual(['Duplicate bucket label "a"']);
    });
  });

  describe("describeClassification", () => {
    it("should distinguish slow from failed", () => {
      expect(describeClassification({ kind: "failure", reason: "ceiling" })).toBe(
        "failed (too slow)"
      );
      expect(describeClassification({ kind: "failure", reason: "failed" })).toBe("failed");
    });
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import { LatencyHistogramAggregator, phaseTotal } from "../histogram-aggregator";
import { endpointKeyId } from "../../types/endpoint";
import { ConfigurationError } from "../../types/errors";
import { FAILED, outcomeFor, testEndpoint } from "../../__tests__/mocks/outcomes";

describe("LatencyHistogramAggregator", () => {
  let aggregator: LatencyHistogramAggregator;
  const svcA = testEndpoint("svc-a.example.test", 443, "svc-a");
  const svcB = testEndpoint("svc-b.example.test", 8080, "svc-b");

  beforeEach(() => {
    aggregator = new LatencyHistogramAggregator();
  });

  it("should aggregate connect and DNS phases independently", () => {
    aggregator.record(svcA, outcomeFor(svcA, 10, 50));
    aggregator.record(svcA, outcomeFor(svcA, 10, 1200));
    aggregator.record(svcA, outcomeFor(svcA, FAILED, FAILED));

    const snapshot = aggregator.snapshotAndReset();
    const counters = snapshot.get(endpointKeyId(svcA));

    expect(counters).toBeDefined();
    expect(counters?.totalAttempts).toBe(3);
    expect(counters?.connect).toEqual({
      bucketCounts: { "<1s": 1, "1-5s": 1 },
      failureCount: 1,
    });
    expect(counters?.dns).toEqual({
      bucketCounts: { "<1s": 2, "1-5s": 0 },
      failureCount: 1,
    });
  });

  it("should put exactly 1000ms in 1-5s and count 5000ms as failure", () => {
    aggregator.record(svcA, outcomeFor(svcA, 5, 1000));
    aggregator.record(svcA, outcomeFor(svcA, 5000, 5000));

    const counters = aggregator.snapshotAndReset().get(endpointKeyId(svcA));
    expect(counters?.connect).toEqual({
      bucketCounts: { "<1s": 0, "1-5s": 1 },
      failureCount: 1,
    });
    expect(counters?.dns).toEqual({
      bucketCounts: { "<1s": 1, "1-5s": 0 },
      failureCount: 1,
    });
  });

  it("should count a DNS failure once in total attempts", () => {
    aggregator.record(svcA, outcomeFor(svcA, FAILED, FAILED));

    const counters = aggregator.snapshotAndReset().get(endpointKeyId(svcA));
    expect(counters?.totalAttempts).toBe(1);
    expect(counters?.dns.failureCount).toBe(1);
    expect(counters?.connect.failureCount).toBe(1);
  });

  it("should keep totals equal to buckets plus failures for each phase", () => {
    const samples: Array<[number | typeof FAILED, number | typeof FAILED]> = [
      [1, 2],
      [FAILED, FAILED],
      [4000, 6000],
      [7000, 30],
      [999, 1000],
      [3, FAILED],
    ];
    for (const [dns, connect] of samples) {
      aggregator.record(svcA, outcomeFor(svcA, dns, connect));
      aggregator.record(svcB, outcomeFor(svcB, connect, dns));
    }

    for (const counters of aggregator.snapshotAndReset().values()) {
      expect(counters.totalAttempts).toBe(samples.length);
      expect(phaseTotal(counters.dns)).toBe(counters.totalAttempts);
      expect(phaseTotal(counters.connect)).toBe(counters.totalAttempts);
    }
  });

  it("should return an empty snapshot on a second drain", () => {
    aggregator.record(svcA, outcomeFor(svcA, 10, 20));

    expect(aggregator.snapshotAndReset().size).toBe(1);
    expect(aggregator.snapshotAndReset().size).toBe(0);
    expect(aggregator.size).toBe(0);
  });

  it("should not let later records change a snapshot already taken", () => {
    aggregator.record(svcA, outcomeFor(svcA, 10, 20));
    const snapshot = aggregator.snapshotAndReset();

    aggregator.record(svcA, outcomeFor(svcA, 10, 20));
    aggregator.record(svcA, outcomeFor(svcA, 10, 20));

    expect(snapshot.get(endpointKeyId(svcA))?.totalAttempts).toBe(1);
    expect(aggregator.peek().get(endpointKeyId(svcA))?.totalAttempts).toBe(2);
  });

  it("should not lose concurrent updates for the same endpoint", async () => {
    const n = 250;
    await Promise.all(
      Array.from({ length: n }, async (_, i) => {
        // interleave the tasks across event-loop turns
        await new Promise((resolve) => setTimeout(resolve, i % 7));
        aggregator.record(svcA, outcomeFor(svcA, 1, 42));
      })
    );

    const counters = aggregator.snapshotAndReset().get(endpointKeyId(svcA));
    expect(counters?.connect.bucketCounts["<1s"]).toBe(n);
    expect(counters?.totalAttempts).toBe(n);
  });

  it("should see every record either before or after a concurrent drain", async () => {
    const drained: number[] = [];
    const writers = Array.from({ length: 100 }, async (_, i) => {
      await new Promise((resolve) => setTimeout(resolve, i % 5));
      aggregator.record(svcA, outcomeFor(svcA, 1, 1));
    });
    const reader = (async () => {
      for (let i = 0; i < 5; i++) {
        await new Promise((resolve) => setTimeout(resolve, 1));
        const counters = aggregator.snapshotAndReset().get(endpointKeyId(svcA));
        drained.push(counters?.totalAttempts ?? 0);
      }
    })();

    await Promise.all([...writers, reader]);
    const rest = aggregator.snapshotAndReset().get(endpointKeyId(svcA));
    drained.push(rest?.totalAttempts ?? 0);

    expect(drained.reduce((sum, count) => sum + count, 0)).toBe(100);
  });

  it("should key endpoints by hostname and port, not label", () => {
    const sameAddressOtherLabel = testEndpoint("svc-a.example.test", 443, "alias");
    aggregator.record(svcA, outcomeFor(svcA, 1, 1));
    aggregator.record(sameAddressOtherLabel, outcomeFor(sameAddressOtherLabel, 1, 1));
    aggregator.record(svcB, outcomeFor(svcB, 1, 1));

    const snapshot = aggregator.snapshotAndReset();
    expect(snapshot.size).toBe(2);
    expect(snapshot.get(endpointKeyId(svcA))?.endpoint.label).toBe("svc-a");
    expect(snapshot.get(endpointKeyId(svcA))?.totalAttempts).toBe(2);
  });

  it("should reject a bucket set that does not cover the ceiling", () => {
    expect(
      () =>
        new LatencyHistogramAggregator({
          buckets: [{ label: "fast", minMs: 0, maxMs: 100 }],
        })
    ).toThrow(ConfigurationError);
  });

  it("should accept custom buckets", () => {
    const custom = new LatencyHistogramAggregator({
      buckets: [
        { label: "fast", minMs: 0, maxMs: 100 },
        { label: "ok", minMs: 100, maxMs: 5000 },
      ],
    });
    custom.record(svcA, outcomeFor(svcA, 50, 150));

    const counters = custom.snapshotAndReset().get(endpointKeyId(svcA));
    expect(counters?.dns.bucketCounts).toEqual({ fast: 1, ok: 0 });
    expect(counters?.connect.bucketCounts).toEqual({ fast: 0, ok: 1 });
  });
});

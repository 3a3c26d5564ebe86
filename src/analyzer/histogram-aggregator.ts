import {
  AggregateCounters,
  AggregateSnapshot,
  LatencyBucket,
  PhaseCounters,
} from "../types/histogram";
import { Endpoint, endpointKeyId } from "../types/endpoint";
import { PhaseResult, ProbeOutcome } from "../types/probe";
import {
  DEFAULT_BUCKETS,
  FAILURE_CEILING_MS,
  classifyPhase,
  validateBuckets,
} from "./latency-buckets";
import { ConfigurationError } from "../types/errors";

export interface HistogramAggregator {
  record(endpoint: Endpoint, outcome: ProbeOutcome): void;
  snapshotAndReset(): AggregateSnapshot;
}

export interface AggregatorOptions {
  buckets?: readonly LatencyBucket[];
  ceilingMs?: number;
}

/**
 * Per-endpoint latency histograms for the DNS and connect phases.
 *
 * Both mutating operations are synchronous. Node runs them to completion
 * on the event loop without interleaving, so each record() applies all of
 * its counter updates as one unit and snapshotAndReset() observes either
 * all or none of any given record(). Nothing here awaits, so no caller can
 * hold the section across network or file I/O.
 */
export class LatencyHistogramAggregator implements HistogramAggregator {
  private readonly buckets: readonly LatencyBucket[];
  private readonly ceilingMs: number;
  private counters = new Map<string, AggregateCounters>();

  constructor(options: AggregatorOptions = {}) {
    this.buckets = options.buckets ?? DEFAULT_BUCKETS;
    this.ceilingMs = options.ceilingMs ?? FAILURE_CEILING_MS;

    const problems = validateBuckets(this.buckets, this.ceilingMs);
    if (problems.length > 0) {
      throw new ConfigurationError("Invalid latency buckets", problems);
    }
  }

  get bucketSet(): readonly LatencyBucket[] {
    return this.buckets;
  }

  /** Number of endpoints with at least one recorded attempt */
  get size(): number {
    return this.counters.size;
  }

  record(endpoint: Endpoint, outcome: ProbeOutcome): void {
    const id = endpointKeyId(endpoint);
    let entry = this.counters.get(id);
    if (!entry) {
      entry = this.createCounters(endpoint);
      this.counters.set(id, entry);
    }

    entry.totalAttempts++;
    this.apply(entry.dns, outcome.dns);
    this.apply(entry.connect, outcome.connect);
  }

  snapshotAndReset(): AggregateSnapshot {
    // The live map is swapped out rather than cleared, so the returned
    // entries are never mutated by later records.
    const drained = this.counters;
    this.counters = new Map();
    return drained;
  }

  /**
   * Copy of the current counters without resetting them
   */
  peek(): AggregateSnapshot {
    const copy: AggregateSnapshot = new Map();
    for (const [id, entry] of this.counters) {
      copy.set(id, {
        endpoint: entry.endpoint,
        totalAttempts: entry.totalAttempts,
        dns: copyPhase(entry.dns),
        connect: copyPhase(entry.connect),
      });
    }
    return copy;
  }

  private apply(counters: PhaseCounters, result: PhaseResult): void {
    const classification = classifyPhase(result, this.buckets, this.ceilingMs);
    if (classification.kind === "failure") {
      counters.failureCount++;
      return;
    }
    counters.bucketCounts[classification.bucket.label]++;
  }

  private createCounters(endpoint: Endpoint): AggregateCounters {
    return {
      endpoint,
      totalAttempts: 0,
      dns: this.emptyPhase(),
      connect: this.emptyPhase(),
    };
  }

  private emptyPhase(): PhaseCounters {
    const bucketCounts: Record<string, number> = {};
    for (const bucket of this.buckets) {
      bucketCounts[bucket.label] = 0;
    }
    return { bucketCounts, failureCount: 0 };
  }
}

function copyPhase(phase: PhaseCounters): PhaseCounters {
  return { bucketCounts: { ...phase.bucketCounts }, failureCount: phase.failureCount };
}

/**
 * Sum of all bucket counts plus failures; equals totalAttempts for each phase
 */
export function phaseTotal(phase: PhaseCounters): number {
  return (
    Object.values(phase.bucketCounts).reduce((sum, count) => sum + count, 0) +
    phase.failureCount
  );
}

import { Endpoint } from "./endpoint";

/**
 * Half-open latency interval [minMs, maxMs) with a stable display label
 */
export interface LatencyBucket {
  readonly label: string;
  readonly minMs: number;
  readonly maxMs: number;
}

export type Classification =
  | { kind: "bucket"; bucket: LatencyBucket }
  | { kind: "failure"; reason: "failed" | "ceiling" };

export interface PhaseCounters {
  /** Count per bucket label, in ascending bucket order */
  bucketCounts: Record<string, number>;
  failureCount: number;
}

export interface AggregateCounters {
  endpoint: Endpoint;
  totalAttempts: number;
  dns: PhaseCounters;
  connect: PhaseCounters;
}

/**
 * Point-in-time copy of every endpoint's counters, keyed by endpointKeyId
 */
export type AggregateSnapshot = Map<string, AggregateCounters>;

export interface ReportRow {
  timestamp: Date;
  label: string;
  endpoint: Endpoint;
  totalAttempts: number;
  dns: PhaseCounters;
  connect: PhaseCounters;
}

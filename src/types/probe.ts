import { Endpoint } from "./endpoint";
import { ConnectFailure, DnsResolutionFailure } from "./errors";

export type ProbePhase = "dns" | "connect";

/**
 * Result of one timed phase of a probe. A failed phase carries the error
 * instead of a duration; there is no numeric "failed" value.
 */
export type PhaseResult<E extends Error = Error> =
  | { status: "ok"; durationMs: number }
  | { status: "failed"; error: E };

export type DnsResult = PhaseResult<DnsResolutionFailure>;
export type ConnectResult = PhaseResult<ConnectFailure>;

export interface ProbeOutcome {
  endpoint: Endpoint;
  startedAt: Date;
  /** Address the hostname resolved to, when it resolved */
  resolvedAddress?: string;
  dns: DnsResult;
  connect: ConnectResult;
}

export function succeeded(durationMs: number): {
  status: "ok";
  durationMs: number;
} {
  return { status: "ok", durationMs };
}

export function failed<E extends Error>(error: E): {
  status: "failed";
  error: E;
} {
  return { status: "failed", error };
}

export function isProbeSuccessful(outcome: ProbeOutcome): boolean {
  return outcome.dns.status === "ok" && outcome.connect.status === "ok";
}

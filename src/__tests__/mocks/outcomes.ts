/**
 * Builders for probe outcomes with chosen phase results
 */

import { Endpoint, createEndpoint } from "../../types/endpoint";
import { ConnectFailure, DnsResolutionFailure } from "../../types/errors";
import { ConnectResult, DnsResult, ProbeOutcome } from "../../types/probe";

export const FAILED = "failed" as const;

export type PhaseSpec = number | typeof FAILED;

export function testEndpoint(
  hostname = "svc-a.example.test",
  port = 443,
  label = "svc-a"
): Endpoint {
  return createEndpoint({ hostname, port, label });
}

export function outcomeFor(
  endpoint: Endpoint,
  dns: PhaseSpec,
  connect: PhaseSpec
): ProbeOutcome {
  const dnsResult: DnsResult =
    dns === FAILED
      ? { status: "failed", error: new DnsResolutionFailure(endpoint.hostname) }
      : { status: "ok", durationMs: dns };

  const connectResult: ConnectResult =
    connect === FAILED
      ? {
          status: "failed",
          error: new ConnectFailure(
            endpoint,
            dns === FAILED ? "skipped" : "refused"
          ),
        }
      : { status: "ok", durationMs: connect };

  return {
    endpoint,
    startedAt: new Date(2024, 0, 15, 10, 30, 0),
    dns: dnsResult,
    connect: connectResult,
  };
}

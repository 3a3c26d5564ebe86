import chalk from "chalk";
import Table from "cli-table3";
import { classifyPhase, describeClassification } from "../analyzer/latency-buckets";
import { formatAddress } from "../types/endpoint";
import { PhaseResult, ProbeOutcome } from "../types/probe";

/**
 * Plain cell values for a single probe: phase, status, duration, bucket, detail
 */
export function describeOutcomeRows(outcome: ProbeOutcome): string[][] {
  return [
    describePhase("DNS", outcome.dns),
    describePhase("Connect", outcome.connect),
  ];
}

function describePhase(name: string, result: PhaseResult): string[] {
  const bucket = describeClassification(classifyPhase(result));
  if (result.status === "failed") {
    return [name, "failed", "-", bucket, result.error.message];
  }
  return [name, "ok", result.durationMs.toFixed(2), bucket, ""];
}

export function renderProbeTable(
  outcome: ProbeOutcome,
  colors: chalk.Chalk = chalk
): string {
  const { endpoint } = outcome;
  const table = new Table({
    head: [
      colors.blue.bold("Phase"),
      colors.blue.bold("Status"),
      colors.blue.bold("Time (ms)"),
      colors.blue.bold("Bucket"),
      colors.blue.bold("Detail"),
    ],
    colWidths: [10, 9, 12, 20, 50],
    wordWrap: true,
    style: { head: [], border: [] },
  });

  for (const [phase, status, duration, bucket, detail] of describeOutcomeRows(outcome)) {
    table.push([
      phase,
      status === "ok" ? colors.green(status) : colors.red(status),
      duration,
      bucket,
      detail,
    ]);
  }

  const target = `${endpoint.label} (${formatAddress(endpoint)})`;
  const resolved = outcome.resolvedAddress ? ` -> ${outcome.resolvedAddress}` : "";
  return `${colors.bold(target)}${resolved}\n${table.toString()}`;
}

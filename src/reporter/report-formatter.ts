import {
  AggregateSnapshot,
  LatencyBucket,
  PhaseCounters,
  ReportRow,
} from "../types/histogram";
import { DEFAULT_BUCKETS } from "../analyzer/latency-buckets";
import { formatAddress } from "../types/endpoint";

export const COLUMN_SEPARATOR = " | ";
const TIMESTAMP_WIDTH = 19;
const LABEL_WIDTH = 20;
const MIN_COUNT_WIDTH = 5;

export interface ReportColumn {
  header: string;
  width: number;
  align: "left" | "right";
  value(row: ReportRow): string;
}

/**
 * Fixed-width layout of the statistics log. Log scrapers depend on the
 * column order, widths and separator, so changes here are breaking.
 */
export class ReportFormatter {
  private readonly columns: ReportColumn[];

  constructor(buckets: readonly LatencyBucket[] = DEFAULT_BUCKETS) {
    this.columns = buildColumns(buckets);
  }

  header(): string {
    return this.join(this.columns.map((column) => column.header));
  }

  rule(): string {
    return "-".repeat(this.header().length);
  }

  row(row: ReportRow): string {
    return this.join(this.columns.map((column) => column.value(row)));
  }

  private join(values: string[]): string {
    return values
      .map((value, index) => pad(value, this.columns[index]))
      .join(COLUMN_SEPARATOR);
  }
}

function buildColumns(buckets: readonly LatencyBucket[]): ReportColumn[] {
  const count = (header: string, value: (row: ReportRow) => number): ReportColumn => ({
    header,
    width: Math.max(header.length, MIN_COUNT_WIDTH),
    align: "right",
    value: (row) => String(value(row)),
  });

  return [
    {
      header: "Timestamp",
      width: TIMESTAMP_WIDTH,
      align: "left",
      value: (row) => formatTimestamp(row.timestamp),
    },
    {
      header: "Service",
      width: LABEL_WIDTH,
      align: "left",
      value: (row) => row.label,
    },
    ...buckets.map((bucket) =>
      count(`Conn ${bucket.label}`, (row) => row.connect.bucketCounts[bucket.label] ?? 0)
    ),
    ...buckets.map((bucket) =>
      count(`DNS ${bucket.label}`, (row) => row.dns.bucketCounts[bucket.label] ?? 0)
    ),
    count("DNS Failed", (row) => row.dns.failureCount),
    count("Conn Failed", (row) => row.connect.failureCount),
    count("Total", (row) => row.totalAttempts),
  ];
}

// Values wider than the column are kept whole
function pad(value: string, column: ReportColumn): string {
  return column.align === "left"
    ? value.padEnd(column.width)
    : value.padStart(column.width);
}

/**
 * Rows for one flush, ordered by label (case-sensitive, stable for ties)
 */
export function buildReportRows(
  snapshot: AggregateSnapshot,
  timestamp: Date
): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const counters of snapshot.values()) {
    rows.push({
      timestamp,
      label: counters.endpoint.label,
      endpoint: counters.endpoint,
      totalAttempts: counters.totalAttempts,
      dns: counters.dns,
      connect: counters.connect,
    });
  }

  return rows.sort((a, b) => compareLabels(a.label, b.label));
}

function compareLabels(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * One console line per endpoint, e.g.
 * "api (api.example.com:443): 12 probes | connect <1s 11, 1-5s 0, failed 1 | dns <1s 12, 1-5s 0, failed 0"
 */
export function summarizeSnapshot(
  snapshot: AggregateSnapshot,
  buckets: readonly LatencyBucket[] = DEFAULT_BUCKETS
): string[] {
  const phase = (counters: PhaseCounters) =>
    [
      ...buckets.map((bucket) => `${bucket.label} ${counters.bucketCounts[bucket.label] ?? 0}`),
      `failed ${counters.failureCount}`,
    ].join(", ");

  return [...snapshot.values()]
    .sort((a, b) => compareLabels(a.endpoint.label, b.endpoint.label))
    .map(
      (counters) =>
        `${counters.endpoint.label} (${formatAddress(counters.endpoint)}): ` +
        `${counters.totalAttempts} probes | connect ${phase(counters.connect)} | dns ${phase(counters.dns)}`
    );
}

function twoDigits(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as "YYYY-MM-DD HH:mm:ss"
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${twoDigits(date.getMonth() + 1)}-${twoDigits(date.getDate())} ` +
    `${twoDigits(date.getHours())}:${twoDigits(date.getMinutes())}:${twoDigits(date.getSeconds())}`
  );
}

/**
 * Local calendar day as "YYYYMMDD"
 */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}${twoDigits(date.getMonth() + 1)}${twoDigits(date.getDate())}`;
}

export function dailyLogFileName(prefix: string, date: Date): string {
  return `${prefix}_${formatDay(date)}.log`;
}

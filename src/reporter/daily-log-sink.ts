import { promises as fs } from "fs";
import path from "path";
import { LatencyBucket, ReportRow } from "../types/histogram";
import { ReportSinkWriteFailure, errorCode, toError } from "../types/errors";
import { ReportFormatter, dailyLogFileName } from "./report-formatter";
import { DEFAULT_BUCKETS } from "../analyzer/latency-buckets";

export interface ReportSink {
  /**
   * Appends the rows for one flush and returns where they were written
   */
  write(rows: ReportRow[], timestamp: Date): Promise<string>;
}

export interface DailyLogSinkConfig {
  logDirectory: string;
  filePrefix: string;
}

export const DEFAULT_LOG_SINK_CONFIG: DailyLogSinkConfig = {
  logDirectory: ".",
  filePrefix: "netprobe_stats",
};

/**
 * Append-only text log, one file per local calendar day. A fresh or empty
 * file gets the column header once before its first rows.
 */
export class DailyLogFileSink implements ReportSink {
  private config: DailyLogSinkConfig;
  private formatter: ReportFormatter;

  constructor(
    config: Partial<DailyLogSinkConfig> = {},
    buckets: readonly LatencyBucket[] = DEFAULT_BUCKETS
  ) {
    this.config = { ...DEFAULT_LOG_SINK_CONFIG, ...config };
    this.formatter = new ReportFormatter(buckets);
  }

  destinationFor(date: Date): string {
    return path.join(
      this.config.logDirectory,
      dailyLogFileName(this.config.filePrefix, date)
    );
  }

  async write(rows: ReportRow[], timestamp: Date): Promise<string> {
    const destination = this.destinationFor(timestamp);

    const lines: string[] = [];
    if (await this.needsHeader(destination)) {
      lines.push(this.formatter.header(), this.formatter.rule());
    }
    lines.push(...rows.map((row) => this.formatter.row(row)));

    try {
      await fs.mkdir(this.config.logDirectory, { recursive: true });
      await fs.appendFile(destination, `${lines.join("\n")}\n`, "utf-8");
    } catch (error) {
      throw new ReportSinkWriteFailure(destination, toError(error));
    }

    return destination;
  }

  // Best effort: when the size cannot be read the rows are appended without a header
  private async needsHeader(destination: string): Promise<boolean> {
    try {
      const stats = await fs.stat(destination);
      return stats.size === 0;
    } catch (error) {
      return errorCode(error) === "ENOENT";
    }
  }
}

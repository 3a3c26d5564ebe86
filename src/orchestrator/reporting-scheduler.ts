import { HistogramAggregator } from "../analyzer/histogram-aggregator";
import { ReportSink } from "../reporter/daily-log-sink";
import { buildReportRows, formatTimestamp } from "../reporter/report-formatter";
import { FlushResult, OperatorStream, SchedulerState } from "../types/common";
import { toError } from "../types/errors";
import { StopSignal } from "./stop-signal";

export interface ReportingConfig {
  intervalMs: number;
}

export const DEFAULT_REPORTING_INTERVAL_MS = 300_000;

/**
 * Periodically drains the aggregator into the report sink. Runs on its own
 * cadence, independent of sampling.
 */
export class ReportingScheduler {
  private config: ReportingConfig;
  private aggregator: HistogramAggregator;
  private sink: ReportSink;
  private operator: OperatorStream;
  private signal: StopSignal;
  private currentState: SchedulerState = "idle";
  private clock: () => Date;

  constructor(
    config: Partial<ReportingConfig>,
    aggregator: HistogramAggregator,
    sink: ReportSink,
    operator: OperatorStream,
    signal: StopSignal,
    clock: () => Date = () => new Date()
  ) {
    this.config = {
      intervalMs: config.intervalMs ?? DEFAULT_REPORTING_INTERVAL_MS,
    };
    this.aggregator = aggregator;
    this.sink = sink;
    this.operator = operator;
    this.signal = signal;
    this.clock = clock;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  async run(): Promise<void> {
    if (this.currentState !== "idle") {
      throw new Error(
        `Reporting scheduler cannot start from state "${this.currentState}"`
      );
    }

    this.currentState = "running";
    const subscription = this.signal.onStop().subscribe(() => {
      if (this.currentState === "running") {
        this.currentState = "stopping";
      }
    });

    try {
      while (!this.signal.isStopped) {
        const elapsed = await this.signal.sleep(this.config.intervalMs);
        if (!elapsed) break;

        try {
          await this.flush();
        } catch (error) {
          // A failed write loses this interval's counts but not the cadence
          this.operator.error(toError(error).message);
        }
      }
    } finally {
      subscription.unsubscribe();
      this.currentState = "stopped";
    }
  }

  /**
   * Snapshots and resets the aggregator, then writes one row per endpoint.
   * Returns null when nothing was recorded since the previous flush.
   * Sink write failures propagate to the caller.
   */
  async flush(): Promise<FlushResult | null> {
    const snapshot = this.aggregator.snapshotAndReset();
    if (snapshot.size === 0) {
      return null;
    }

    const timestamp = this.clock();
    const rows = buildReportRows(snapshot, timestamp);
    const destination = await this.sink.write(rows, timestamp);

    this.operator.info(
      `Statistics logged to ${destination} at ${formatTimestamp(timestamp)}`
    );

    return { destination, timestamp, rows };
  }
}

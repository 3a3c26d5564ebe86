import { LatencyHistogramAggregator } from "../analyzer/histogram-aggregator";
import { TargetRegistry } from "../config/target-registry";
import {
  HostResolver,
  SocketConnector,
  TcpProbeEngine,
} from "../executor/probe-engine";
import { DailyLogFileSink, ReportSink } from "../reporter/daily-log-sink";
import { summarizeSnapshot } from "../reporter/report-formatter";
import {
  FlushResult,
  OperatorStream,
  ShutdownSignal,
} from "../types/common";
import { MonitorConfig } from "../types/config";
import { toError } from "../types/errors";
import { ReportingScheduler } from "./reporting-scheduler";
import { SamplingScheduler } from "./sampling-scheduler";
import { StopSignal } from "./stop-signal";

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ["SIGINT", "SIGTERM"];

/**
 * Anything that delivers process signals; `process` in production
 */
export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
  removeListener(event: ShutdownSignal, listener: () => void): unknown;
}

export interface MonitorComponents {
  registry: TargetRegistry;
  aggregator: LatencyHistogramAggregator;
  sampling: SamplingScheduler;
  reporting: ReportingScheduler;
  operator: OperatorStream;
  signal: StopSignal;
}

export interface MonitorDependencies {
  operator: OperatorStream;
  resolver?: HostResolver;
  connector?: SocketConnector;
  sink?: ReportSink;
  clock?: () => Date;
}

/**
 * Wires the registry, probe engine, aggregator and both schedulers around
 * one shared stop signal.
 */
export function createMonitor(
  config: MonitorConfig,
  dependencies: MonitorDependencies
): MonitorLifecycle {
  const signal = new StopSignal();
  const registry = new TargetRegistry(config.targets);
  const aggregator = new LatencyHistogramAggregator();
  const engine = new TcpProbeEngine(config.probe, {
    operator: dependencies.operator,
    resolver: dependencies.resolver,
    connector: dependencies.connector,
  });
  const sink =
    dependencies.sink ??
    new DailyLogFileSink(
      {
        logDirectory: config.reporting.logDirectory,
        filePrefix: config.reporting.filePrefix,
      },
      aggregator.bucketSet
    );

  return new MonitorLifecycle({
    registry,
    aggregator,
    signal,
    operator: dependencies.operator,
    sampling: new SamplingScheduler(
      config.sampling,
      registry,
      engine,
      aggregator,
      signal
    ),
    reporting: new ReportingScheduler(
      { intervalMs: config.reporting.intervalMs },
      aggregator,
      sink,
      dependencies.operator,
      signal,
      dependencies.clock
    ),
  });
}

/**
 * Runs the sampling and reporting workers concurrently until asked to stop,
 * then drains whatever was collected since the last periodic report.
 */
export class MonitorLifecycle {
  private components: MonitorComponents;
  private workers: Promise<void> | null = null;
  private stopping: Promise<FlushResult | null> | null = null;
  private workerFailure: Error | null = null;

  constructor(components: MonitorComponents) {
    this.components = components;
  }

  get registry(): TargetRegistry {
    return this.components.registry;
  }

  get aggregator(): LatencyHistogramAggregator {
    return this.components.aggregator;
  }

  get isRunning(): boolean {
    return this.workers !== null && !this.components.signal.isStopped;
  }

  start(): void {
    if (this.workers) {
      throw new Error("Monitor has already been started");
    }

    const { operator, registry, sampling, reporting, signal } = this.components;

    operator.info("🚀 Starting TCP connection monitor...");
    operator.info(`Monitoring hosts: ${registry.describe()}`);
    operator.info("Press Ctrl+C to stop\n");

    this.workers = Promise.all([sampling.run(), reporting.run()]).then(
      () => undefined,
      (error: unknown) => {
        this.workerFailure = toError(error);
        operator.error(`Monitor worker failed: ${this.workerFailure.message}`);
        signal.stop();
      }
    );
  }

  /**
   * Stops both workers, waits for any in-flight probe, and writes a final
   * report. Safe to call more than once; later calls share the first result.
   */
  stop(): Promise<FlushResult | null> {
    if (!this.workers) {
      return Promise.reject(new Error("Monitor has not been started"));
    }
    if (!this.stopping) {
      this.stopping = this.shutdown(this.workers);
    }
    return this.stopping;
  }

  /**
   * Starts the monitor and blocks until SIGINT or SIGTERM arrives (or the
   * workers stop on their own), then stops it.
   */
  async runUntilInterrupted(
    signals: SignalSource = process
  ): Promise<FlushResult | null> {
    this.start();

    const reason = await this.waitForShutdown(signals);
    if (reason !== "stopped") {
      this.components.operator.warn(`\n🛑 Received ${reason}, stopping monitor...`);
    }

    return this.stop();
  }

  private async shutdown(workers: Promise<void>): Promise<FlushResult | null> {
    const { aggregator, operator, reporting, signal } = this.components;

    signal.stop();
    await workers;

    operator.info("Final statistics:");
    for (const line of summarizeSnapshot(aggregator.peek(), aggregator.bucketSet)) {
      operator.info(`  ${line}`);
    }
    const result = await reporting.flush();
    if (!result) {
      operator.info("No probes recorded since the last report");
    }
    operator.success("Monitor stopped");

    if (this.workerFailure) {
      throw this.workerFailure;
    }
    return result;
  }

  private waitForShutdown(
    signals: SignalSource
  ): Promise<ShutdownSignal | "stopped"> {
    const { signal } = this.components;
    if (signal.isStopped) {
      return Promise.resolve("stopped");
    }

    return new Promise((resolve) => {
      const listeners = SHUTDOWN_SIGNALS.map((name) => {
        const listener = () => finish(name);
        signals.once(name, listener);
        return { name, listener };
      });
      const subscription = signal.onStop().subscribe(() => finish("stopped"));

      function finish(reason: ShutdownSignal | "stopped"): void {
        for (const { name, listener } of listeners) {
          signals.removeListener(name, listener);
        }
        subscription.unsubscribe();
        resolve(reason);
      }
    });
  }
}

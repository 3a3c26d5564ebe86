import { ProbeEngine } from "../executor/probe-engine";
import { HistogramAggregator } from "../analyzer/histogram-aggregator";
import { TargetRegistry } from "../config/target-registry";
import { SchedulerState } from "../types/common";
import { StopSignal } from "./stop-signal";

export interface SamplingConfig {
  intervalMs: number;
}

export const DEFAULT_SAMPLING_INTERVAL_MS = 2000;

/**
 * Probes every registered endpoint in order, one at a time, then pauses
 * before the next pass. Failed probes are just samples; the next pass is
 * the retry.
 */
export class SamplingScheduler {
  private config: SamplingConfig;
  private registry: TargetRegistry;
  private engine: ProbeEngine;
  private aggregator: HistogramAggregator;
  private signal: StopSignal;
  private currentState: SchedulerState = "idle";
  private completedPasses = 0;

  constructor(
    config: Partial<SamplingConfig>,
    registry: TargetRegistry,
    engine: ProbeEngine,
    aggregator: HistogramAggregator,
    signal: StopSignal
  ) {
    this.config = {
      intervalMs: config.intervalMs ?? DEFAULT_SAMPLING_INTERVAL_MS,
    };
    this.registry = registry;
    this.engine = engine;
    this.aggregator = aggregator;
    this.signal = signal;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get passes(): number {
    return this.completedPasses;
  }

  async run(): Promise<void> {
    if (this.currentState !== "idle") {
      throw new Error(
        `Sampling scheduler cannot start from state "${this.currentState}"`
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
        const finished = await this.runPass();
        if (!finished) break;
        this.completedPasses++;
        if (this.signal.isStopped) break;

        await this.signal.sleep(this.config.intervalMs);
      }
    } finally {
      subscription.unsubscribe();
      this.currentState = "stopped";
    }
  }

  /**
   * Returns false if the pass was cut short by a stop request
   */
  private async runPass(): Promise<boolean> {
    for (const endpoint of this.registry.endpoints) {
      if (this.signal.isStopped) return false;

      const outcome = await this.engine.probe(endpoint);
      this.aggregator.record(endpoint, outcome);
    }
    return true;
  }
}

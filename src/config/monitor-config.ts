import { promises as fs } from "fs";
import { MonitorConfig, PartialMonitorConfig } from "../types/config";
import { EndpointConfig } from "../types/endpoint";
import { ValidationResult } from "../types/common";
import { ConfigurationError, toError } from "../types/errors";
import {
  parseEndpointConfig,
  parsePartialMonitorConfig,
  validateMonitorConfig,
} from "../types/validation";
import { DEFAULT_CONNECT_TIMEOUT_MS } from "../executor/probe-engine";
import { DEFAULT_SAMPLING_INTERVAL_MS } from "../orchestrator/sampling-scheduler";
import { DEFAULT_REPORTING_INTERVAL_MS } from "../orchestrator/reporting-scheduler";
import { DEFAULT_LOG_SINK_CONFIG } from "../reporter/daily-log-sink";

/**
 * Default configuration for the monitor
 */
export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  targets: [],
  probe: {
    connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  },
  sampling: {
    intervalMs: DEFAULT_SAMPLING_INTERVAL_MS,
  },
  reporting: {
    intervalMs: DEFAULT_REPORTING_INTERVAL_MS, // 5 minutes
    logDirectory: DEFAULT_LOG_SINK_CONFIG.logDirectory,
    filePrefix: DEFAULT_LOG_SINK_CONFIG.filePrefix,
  },
  output: {
    color: true,
  },
};

/**
 * Configuration manager for the monitor
 */
export class MonitorConfigManager {
  private config: MonitorConfig;

  constructor(config?: PartialMonitorConfig) {
    this.config = this.mergeConfig(DEFAULT_MONITOR_CONFIG, config || {});
  }

  /**
   * Get a copy of the current configuration
   */
  getConfig(): MonitorConfig {
    return {
      targets: this.config.targets.map((target) => ({ ...target })),
      probe: { ...this.config.probe },
      sampling: { ...this.config.sampling },
      reporting: { ...this.config.reporting },
      output: { ...this.config.output },
    };
  }

  /**
   * Update configuration with partial config. Targets, when given, replace
   * the current list.
   */
  updateConfig(partialConfig: PartialMonitorConfig): void {
    this.config = this.mergeConfig(this.config, partialConfig);
  }

  /**
   * Append targets after the ones already configured
   */
  addTargets(targets: EndpointConfig[]): void {
    this.config = {
      ...this.config,
      targets: [...this.config.targets, ...targets],
    };
  }

  resetToDefaults(): void {
    this.config = this.mergeConfig(DEFAULT_MONITOR_CONFIG, {});
  }

  validateConfig(): ValidationResult {
    return validateMonitorConfig(this.config);
  }

  private mergeConfig(
    base: MonitorConfig,
    override: PartialMonitorConfig
  ): MonitorConfig {
    return {
      targets: [...(override.targets ?? base.targets)],
      probe: { ...base.probe, ...override.probe },
      sampling: { ...base.sampling, ...override.sampling },
      reporting: { ...base.reporting, ...override.reporting },
      output: { ...base.output, ...override.output },
    };
  }
}

/**
 * Reads and validates a JSON config file
 */
export async function loadMonitorConfigFile(
  filePath: string
): Promise<PartialMonitorConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}`,
      [],
      toError(error)
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${filePath} is not valid JSON`,
      [toError(error).message],
      toError(error)
    );
  }

  return parsePartialMonitorConfig(parsed, `config file ${filePath}`);
}

/**
 * Parses a command-line target of the form "[label=]host:port".
 * IPv6 literals must be bracketed: "[::1]:443".
 */
export function parseTargetSpec(spec: string): EndpointConfig {
  const trimmed = spec.trim();
  const separator = trimmed.indexOf("=");
  const label = separator > 0 ? trimmed.slice(0, separator).trim() : undefined;
  const address = separator > 0 ? trimmed.slice(separator + 1).trim() : trimmed;

  const match = /^(?:\[([^\]]+)\]|([^:\s]+)):(\d+)$/.exec(address);
  if (!match) {
    throw new ConfigurationError(`Invalid target "${spec}"`, [
      'expected "[label=]host:port"',
    ]);
  }

  return parseEndpointConfig({
    hostname: match[1] ?? match[2],
    port: Number(match[3]),
    label,
  });
}

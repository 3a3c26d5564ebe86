import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import {
  MonitorConfigManager,
  loadMonitorConfigFile,
  parseTargetSpec,
} from "../config/monitor-config";
import { TcpProbeEngine } from "../executor/probe-engine";
import { createMonitor } from "../orchestrator/monitor-lifecycle";
import {
  MAX_DELAY_MS,
  PartialMonitorConfig,
  ReportingSettings,
} from "../types/config";
import { createEndpoint } from "../types/endpoint";
import { ConfigurationError, toError } from "../types/errors";
import { isProbeSuccessful } from "../types/probe";
import { parseEndpointConfig } from "../types/validation";
import { OperatorConsole } from "./operator-console";
import { renderProbeTable } from "./probe-display";

export const VERSION = "1.0.0";

export interface MonitorCommandOptions {
  config?: string;
  target?: string[];
  interval?: number;
  reportInterval?: number;
  timeout?: number;
  logDir?: string;
  prefix?: string;
  color: boolean;
}

export interface ProbeCommandOptions {
  label?: string;
  timeout?: number;
  color: boolean;
}

export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_DELAY_MS) {
    throw new InvalidArgumentError(
      `Expected an integer from 0 to ${MAX_DELAY_MS} (milliseconds).`
    );
  }
  return parsed;
}

// Timeouts and report intervals of 0 would fire immediately
export function parsePositiveMilliseconds(value: string): number {
  const parsed = parseMilliseconds(value);
  if (parsed === 0) {
    throw new InvalidArgumentError(
      `Expected an integer from 1 to ${MAX_DELAY_MS} (milliseconds).`
    );
  }
  return parsed;
}

export class CLIRunner {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name("netprobe")
      .description(
        "netprobe - periodic DNS and TCP connect latency monitor"
      )
      .version(VERSION);

    this.program
      .command("monitor", { isDefault: true })
      .description("Probe targets continuously and log latency histograms")
      .option("-c, --config <path>", "JSON config file with targets and settings")
      .option(
        "-t, --target <spec...>",
        'Target to probe as "[label=]host:port" (repeatable)'
      )
      .option("--interval <ms>", "Pause between sampling passes", parseMilliseconds)
      .option(
        "--report-interval <ms>",
        "Time between statistics flushes",
        parsePositiveMilliseconds
      )
      .option("--timeout <ms>", "TCP connect timeout", parsePositiveMilliseconds)
      .option("--log-dir <dir>", "Directory for the daily statistics logs")
      .option("--prefix <name>", "File name prefix for the daily statistics logs")
      .option("--no-color", "Disable colored output")
      .action(async (options: MonitorCommandOptions) => {
        await this.startMonitor(options);
      });

    this.program
      .command("probe <host> <port>")
      .description("Run a single DNS + TCP connect probe and show the timings")
      .option("-l, --label <name>", "Display label for the target")
      .option("--timeout <ms>", "TCP connect timeout", parsePositiveMilliseconds)
      .option("--no-color", "Disable colored output")
      .action(async (host: string, port: string, options: ProbeCommandOptions) => {
        await this.runSingleProbe(host, port, options);
      });
  }

  private async startMonitor(options: MonitorCommandOptions): Promise<void> {
    const manager = new MonitorConfigManager();

    if (options.config) {
      manager.updateConfig(await loadMonitorConfigFile(options.config));
    }
    if (options.target) {
      manager.addTargets(options.target.map((spec) => parseTargetSpec(spec)));
    }
    manager.updateConfig(this.overridesFrom(options));

    const config = manager.getConfig();
    const operator = new OperatorConsole({ color: config.output.color });

    const validation = manager.validateConfig();
    for (const warning of validation.warnings) {
      operator.warn(`⚠️  ${warning}`);
    }
    if (!validation.isValid) {
      throw new ConfigurationError("Invalid configuration", validation.errors);
    }
    if (config.targets.length === 0) {
      throw new ConfigurationError("No targets configured", [
        "use --config <file> or --target host:port",
      ]);
    }

    const monitor = createMonitor(config, { operator });
    await monitor.runUntilInterrupted(process);
  }

  private async runSingleProbe(
    host: string,
    port: string,
    options: ProbeCommandOptions
  ): Promise<void> {
    const operator = new OperatorConsole({ color: options.color });
    const endpoint = createEndpoint(
      parseEndpointConfig({ hostname: host, port, label: options.label })
    );
    const engine = new TcpProbeEngine(
      { connectTimeoutMs: options.timeout },
      { operator }
    );

    const outcome = await engine.probe(endpoint);
    operator.info(renderProbeTable(outcome, operator.colors));
    process.exitCode = isProbeSuccessful(outcome) ? 0 : 2;
  }

  private overridesFrom(options: MonitorCommandOptions): PartialMonitorConfig {
    const overrides: PartialMonitorConfig = {};

    if (options.timeout !== undefined) {
      overrides.probe = { connectTimeoutMs: options.timeout };
    }
    if (options.interval !== undefined) {
      overrides.sampling = { intervalMs: options.interval };
    }

    const reporting: Partial<ReportingSettings> = {};
    if (options.reportInterval !== undefined) {
      reporting.intervalMs = options.reportInterval;
    }
    if (options.logDir !== undefined) {
      reporting.logDirectory = options.logDir;
    }
    if (options.prefix !== undefined) {
      reporting.filePrefix = options.prefix;
    }
    if (Object.keys(reporting).length > 0) {
      overrides.reporting = reporting;
    }

    if (!options.color) {
      overrides.output = { color: false };
    }

    return overrides;
  }

  async run(args: string[] = process.argv): Promise<void> {
    try {
      await this.program.parseAsync(args);
    } catch (error) {
      console.error(chalk.red(`❌ ${toError(error).message}`));
      process.exitCode = 1;
    }
  }
}

// Convenience function for embedding the CLI
export async function startCLI(args?: string[]): Promise<void> {
  const runner = new CLIRunner();
  await runner.run(args);
}

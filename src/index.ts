// Main entry point for netprobe
export * from "./types";
export * from "./analyzer/latency-buckets";
export * from "./analyzer/histogram-aggregator";
export * from "./executor/probe-engine";
export * from "./config/target-registry";
export * from "./config/monitor-config";
export * from "./reporter/report-formatter";
export * from "./reporter/daily-log-sink";
export * from "./orchestrator/stop-signal";
export * from "./orchestrator/sampling-scheduler";
export * from "./orchestrator/reporting-scheduler";
export * from "./orchestrator/monitor-lifecycle";
export * from "./cli/operator-console";
export * from "./cli/probe-display";
export { CLIRunner, startCLI, VERSION } from "./cli/cli-runner";

export const APP_NAME = "netprobe";

// Common types and enums
import { ReportRow } from "./histogram";
import { ProbeOutcome } from "./probe";

export type SchedulerState = "idle" | "running" | "stopping" | "stopped";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface FlushResult {
  destination: string;
  timestamp: Date;
  rows: ReportRow[];
}

/**
 * Operator-facing output: one progress marker per probe plus short
 * human-readable lines. Not a structured or parseable interface.
 */
export interface OperatorStream {
  progress(outcome: ProbeOutcome): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

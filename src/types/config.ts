import { EndpointConfig } from "./endpoint";

/**
 * Longest delay a Node timer honours (2^31 - 1 ms, about 24.8 days).
 * Larger values overflow and fire after 1ms.
 */
export const MAX_DELAY_MS = 2_147_483_647;

export interface ProbeSettings {
  connectTimeoutMs: number;
}

export interface SamplingSettings {
  /** Pause between two full passes over the targets */
  intervalMs: number;
}

export interface ReportingSettings {
  intervalMs: number;
  logDirectory: string;
  filePrefix: string;
}

export interface OutputSettings {
  color: boolean;
}

export interface MonitorConfig {
  targets: EndpointConfig[];
  probe: ProbeSettings;
  sampling: SamplingSettings;
  reporting: ReportingSettings;
  output: OutputSettings;
}

export interface PartialMonitorConfig {
  targets?: EndpointConfig[];
  probe?: Partial<ProbeSettings>;
  sampling?: Partial<SamplingSettings>;
  reporting?: Partial<ReportingSettings>;
  output?: Partial<OutputSettings>;
}

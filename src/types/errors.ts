import { EndpointKey, formatAddress } from "./endpoint";

export enum MonitorErrorType {
  DNS_RESOLUTION_FAILED = "DNS_RESOLUTION_FAILED",
  CONNECT_FAILED = "CONNECT_FAILED",
  REPORT_SINK_WRITE_FAILED = "REPORT_SINK_WRITE_FAILED",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
}

export type ConnectFailureKind =
  | "timeout"
  | "refused"
  | "unreachable"
  | "skipped"
  | "socket";

/**
 * Base class for every error the monitor raises or records.
 */
export abstract class MonitorError extends Error {
  public abstract readonly type: MonitorErrorType;
  public readonly originalError?: Error;
  public readonly timestamp: Date;

  protected constructor(message: string, originalError?: Error) {
    super(message);
    this.originalError = originalError;
    this.timestamp = new Date();
  }

  toJSON() {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      originalError: this.originalError?.message,
    };
  }
}

export class DnsResolutionFailure extends MonitorError {
  public readonly type = MonitorErrorType.DNS_RESOLUTION_FAILED;
  public readonly hostname: string;
  public readonly code?: string;

  constructor(hostname: string, originalError?: Error) {
    const code = errorCode(originalError);
    super(
      `DNS resolution failed for ${hostname}${code ? ` (${code})` : ""}`,
      originalError
    );
    this.name = "DnsResolutionFailure";
    this.hostname = hostname;
    this.code = code;
  }
}

export class ConnectFailure extends MonitorError {
  public readonly type = MonitorErrorType.CONNECT_FAILED;
  public readonly endpoint: EndpointKey;
  public readonly kind: ConnectFailureKind;
  public readonly code?: string;
  public readonly timeoutMs?: number;

  constructor(
    endpoint: EndpointKey,
    kind: ConnectFailureKind,
    options: { originalError?: Error; timeoutMs?: number } = {}
  ) {
    super(
      ConnectFailure.describe(endpoint, kind, options),
      options.originalError
    );
    this.name = "ConnectFailure";
    this.endpoint = endpoint;
    this.kind = kind;
    this.code = errorCode(options.originalError);
    this.timeoutMs = options.timeoutMs;
  }

  private static describe(
    endpoint: EndpointKey,
    kind: ConnectFailureKind,
    options: { originalError?: Error; timeoutMs?: number }
  ): string {
    const target = formatAddress(endpoint);
    switch (kind) {
      case "timeout":
        return `Connection to ${target} timed out after ${options.timeoutMs}ms`;
      case "skipped":
        return `Connection to ${target} skipped: hostname did not resolve`;
      default:
        return `Connection failed to ${target} - ${
          options.originalError?.message ?? kind
        }`;
    }
  }

  toJSON() {
    return {
      ...super.toJSON(),
      kind: this.kind,
      code: this.code,
      endpoint: formatAddress(this.endpoint),
    };
  }
}

export class ReportSinkWriteFailure extends MonitorError {
  public readonly type = MonitorErrorType.REPORT_SINK_WRITE_FAILED;
  public readonly destination: string;

  constructor(destination: string, originalError?: Error) {
    super(
      `Failed to write report to ${destination}${
        originalError ? `: ${originalError.message}` : ""
      }`,
      originalError
    );
    this.name = "ReportSinkWriteFailure";
    this.destination = destination;
  }
}

export class ConfigurationError extends MonitorError {
  public readonly type = MonitorErrorType.INVALID_CONFIGURATION;
  public readonly details: string[];

  constructor(message: string, details: string[] = [], originalError?: Error) {
    super(
      details.length > 0 ? `${message}: ${details.join("; ")}` : message,
      originalError
    );
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}

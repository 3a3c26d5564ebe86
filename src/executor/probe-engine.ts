import { promises as dns } from "dns";
import net from "net";
import { performance } from "perf_hooks";
import { Endpoint } from "../types/endpoint";
import {
  ConnectFailure,
  ConnectFailureKind,
  DnsResolutionFailure,
  errorCode,
  toError,
} from "../types/errors";
import {
  ConnectResult,
  DnsResult,
  ProbeOutcome,
  failed,
  succeeded,
} from "../types/probe";
import { OperatorStream } from "../types/common";

export interface ResolvedAddress {
  address: string;
  family: number;
}

export type HostResolver = (hostname: string) => Promise<ResolvedAddress>;

/**
 * The part of a socket the engine relies on. net.Socket satisfies it.
 */
export interface ProbeSocket {
  once(event: string, listener: (...args: unknown[]) => void): unknown;
  destroy(): void;
}

export type SocketConnector = (options: {
  host: string;
  port: number;
  family: number;
}) => ProbeSocket;

export interface ProbeEngineConfig {
  connectTimeoutMs: number;
}

export interface ProbeEngineDependencies {
  operator: OperatorStream;
  resolver?: HostResolver;
  connector?: SocketConnector;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export const systemResolver: HostResolver = (hostname) =>
  dns.lookup(hostname);

export const tcpConnector: SocketConnector = (options) =>
  net.createConnection(options);

export interface ProbeEngine {
  probe(endpoint: Endpoint): Promise<ProbeOutcome>;
}

/**
 * Measures DNS resolution and TCP connect time for one endpoint. The two
 * phases are timed separately and never overlap. Every network failure is
 * converted into a failed phase; probe() never rejects.
 */
export class TcpProbeEngine implements ProbeEngine {
  private readonly config: ProbeEngineConfig;
  private readonly operator: OperatorStream;
  private readonly resolver: HostResolver;
  private readonly connector: SocketConnector;
  private readonly now: () => number;

  constructor(
    config: Partial<ProbeEngineConfig>,
    dependencies: ProbeEngineDependencies
  ) {
    this.config = {
      connectTimeoutMs:
        config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    };
    this.operator = dependencies.operator;
    this.resolver = dependencies.resolver ?? systemResolver;
    this.connector = dependencies.connector ?? tcpConnector;
    this.now = dependencies.now ?? (() => performance.now());
  }

  get connectTimeoutMs(): number {
    return this.config.connectTimeoutMs;
  }

  async probe(endpoint: Endpoint): Promise<ProbeOutcome> {
    const outcome = await this.measure(endpoint);

    const failure =
      outcome.dns.status === "failed"
        ? outcome.dns.error
        : outcome.connect.status === "failed"
        ? outcome.connect.error
        : undefined;
    if (failure) {
      this.operator.warn(`${endpoint.label}: ${failure.message}`);
    }
    this.operator.progress(outcome);

    return outcome;
  }

  private async measure(endpoint: Endpoint): Promise<ProbeOutcome> {
    const startedAt = new Date();

    const dnsStart = this.now();
    let resolved: ResolvedAddress;
    try {
      resolved = await this.resolver(endpoint.hostname);
    } catch (error) {
      const dnsResult: DnsResult = failed(
        new DnsResolutionFailure(endpoint.hostname, toError(error))
      );
      return {
        endpoint,
        startedAt,
        dns: dnsResult,
        connect: failed(new ConnectFailure(endpoint, "skipped")),
      };
    }
    const dnsResult: DnsResult = succeeded(this.now() - dnsStart);

    // Connect timing starts only once resolution has finished
    const connectStart = this.now();
    let connectResult: ConnectResult;
    try {
      await this.connect(endpoint, resolved);
      connectResult = succeeded(this.now() - connectStart);
    } catch (error) {
      connectResult = failed(
        error instanceof ConnectFailure
          ? error
          : new ConnectFailure(endpoint, "socket", {
              originalError: toError(error),
            })
      );
    }

    return {
      endpoint,
      startedAt,
      resolvedAddress: resolved.address,
      dns: dnsResult,
      connect: connectResult,
    };
  }

  private connect(endpoint: Endpoint, resolved: ResolvedAddress): Promise<void> {
    const timeoutMs = this.config.connectTimeoutMs;

    return new Promise<void>((resolve, reject) => {
      // Throws synchronously for an out-of-range port; the executor turns
      // that into a rejection.
      const socket = this.connector({
        host: resolved.address,
        port: endpoint.port,
        family: resolved.family,
      });

      let settled = false;
      const settle = (failure?: ConnectFailure) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        if (failure) {
          reject(failure);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        settle(new ConnectFailure(endpoint, "timeout", { timeoutMs }));
      }, timeoutMs);

      socket.once("connect", () => settle());
      socket.once("error", (error: unknown) => {
        const cause = toError(error);
        settle(
          new ConnectFailure(endpoint, connectFailureKind(cause), {
            originalError: cause,
          })
        );
      });
    });
  }
}

export function connectFailureKind(error: Error): ConnectFailureKind {
  switch (errorCode(error)) {
    case "ETIMEDOUT":
      return "timeout";
    case "ECONNREFUSED":
      return "refused";
    case "EHOSTUNREACH":
    case "ENETUNREACH":
    case "EHOSTDOWN":
    case "ENETDOWN":
      return "unreachable";
    default:
      return "socket";
  }
}

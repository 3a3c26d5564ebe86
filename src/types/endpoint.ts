import { isIP } from "net";

/**
 * A monitored (hostname, port) pair and the label it is reported under.
 */
export interface Endpoint {
  readonly hostname: string;
  readonly port: number;
  readonly label: string;
}

/**
 * Identity of an endpoint. The label is display-only and never part of it.
 */
export interface EndpointKey {
  readonly hostname: string;
  readonly port: number;
}

/**
 * Target as it appears in configuration, before defaults are applied
 */
export interface EndpointConfig {
  hostname: string;
  port: number;
  label?: string;
}

/**
 * Canonical map key for an endpoint. Serialized as a tuple so that
 * hostnames containing ':' (IPv6 literals) cannot collide with a
 * different hostname/port split.
 */
export function endpointKeyId(endpoint: EndpointKey): string {
  return JSON.stringify([endpoint.hostname.toLowerCase(), endpoint.port]);
}

/**
 * Human readable address, bracketing IPv6 literals.
 */
export function formatAddress(endpoint: EndpointKey): string {
  const host = endpoint.hostname.includes(":")
    ? `[${endpoint.hostname}]`
    : endpoint.hostname;
  return `${host}:${endpoint.port}`;
}

/**
 * Label used when a target is configured without one: the first DNS label
 * of the hostname ("api.example.com" -> "api"). IP literals are used whole.
 */
export function defaultLabel(hostname: string): string {
  if (isIP(hostname) !== 0) return hostname;
  const first = hostname.split(".")[0];
  return first || hostname;
}

export function createEndpoint(config: EndpointConfig): Endpoint {
  const label = config.label?.trim();
  return Object.freeze({
    hostname: config.hostname,
    port: config.port,
    label: label ? label : defaultLabel(config.hostname),
  });
}

import {
  Endpoint,
  EndpointConfig,
  createEndpoint,
  formatAddress,
} from "../types/endpoint";

/**
 * Ordered, read-only list of monitored endpoints. Loaded once at startup
 * and never reloaded, so it needs no synchronization.
 */
export class TargetRegistry {
  public readonly endpoints: readonly Endpoint[];

  constructor(targets: readonly EndpointConfig[]) {
    this.endpoints = Object.freeze(targets.map((target) => createEndpoint(target)));
  }

  get size(): number {
    return this.endpoints.length;
  }

  /**
   * "label (host:port), ..." for the startup banner
   */
  describe(): string {
    return this.endpoints
      .map((endpoint) => `${endpoint.label} (${formatAddress(endpoint)})`)
      .join(", ");
  }
}

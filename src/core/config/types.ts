/**
 * Config types: gateway settings resolved from the environment.
 */

import type { ProviderId } from "../constants.js";

export interface GatewaySettings {
  provider: ProviderId;
  /** Raw provider params; validated by the provider's registered config schema. */
  params: Record<string, unknown>;
  /** From env GATEWAY_NETWORK_TIMEOUT_MS */
  networkTimeoutMs?: number;
}

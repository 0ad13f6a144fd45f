/**
 * Config service: gateway settings from env.
 */

import { z } from "zod";
import { createDefaultRegistry } from "../../adapters/registryBootstrap.js";
import { InventoryGateway } from "../../services/InventoryGateway.js";
import { MAX_TIMER_DELAY_MS, PROVIDERS, isProviderId } from "../constants.js";
import { ConfigurationError, ProviderNotRegisteredError } from "../errors.js";
import type { ProviderRegistry } from "../providerRegistry.js";
import type { GatewaySettings } from "./types.js";

type Env = Record<string, string | undefined>;

const TimeoutSchema = z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS);

function pick(env: Env, mapping: Record<string, string>): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const [param, variable] of Object.entries(mapping)) {
    const value = env[variable]?.trim();
    if (value) params[param] = value;
  }
  return params;
}

function paramsFor(provider: GatewaySettings["provider"], env: Env): Record<string, unknown> {
  if (provider === PROVIDERS.MOCK) {
    return pick(env, {
      networkTimezone: "MOCK_NETWORK_TIMEZONE",
      fixturesPath: "MOCK_FIXTURES_PATH",
    });
  }
  return pick(env, {
    networkCode: "GAM_NETWORK_CODE",
    applicationName: "GAM_APPLICATION_NAME",
    refreshToken: "GAM_REFRESH_TOKEN",
    oauthClientId: "GAM_OAUTH_CLIENT_ID",
    oauthClientSecret: "GAM_OAUTH_CLIENT_SECRET",
    serviceAccountJson: "GAM_SERVICE_ACCOUNT_JSON",
  });
}

export function loadGatewaySettings(env: Env = process.env): GatewaySettings {
  const provider = env.GATEWAY_PROVIDER?.trim();
  if (!provider) {
    throw new ConfigurationError("GATEWAY_PROVIDER is not set");
  }
  if (!isProviderId(provider)) {
    throw new ProviderNotRegisteredError(provider);
  }

  const settings: GatewaySettings = { provider, params: paramsFor(provider, env) };

  const rawTimeout = env.GATEWAY_NETWORK_TIMEOUT_MS?.trim();
  if (rawTimeout) {
    const timeout = TimeoutSchema.safeParse(rawTimeout);
    if (!timeout.success) {
      throw new ConfigurationError(
        `GATEWAY_NETWORK_TIMEOUT_MS must be a positive integer up to ${MAX_TIMER_DELAY_MS}, got "${rawTimeout}"`
      );
    }
    settings.networkTimeoutMs = timeout.data;
  }
  return settings;
}

/** Resolve settings from env and build a live gateway. */
export async function createGatewayFromEnv(
  env: Env = process.env,
  registry: ProviderRegistry = createDefaultRegistry()
): Promise<InventoryGateway> {
  const settings = loadGatewaySettings(env);
  return InventoryGateway.create({
    provider: settings.provider,
    params: settings.params,
    networkTimeoutMs: settings.networkTimeoutMs,
    registry,
  });
}

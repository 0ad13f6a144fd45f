/**
 * The default provider registry: both Google Ad Manager tiers and the mock.
 * Build it once at startup and pass it to InventoryGateway.create().
 */

import { PROVIDERS } from "../core/constants.js";
import { createProviderRegistry, defineProvider, type ProviderRegistry } from "../core/providerRegistry.js";
import { GoogleAdManager, createGamClient } from "./gam/index.js";
import { GamConfigSchema, type GamConfig, type GamTier } from "./gam/types.js";
import { MockProviderConfigSchema, createMockProvider } from "./mock/index.js";

function gamFactory(tier: GamTier) {
  return (config: GamConfig) => new GoogleAdManager(config, createGamClient(config), tier);
}

export function createDefaultRegistry(): ProviderRegistry {
  return createProviderRegistry([
    defineProvider(PROVIDERS.GOOGLE_AD_MANAGER_PREMIUM, GamConfigSchema, gamFactory("premium")),
    defineProvider(PROVIDERS.GOOGLE_AD_MANAGER_SMALL_BUSINESS, GamConfigSchema, gamFactory("small_business")),
    defineProvider(PROVIDERS.MOCK, MockProviderConfigSchema, createMockProvider),
  ]);
}

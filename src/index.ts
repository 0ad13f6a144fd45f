export { InventoryGateway, type InventoryGatewayOptions } from "./services/InventoryGateway.js";
export { createGatewayFromEnv, loadGatewaySettings } from "./core/config/configService.js";
export type { GatewaySettings } from "./core/config/types.js";
export { createDefaultRegistry } from "./adapters/registryBootstrap.js";
export {
  createProviderRegistry,
  defineProvider,
  type ProviderRegistration,
  type ProviderRegistry,
} from "./core/providerRegistry.js";
export type { AdProvider } from "./adapters/base.js";
export { GoogleAdManager, GamConfigSchema, createGamClient, type GamConfig, type GamTier } from "./adapters/gam/index.js";
export { MockAdProvider, MockProviderConfigSchema, type MockProviderConfig } from "./adapters/mock/index.js";
export { executeWithRetry, type RetryOptions } from "./core/retry.js";
export { withTimeout, createGuard, type Guard } from "./core/timeout.js";
export { assembleTree, TreeBuilder } from "./core/treeBuilder.js";
export { registry as metricsRegistry } from "./core/metrics.js";
export {
  PROVIDERS,
  REPORT_METRICS,
  TARGET_TYPES,
  DEFAULT_NETWORK_TIMEOUT_MS,
  MAX_REQUEST_ATTEMPTS,
  MAX_TIMER_DELAY_MS,
  type ProviderId,
  type ReportMetric,
  type TargetType,
} from "./core/constants.js";
export * from "./core/errors.js";
export type * from "./types/inventory.js";

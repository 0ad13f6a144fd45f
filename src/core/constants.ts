/**
 * Shared constants: provider identifiers, request limits, report metrics, tree target types.
 * Use everywhere to avoid hardcoded strings.
 */

export const PROVIDERS = {
  GOOGLE_AD_MANAGER_PREMIUM: "google_ad_manager_premium",
  GOOGLE_AD_MANAGER_SMALL_BUSINESS: "google_ad_manager_small_business",
  MOCK: "mock",
} as const;

export type ProviderId = (typeof PROVIDERS)[keyof typeof PROVIDERS];

export function isProviderId(value: string): value is ProviderId {
  return Object.values<string>(PROVIDERS).includes(value);
}

/** Deadline applied to every provider call (10 minutes). */
export const DEFAULT_NETWORK_TIMEOUT_MS = 10 * 60 * 1000;

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Total attempts, first one included, for retried reads. */
export const MAX_REQUEST_ATTEMPTS = 3;

/** Largest page GAM returns for a single statement. */
export const DEFAULT_PAGE_SIZE = 500;

export const REPORT_METRICS = {
  AD_IMPRESSIONS: "AD_SERVER_IMPRESSIONS",
  AD_CLICKS: "AD_SERVER_CLICKS",
  AD_CTR: "AD_SERVER_CTR",
  AD_REVENUE: "AD_SERVER_CPM_AND_CPC_REVENUE",
} as const;

export type ReportMetric = (typeof REPORT_METRICS)[keyof typeof REPORT_METRICS];

export const TARGET_TYPES = {
  AD_UNIT: "ad_unit",
  CUSTOM_TARGETING: "custom_targeting",
} as const;

export type TargetType = (typeof TARGET_TYPES)[keyof typeof TARGET_TYPES];

export const HIERARCHY_ENTITY_TYPES = {
  AD_UNIT: "ad_unit",
  CUSTOM_TARGETING_KEY: "custom_targeting_key",
  CUSTOM_TARGETING_VALUE: "custom_targeting_value",
} as const;

export type HierarchyEntityType = (typeof HIERARCHY_ENTITY_TYPES)[keyof typeof HIERARCHY_ENTITY_TYPES];

/** Entity types, in listing order, that make up the tree of each target type. */
export const TARGET_TYPE_SOURCES: Record<TargetType, readonly HierarchyEntityType[]> = {
  [TARGET_TYPES.AD_UNIT]: [HIERARCHY_ENTITY_TYPES.AD_UNIT],
  [TARGET_TYPES.CUSTOM_TARGETING]: [
    HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_KEY,
    HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_VALUE,
  ],
};

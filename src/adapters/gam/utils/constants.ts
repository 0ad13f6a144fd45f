/**
 * GAM constants: request defaults, failure classification and report job states.
 */

export const ADAPTER_TYPE = "google_ad_manager";

export const DEFAULT_APPLICATION_NAME = "Ad Inventory Gateway";

/** Socket-level error codes that usually clear up on an immediate retry. */
export const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
]);

/** SOAP fault reasons GAM documents as retryable. */
export const TRANSIENT_API_FAULTS = [
  "ServerError.SERVER_ERROR",
  "ServerError.SERVER_BUSY",
  "QuotaError.EXCEEDED_QUOTA",
] as const;

export const NO_FORECAST_FAULT = "ForecastError.NO_FORECAST_YET";

export const REPORT_JOB_STATUS = {
  STARTING: "STARTING",
  IN_PROGRESS: "IN_PROGRESS",
  COMPLETED: "COMPLETED",
  FAILED: "FAILED",
} as const;

export const START_DATE_TIME_TYPES = {
  IMMEDIATELY: "IMMEDIATELY",
  USE_START_DATE_TIME: "USE_START_DATE_TIME",
} as const;

export const CUSTOM_TARGETING_KEY_TYPES = {
  FREEFORM: "FREEFORM",
  PREDEFINED: "PREDEFINED",
} as const;

export const COMPANY_TYPES = {
  ADVERTISER: "ADVERTISER",
} as const;

/**
 * GAM adapter config and the record shapes read back from the SOAP services.
 * Record fields are typed `unknown` and narrowed in mappers.ts; the SDK's own
 * types stay behind client.ts.
 */

import { z } from "zod";
import { DEFAULT_PAGE_SIZE } from "../../core/constants.js";
import { DEFAULT_APPLICATION_NAME } from "./utils/constants.js";

/** Config passed to the GoogleAdManager provider (from env, params, or test fixtures). */
export const GamConfigSchema = z
  .object({
    networkCode: z.string().regex(/^\d+$/, "networkCode must be a numeric string"),
    applicationName: z.string().min(1).default(DEFAULT_APPLICATION_NAME),
    refreshToken: z.string().min(1).optional(),
    oauthClientId: z.string().min(1).optional(),
    oauthClientSecret: z.string().min(1).optional(),
    serviceAccountJson: z.string().min(1).optional(),
    pageSize: z.number().int().min(1).max(DEFAULT_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
    reportPollIntervalMs: z.number().int().nonnegative().default(2000),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!config.refreshToken && !config.serviceAccountJson) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "GAM config requires either refreshToken or serviceAccountJson",
      });
    }
    if (config.refreshToken && (!config.oauthClientId || !config.oauthClientSecret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["refreshToken"],
        message: "GAM OAuth requires oauthClientId and oauthClientSecret when using refreshToken",
      });
    }
  });

export type GamConfig = z.infer<typeof GamConfigSchema>;

export type GamTier = "premium" | "small_business";

export type PqlValue = string | number | boolean;

/** A PQL statement before it is handed to the SDK's StatementBuilder. */
export interface PqlQuery {
  where?: string;
  values: Record<string, PqlValue>;
  orderBy?: string;
  limit?: number;
  offset?: number;
}

export interface GamPage<T> {
  results?: T[];
  totalResultSetSize?: number;
}

export interface GamNetworkRecord {
  networkCode?: unknown;
  displayName?: unknown;
  timeZone?: unknown;
}

export interface GamCompanyRecord {
  id?: unknown;
  name?: unknown;
  type?: unknown;
}

export interface GamOrderRecord {
  id?: unknown;
  name?: unknown;
  advertiserId?: unknown;
  status?: unknown;
  startDateTime?: unknown;
  endDateTime?: unknown;
}

export interface GamLineItemRecord {
  id?: unknown;
  orderId?: unknown;
  name?: unknown;
  lineItemType?: unknown;
  costType?: unknown;
  status?: unknown;
  startDateTime?: unknown;
  endDateTime?: unknown;
  targeting?: unknown;
}

export interface GamCreativeRecord {
  id?: unknown;
  name?: unknown;
  advertiserId?: unknown;
  size?: unknown;
  previewUrl?: unknown;
}

export interface GamLicaRecord {
  lineItemId?: unknown;
  creativeId?: unknown;
  status?: unknown;
}

export interface GamCustomTargetingKeyRecord {
  id?: unknown;
  name?: unknown;
  displayName?: unknown;
  type?: unknown;
  status?: unknown;
}

export interface GamCustomTargetingValueRecord {
  id?: unknown;
  customTargetingKeyId?: unknown;
  name?: unknown;
  displayName?: unknown;
  matchType?: unknown;
  status?: unknown;
}

export interface GamAdUnitRecord {
  id?: unknown;
  parentId?: unknown;
  name?: unknown;
  adUnitCode?: unknown;
  status?: unknown;
}

export interface GamForecastRecord {
  availableUnits?: unknown;
}

export interface GamReportJobRecord {
  id?: unknown;
}

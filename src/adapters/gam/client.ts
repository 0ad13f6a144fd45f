/**
 * GAM client wrapper (mockable for tests).
 * Creates AdManagerClient and exposes the service calls the provider makes, taking
 * plain PQL queries and payloads so nothing above this file touches SDK types.
 */

import { gunzipSync } from "node:zlib";
import { AdManagerClient, ExportFormat, StatementBuilder } from "@guardian/google-admanager-api";
import { AdapterError, ConfigurationError, TransientNetworkError } from "../../core/errors.js";
import { buildGamCredential } from "./auth.js";
import { ADAPTER_TYPE } from "./utils/constants.js";
import type {
  GamAdUnitRecord,
  GamCompanyRecord,
  GamConfig,
  GamCreativeRecord,
  GamCustomTargetingKeyRecord,
  GamCustomTargetingValueRecord,
  GamForecastRecord,
  GamLicaRecord,
  GamLineItemRecord,
  GamNetworkRecord,
  GamOrderRecord,
  GamPage,
  GamReportJobRecord,
  PqlQuery,
} from "./types.js";

/** Wrapper interface so tests can mock GAM service operations. */
export interface GamClientWrapper {
  getCurrentNetwork(): Promise<GamNetworkRecord>;
  getCompanies(query: PqlQuery): Promise<GamPage<GamCompanyRecord>>;
  getOrders(query: PqlQuery): Promise<GamPage<GamOrderRecord>>;
  getLineItems(query: PqlQuery): Promise<GamPage<GamLineItemRecord>>;
  updateLineItems(lineItems: Record<string, unknown>[]): Promise<GamLineItemRecord[]>;
  getCreatives(query: PqlQuery): Promise<GamPage<GamCreativeRecord>>;
  getLineItemCreativeAssociations(query: PqlQuery): Promise<GamPage<GamLicaRecord>>;
  getAvailabilityForecast(
    prospectiveLineItem: Record<string, unknown>,
    options: Record<string, unknown>
  ): Promise<GamForecastRecord>;
  runReportJob(reportJob: Record<string, unknown>): Promise<GamReportJobRecord>;
  getReportJobStatus(reportJobId: number): Promise<string>;
  /** Download a finished report as CSV text. */
  downloadReportCsv(reportJobId: number): Promise<string>;
  getCustomTargetingKeys(query: PqlQuery): Promise<GamPage<GamCustomTargetingKeyRecord>>;
  getCustomTargetingValues(query: PqlQuery): Promise<GamPage<GamCustomTargetingValueRecord>>;
  createCustomTargetingKeys(keys: Record<string, unknown>[]): Promise<GamCustomTargetingKeyRecord[]>;
  createCustomTargetingValues(values: Record<string, unknown>[]): Promise<GamCustomTargetingValueRecord[]>;
  getAdUnits(query: PqlQuery): Promise<GamPage<GamAdUnitRecord>>;
}

function toStatement(query: PqlQuery) {
  let builder = new StatementBuilder();
  if (query.where) builder = builder.where(query.where);
  for (const [key, value] of Object.entries(query.values)) {
    builder = builder.addValue(key, value);
  }
  if (query.orderBy) builder = builder.orderBy(query.orderBy);
  if (query.limit !== undefined) builder = builder.limit(query.limit);
  if (query.offset !== undefined) builder = builder.offset(query.offset);
  return builder.toStatement();
}

/** Create a real GAM client wrapper from config. */
export function createGamClient(config: GamConfig): GamClientWrapper {
  const networkCode = parseInt(config.networkCode, 10);
  if (Number.isNaN(networkCode)) {
    throw new ConfigurationError("GAM config networkCode must be a numeric string");
  }
  const credential = buildGamCredential(config);
  const client = new AdManagerClient(networkCode, credential, config.applicationName);

  return {
    async getCurrentNetwork() {
      const service = await client.getService("NetworkService");
      return service.getCurrentNetwork();
    },
    async getCompanies(query) {
      const service = await client.getService("CompanyService");
      return service.getCompaniesByStatement(toStatement(query));
    },
    async getOrders(query) {
      const service = await client.getService("OrderService");
      return service.getOrdersByStatement(toStatement(query));
    },
    async getLineItems(query) {
      const service = await client.getService("LineItemService");
      return service.getLineItemsByStatement(toStatement(query));
    },
    async updateLineItems(lineItems) {
      const service = await client.getService("LineItemService");
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return service.updateLineItems(lineItems as any);
    },
    async getCreatives(query) {
      const service = await client.getService("CreativeService");
      return service.getCreativesByStatement(toStatement(query));
    },
    async getLineItemCreativeAssociations(query) {
      const service = await client.getService("LineItemCreativeAssociationService");
      return service.getLineItemCreativeAssociationsByStatement(toStatement(query));
    },
    async getAvailabilityForecast(prospectiveLineItem, options) {
      const service = await client.getService("ForecastService");
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return service.getAvailabilityForecast(prospectiveLineItem as any, options as any);
    },
    async runReportJob(reportJob) {
      const service = await client.getService("ReportService");
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return service.runReportJob(reportJob as any);
    },
    async getReportJobStatus(reportJobId) {
      const service = await client.getService("ReportService");
      return String(await service.getReportJobStatus(reportJobId));
    },
    async downloadReportCsv(reportJobId) {
      const service = await client.getService("ReportService");
      const url = await service.getReportDownloadURL(reportJobId, ExportFormat.CSV_DUMP);
      const response = await fetch(url);
      if (!response.ok) {
        const message = `Report download failed: HTTP ${response.status} ${response.statusText}`;
        if (response.status >= 500 || response.status === 429) {
          throw new TransientNetworkError(message);
        }
        throw new AdapterError(message, ADAPTER_TYPE);
      }
      return gunzipSync(Buffer.from(await response.arrayBuffer())).toString("utf8");
    },
    async getCustomTargetingKeys(query) {
      const service = await client.getService("CustomTargetingService");
      return service.getCustomTargetingKeysByStatement(toStatement(query));
    },
    async getCustomTargetingValues(query) {
      const service = await client.getService("CustomTargetingService");
      return service.getCustomTargetingValuesByStatement(toStatement(query));
    },
    async createCustomTargetingKeys(keys) {
      const service = await client.getService("CustomTargetingService");
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return service.createCustomTargetingKeys(keys as any);
    },
    async createCustomTargetingValues(values) {
      const service = await client.getService("CustomTargetingService");
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return service.createCustomTargetingValues(values as any);
    },
    async getAdUnits(query) {
      const service = await client.getService("InventoryService");
      return service.getAdUnitsByStatement(toStatement(query));
    },
  };
}

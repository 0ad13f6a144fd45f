/**
 * Google Ad Manager provider implementing AdProvider.
 * Premium and small-business networks share the SOAP API; the tier is kept for logs.
 */

import type { HierarchyEntityType } from "../../core/constants.js";
import { AdapterError } from "../../core/errors.js";
import { createChildLogger, type Logger } from "../../core/logger.js";
import type {
  Advertiser,
  Campaign,
  Creative,
  CustomTarget,
  HierarchyRecord,
  LineItem,
  PageRequest,
  QueryOptions,
  ReportRow,
} from "../../types/inventory.js";
import { campaignIdOf, lineItemIdOf, type AdProvider } from "../base.js";
import type { GamClientWrapper } from "./client.js";
import { toProviderError } from "./errors.js";
import * as managers from "./managers/index.js";
import type { GamConfig, GamTier } from "./types.js";
import { ADAPTER_TYPE } from "./utils/constants.js";

export class GoogleAdManager implements AdProvider {
  readonly config: GamConfig;
  readonly tier: GamTier;
  private readonly client: GamClientWrapper;
  private readonly log: Logger;

  constructor(config: GamConfig, client: GamClientWrapper, tier: GamTier = "premium") {
    this.config = config;
    this.client = client;
    this.tier = tier;
    this.log = createChildLogger("googleAdManager").child({ networkCode: config.networkCode, tier });
  }

  toString(): string {
    return `GoogleAdManager(networkCode=${this.config.networkCode}, tier=${this.tier})`;
  }

  /** Run one SDK interaction, converting failures into transient or fatal domain errors. */
  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      const providerError = toProviderError(err, operation);
      this.log.debug({ operation, code: providerError.code, retryable: providerError.retryable }, providerError.message);
      throw providerError;
    }
  }

  getNetworkTimezone(): Promise<string> {
    return this.run("getNetworkTimezone", async () => {
      const network = await this.client.getCurrentNetwork();
      if (typeof network.timeZone !== "string" || network.timeZone === "") {
        throw new AdapterError("Network has no time zone", ADAPTER_TYPE);
      }
      return network.timeZone;
    });
  }

  getAdvertisers(): Promise<Advertiser[]> {
    return this.run("getAdvertisers", () => managers.getAdvertisers(this.client, this.config.pageSize));
  }

  getCampaign(campaignId: string): Promise<Campaign> {
    return this.run("getCampaign", () => managers.getCampaign(this.client, campaignId));
  }

  getCampaigns(options: QueryOptions = {}): Promise<Campaign[]> {
    return this.run("getCampaigns", () => managers.getCampaigns(this.client, options, this.config.pageSize));
  }

  getLineItem(lineItemId: string): Promise<LineItem> {
    return this.run("getLineItem", () => managers.getLineItem(this.client, lineItemId));
  }

  getLineItems(options: QueryOptions = {}): Promise<LineItem[]> {
    return this.run("getLineItems", () => managers.getLineItems(this.client, options, this.config.pageSize));
  }

  getCampaignLineItems(campaign: Campaign | string): Promise<LineItem[]> {
    return this.run("getCampaignLineItems", () =>
      managers.getCampaignLineItems(this.client, campaignIdOf(campaign), this.config.pageSize)
    );
  }

  getLineItemAvailableInventory(lineItem: LineItem, useStart: boolean, preserveId: boolean): Promise<number | null> {
    return this.run("getLineItemAvailableInventory", () =>
      managers.getAvailableInventory(this.client, lineItem, useStart, preserveId)
    );
  }

  getCreative(creativeId: string): Promise<Creative> {
    return this.run("getCreative", () => managers.getCreative(this.client, creativeId));
  }

  getCreatives(options: QueryOptions = {}): Promise<Creative[]> {
    return this.run("getCreatives", () => managers.getCreatives(this.client, options, this.config.pageSize));
  }

  getLineItemCreatives(lineItem: LineItem | string): Promise<Creative[]> {
    return this.run("getLineItemCreatives", () =>
      managers.getLineItemCreatives(this.client, lineItemIdOf(lineItem), this.config.pageSize)
    );
  }

  getLineItemReport(start: Date, end: Date, columns: readonly string[]): Promise<ReportRow[]> {
    return this.run("getLineItemReport", async () => {
      const timeZone = await this.getNetworkTimezone();
      return managers.getLineItemReport(this.client, start, end, columns, {
        timeZone,
        pollIntervalMs: this.config.reportPollIntervalMs,
      });
    });
  }

  getCustomTargets(keyName: string, valueName: string): Promise<CustomTarget[]> {
    return this.run("getCustomTargets", () =>
      managers.getCustomTargets(this.client, keyName, valueName, this.config.pageSize)
    );
  }

  updateLineItems(lineItems: LineItem[]): Promise<LineItem[]> {
    return this.run("updateLineItems", () => managers.updateLineItems(this.client, lineItems));
  }

  createCustomTarget(key: string, value: string): Promise<CustomTarget[]> {
    return this.run("createCustomTarget", () =>
      managers.createCustomTarget(this.client, key, value, this.config.pageSize)
    );
  }

  getHierarchyPage(entityType: HierarchyEntityType, page: PageRequest): Promise<HierarchyRecord[]> {
    return this.run("getHierarchyPage", () => managers.getHierarchyPage(this.client, entityType, page));
  }
}

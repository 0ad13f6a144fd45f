/**
 * Provider interface: the capability contract every ad-inventory backend implements.
 * Transient connectivity failures must surface as TransientNetworkError so the
 * gateway can tell them apart from fatal ones.
 */

import type { HierarchyEntityType } from "../core/constants.js";
import { ValidationError } from "../core/errors.js";
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
} from "../types/inventory.js";

export interface AdProvider {
  /** IANA zone the network is configured in. */
  getNetworkTimezone(): Promise<string>;
  getAdvertisers(): Promise<Advertiser[]>;
  /** Throws NotFoundError when the campaign does not exist. */
  getCampaign(campaignId: string): Promise<Campaign>;
  getCampaigns(options?: QueryOptions): Promise<Campaign[]>;
  /** Throws NotFoundError when the line item does not exist. */
  getLineItem(lineItemId: string): Promise<LineItem>;
  getLineItems(options?: QueryOptions): Promise<LineItem[]>;
  getCampaignLineItems(campaign: Campaign | string): Promise<LineItem[]>;
  /** Available impressions, or null when the provider cannot forecast. */
  getLineItemAvailableInventory(
    lineItem: LineItem,
    useStart: boolean,
    preserveId: boolean
  ): Promise<number | null>;
  /** Throws NotFoundError when the creative does not exist. */
  getCreative(creativeId: string): Promise<Creative>;
  getCreatives(options?: QueryOptions): Promise<Creative[]>;
  getLineItemCreatives(lineItem: LineItem | string): Promise<Creative[]>;
  getLineItemReport(start: Date, end: Date, columns: readonly string[]): Promise<ReportRow[]>;
  getCustomTargets(keyName: string, valueName: string): Promise<CustomTarget[]>;
  updateLineItems(lineItems: LineItem[]): Promise<LineItem[]>;
  createCustomTarget(key: string, value: string): Promise<CustomTarget[]>;
  /** One page of the flat listing used to build trees. */
  getHierarchyPage(entityType: HierarchyEntityType, page: PageRequest): Promise<HierarchyRecord[]>;
}

export function campaignIdOf(campaign: Campaign | string): string {
  return typeof campaign === "string" ? campaign : campaign.id;
}

export function lineItemIdOf(lineItem: LineItem | string): string {
  if (typeof lineItem === "string") return lineItem;
  if (lineItem.id == null) {
    throw new ValidationError("Line item has no id; it has not been created yet");
  }
  return lineItem.id;
}

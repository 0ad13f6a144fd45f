/**
 * Delivery management: advertisers, campaigns (GAM orders) and line items.
 */

import { NotFoundError } from "../../../core/errors.js";
import type { Advertiser, Campaign, LineItem, QueryOptions } from "../../../types/inventory.js";
import type { GamClientWrapper } from "../client.js";
import { fromLineItem, toAdvertiser, toCampaign, toLineItem } from "../mappers.js";
import { buildPqlQuery, toPqlId, whereEquals } from "../pql.js";
import { COMPANY_TYPES } from "../utils/constants.js";
import { fetchAllPages, fetchPageOrAll } from "../utils/paging.js";

export async function getAdvertisers(client: GamClientWrapper, pageSize: number): Promise<Advertiser[]> {
  const query = buildPqlQuery({}, whereEquals("type", COMPANY_TYPES.ADVERTISER));
  const companies = await fetchAllPages((q) => client.getCompanies(q), query, pageSize);
  return companies.map(toAdvertiser);
}

export async function getCampaign(client: GamClientWrapper, campaignId: string): Promise<Campaign> {
  const query = buildPqlQuery({ limit: 1 }, whereEquals("id", toPqlId(campaignId)));
  const page = await client.getOrders(query);
  const order = page.results?.[0];
  if (!order) {
    throw new NotFoundError("Campaign", campaignId);
  }
  return toCampaign(order);
}

export async function getCampaigns(
  client: GamClientWrapper,
  options: QueryOptions,
  pageSize: number
): Promise<Campaign[]> {
  const orders = await fetchPageOrAll((q) => client.getOrders(q), buildPqlQuery(options), pageSize);
  return orders.map(toCampaign);
}

export async function getLineItem(client: GamClientWrapper, lineItemId: string): Promise<LineItem> {
  const query = buildPqlQuery({ limit: 1 }, whereEquals("id", toPqlId(lineItemId)));
  const page = await client.getLineItems(query);
  const lineItem = page.results?.[0];
  if (!lineItem) {
    throw new NotFoundError("LineItem", lineItemId);
  }
  return toLineItem(lineItem);
}

export async function getLineItems(
  client: GamClientWrapper,
  options: QueryOptions,
  pageSize: number
): Promise<LineItem[]> {
  const lineItems = await fetchPageOrAll((q) => client.getLineItems(q), buildPqlQuery(options), pageSize);
  return lineItems.map(toLineItem);
}

export async function getCampaignLineItems(
  client: GamClientWrapper,
  campaignId: string,
  pageSize: number
): Promise<LineItem[]> {
  const query = buildPqlQuery({}, whereEquals("orderId", toPqlId(campaignId)));
  const lineItems = await fetchAllPages((q) => client.getLineItems(q), query, pageSize);
  return lineItems.map(toLineItem);
}

export async function updateLineItems(client: GamClientWrapper, lineItems: LineItem[]): Promise<LineItem[]> {
  if (lineItems.length === 0) return [];
  const updated = await client.updateLineItems(lineItems.map(fromLineItem));
  return updated.map(toLineItem);
}

/**
 * Creative management: look up creatives, directly or through their line item associations.
 */

import { NotFoundError } from "../../../core/errors.js";
import type { Creative, QueryOptions } from "../../../types/inventory.js";
import type { GamClientWrapper } from "../client.js";
import { toCreative, toId } from "../mappers.js";
import { buildPqlQuery, toPqlId, whereEquals } from "../pql.js";
import { fetchAllPages, fetchPageOrAll } from "../utils/paging.js";

export async function getCreative(client: GamClientWrapper, creativeId: string): Promise<Creative> {
  const query = buildPqlQuery({ limit: 1 }, whereEquals("id", toPqlId(creativeId)));
  const page = await client.getCreatives(query);
  const creative = page.results?.[0];
  if (!creative) {
    throw new NotFoundError("Creative", creativeId);
  }
  return toCreative(creative);
}

export async function getCreatives(
  client: GamClientWrapper,
  options: QueryOptions,
  pageSize: number
): Promise<Creative[]> {
  const creatives = await fetchPageOrAll((q) => client.getCreatives(q), buildPqlQuery(options), pageSize);
  return creatives.map(toCreative);
}

/**
 * Creatives associated with a line item via LineItemCreativeAssociationService.
 */
export async function getLineItemCreatives(
  client: GamClientWrapper,
  lineItemId: string,
  pageSize: number
): Promise<Creative[]> {
  const licaQuery = buildPqlQuery({}, whereEquals("lineItemId", toPqlId(lineItemId)));
  const associations = await fetchAllPages((q) => client.getLineItemCreativeAssociations(q), licaQuery, pageSize);

  const creativeIds = [
    ...new Set(associations.map((lica) => toId(lica.creativeId)).filter((id): id is string => id != null)),
  ];
  if (creativeIds.length === 0) return [];

  const creativeQuery = buildPqlQuery({ where: { id: creativeIds.map(toPqlId) } });
  const creatives = await fetchAllPages((q) => client.getCreatives(q), creativeQuery, pageSize);
  return creatives.map(toCreative);
}

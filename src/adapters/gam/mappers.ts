/**
 * Map GAM SOAP records to inventory entities and back.
 * Fields the entities do not model are kept in `attributes` so updates round-trip.
 */

import { HIERARCHY_ENTITY_TYPES } from "../../core/constants.js";
import type {
  Advertiser,
  Campaign,
  Creative,
  CreativeSize,
  CustomTarget,
  HierarchyRecord,
  LineItem,
} from "../../types/inventory.js";
import type {
  GamAdUnitRecord,
  GamCompanyRecord,
  GamCreativeRecord,
  GamCustomTargetingKeyRecord,
  GamCustomTargetingValueRecord,
  GamLineItemRecord,
  GamOrderRecord,
} from "./types.js";
import { parseGamDateTime } from "./utils/formatters.js";

export const KEY_ID_PREFIX = "key:";
export const VALUE_ID_PREFIX = "value:";

export function toId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "string" && value !== "") return value;
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function toRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return { ...value };
}

function toSize(value: unknown): CreativeSize | null {
  const size = toRecord(value);
  if (!size) return null;
  const { width, height } = size;
  return typeof width === "number" && typeof height === "number" ? { width, height } : null;
}

export function toAdvertiser(record: GamCompanyRecord): Advertiser {
  return {
    id: toId(record.id) ?? "",
    name: toText(record.name) ?? "",
    type: toText(record.type),
  };
}

export function toCampaign(record: GamOrderRecord): Campaign {
  const { id, name, advertiserId, status, startDateTime, endDateTime, ...attributes } = record;
  return {
    id: toId(id) ?? "",
    name: toText(name) ?? "",
    advertiserId: toId(advertiserId),
    status: toText(status),
    start: parseGamDateTime(startDateTime),
    end: parseGamDateTime(endDateTime),
    attributes,
  };
}

export function toLineItem(record: GamLineItemRecord): LineItem {
  const { id, orderId, name, lineItemType, costType, status, startDateTime, endDateTime, targeting, ...attributes } =
    record;
  return {
    id: toId(id),
    campaignId: toId(orderId),
    name: toText(name) ?? "",
    type: toText(lineItemType),
    costType: toText(costType),
    status: toText(status),
    start: parseGamDateTime(startDateTime),
    end: parseGamDateTime(endDateTime),
    targeting: toRecord(targeting),
    attributes,
  };
}

/** Rebuild the GAM payload for a line item; status is read-only in GAM and not sent. */
export function fromLineItem(lineItem: LineItem): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    ...lineItem.attributes,
    name: lineItem.name,
    lineItemType: lineItem.type,
    costType: lineItem.costType,
    startDateTime: lineItem.start,
    endDateTime: lineItem.end,
    targeting: lineItem.targeting,
  };
  if (lineItem.id != null) payload.id = Number(lineItem.id);
  if (lineItem.campaignId != null) payload.orderId = Number(lineItem.campaignId);

  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value != null));
}

export function toCreative(record: GamCreativeRecord): Creative {
  const { id, name, advertiserId, size, previewUrl, ...attributes } = record;
  return {
    id: toId(id) ?? "",
    name: toText(name) ?? "",
    advertiserId: toId(advertiserId),
    size: toSize(size),
    previewUrl: toText(previewUrl),
    attributes,
  };
}

export function toCustomTarget(
  key: GamCustomTargetingKeyRecord,
  value: GamCustomTargetingValueRecord
): CustomTarget {
  return {
    id: toId(value.id) ?? "",
    keyId: toId(value.customTargetingKeyId) ?? toId(key.id) ?? "",
    keyName: toText(key.name) ?? "",
    name: toText(value.name) ?? "",
    displayName: toText(value.displayName),
    status: toText(value.status),
  };
}

export function adUnitToHierarchy(record: GamAdUnitRecord): HierarchyRecord {
  return {
    id: toId(record.id) ?? "",
    parentId: toId(record.parentId),
    entityType: HIERARCHY_ENTITY_TYPES.AD_UNIT,
    name: toText(record.name) ?? "",
    data: { ...record },
  };
}

export function keyToHierarchy(record: GamCustomTargetingKeyRecord): HierarchyRecord {
  return {
    id: `${KEY_ID_PREFIX}${toId(record.id) ?? ""}`,
    parentId: null,
    entityType: HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_KEY,
    name: toText(record.name) ?? "",
    data: { ...record },
  };
}

export function valueToHierarchy(record: GamCustomTargetingValueRecord): HierarchyRecord {
  const keyId = toId(record.customTargetingKeyId);
  return {
    id: `${VALUE_ID_PREFIX}${toId(record.id) ?? ""}`,
    parentId: keyId == null ? null : `${KEY_ID_PREFIX}${keyId}`,
    entityType: HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_VALUE,
    name: toText(record.name) ?? "",
    data: { ...record },
  };
}

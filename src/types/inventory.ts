/**
 * Entities returned by ad-inventory providers, and the shapes the gateway arranges them into.
 * Provider fields not modelled here travel unchanged in `attributes`.
 */

import type { HierarchyEntityType, TargetType } from "../core/constants.js";

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface DateTimeValue {
  date: CalendarDate;
  hour: number;
  minute: number;
  second: number;
  timeZoneId: string;
}

export interface Advertiser {
  id: string;
  name: string;
  type: string | null;
}

export interface Campaign {
  id: string;
  name: string;
  advertiserId: string | null;
  status: string | null;
  start: DateTimeValue | null;
  end: DateTimeValue | null;
  attributes: Record<string, unknown>;
  /** Present only when requested with includeLineItems. */
  lineItems?: LineItem[];
}

export interface LineItem {
  /** Null for a prospective line item that has not been created yet. */
  id: string | null;
  campaignId: string | null;
  name: string;
  type: string | null;
  costType: string | null;
  status: string | null;
  start: DateTimeValue | null;
  end: DateTimeValue | null;
  /** Provider targeting, including inventory targeting; opaque to the gateway. */
  targeting: Record<string, unknown> | null;
  attributes: Record<string, unknown>;
}

export interface CreativeSize {
  width: number;
  height: number;
}

export interface Creative {
  id: string;
  name: string;
  advertiserId: string | null;
  size: CreativeSize | null;
  previewUrl: string | null;
  attributes: Record<string, unknown>;
}

export interface CustomTarget {
  id: string;
  keyId: string;
  keyName: string;
  name: string;
  displayName: string | null;
  status: string | null;
}

export type ReportRow = Record<string, string | number>;

export type FilterValue = string | number | boolean | ReadonlyArray<string | number>;

/** Paging and filtering for list reads. `where` keys go to the provider verbatim. */
export interface QueryOptions {
  order?: string;
  limit?: number;
  offset?: number;
  where?: Record<string, FilterValue>;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

/** A flat listing entry with its declared parent, ids namespaced per entity type. */
export interface HierarchyRecord {
  id: string;
  parentId: string | null;
  entityType: HierarchyEntityType;
  name: string;
  data: Record<string, unknown>;
}

export interface TreeNode {
  id: string;
  parentId: string | null;
  entityType: HierarchyEntityType;
  name: string;
  data: Record<string, unknown>;
  children: TreeNode[];
}

export interface NodeTree {
  targetType: TargetType;
  roots: TreeNode[];
  /** Second-class roots whose declared parent was missing from the listing. */
  orphans: TreeNode[];
  /** Number of nodes reachable from roots and orphans. */
  size: number;
  warnings: string[];
}

/**
 * Mock ad provider: an in-memory network seeded from JSON fixtures.
 * Supports every provider operation, for dry runs and local development.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { HIERARCHY_ENTITY_TYPES, type HierarchyEntityType } from "../../core/constants.js";
import { ConfigurationError, NotFoundError, ValidationError, errorMessage } from "../../core/errors.js";
import type {
  Advertiser,
  Campaign,
  Creative,
  CustomTarget,
  FilterValue,
  HierarchyRecord,
  LineItem,
  PageRequest,
  QueryOptions,
  ReportRow,
} from "../../types/inventory.js";
import { campaignIdOf, lineItemIdOf, type AdProvider } from "../base.js";

export const MockProviderConfigSchema = z
  .object({
    networkTimezone: z.string().min(1).default("America/New_York"),
    fixturesPath: z.string().min(1).optional(),
    /** What every forecast returns; null means "no forecast". */
    forecastAvailableUnits: z.number().int().nonnegative().nullable().default(null),
  })
  .strict();

export type MockProviderConfig = z.infer<typeof MockProviderConfigSchema>;

const DateTimeSchema = z.object({
  date: z.object({ year: z.number(), month: z.number(), day: z.number() }),
  hour: z.number(),
  minute: z.number(),
  second: z.number(),
  timeZoneId: z.string(),
});

const AttributesSchema = z.record(z.string(), z.unknown()).default({});

const AdvertiserSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().nullable().default("ADVERTISER"),
});

const CampaignSchema = z.object({
  id: z.string(),
  name: z.string(),
  advertiserId: z.string().nullable().default(null),
  status: z.string().nullable().default(null),
  start: DateTimeSchema.nullable().default(null),
  end: DateTimeSchema.nullable().default(null),
  attributes: AttributesSchema,
});

const LineItemSchema = z.object({
  id: z.string().nullable(),
  campaignId: z.string().nullable().default(null),
  name: z.string(),
  type: z.string().nullable().default(null),
  costType: z.string().nullable().default(null),
  status: z.string().nullable().default(null),
  start: DateTimeSchema.nullable().default(null),
  end: DateTimeSchema.nullable().default(null),
  targeting: z.record(z.string(), z.unknown()).nullable().default(null),
  attributes: AttributesSchema,
});

const CreativeSchema = z.object({
  id: z.string(),
  name: z.string(),
  advertiserId: z.string().nullable().default(null),
  size: z.object({ width: z.number(), height: z.number() }).nullable().default(null),
  previewUrl: z.string().nullable().default(null),
  attributes: AttributesSchema,
});

const CustomTargetSchema = z.object({
  id: z.string(),
  keyId: z.string(),
  keyName: z.string(),
  name: z.string(),
  displayName: z.string().nullable().default(null),
  status: z.string().nullable().default("ACTIVE"),
});

export const MockFixturesSchema = z
  .object({
    advertisers: z.array(AdvertiserSchema).default([]),
    campaigns: z.array(CampaignSchema).default([]),
    lineItems: z.array(LineItemSchema).default([]),
    creatives: z.array(CreativeSchema).default([]),
    associations: z.array(z.object({ lineItemId: z.string(), creativeId: z.string() })).default([]),
    customTargets: z.array(CustomTargetSchema).default([]),
    adUnits: z
      .array(z.object({ id: z.string(), parentId: z.string().nullable().default(null), name: z.string() }))
      .default([]),
    reportRows: z.array(z.record(z.string(), z.union([z.string(), z.number()]))).default([]),
  })
  .strict();

export type MockFixtures = z.infer<typeof MockFixturesSchema>;

export function loadMockFixtures(path: string): MockFixtures {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Could not read mock fixtures ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = MockFixturesSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid mock fixtures ${path}: ${parsed.error.message}`, { cause: parsed.error });
  }
  return parsed.data;
}

function fieldOf(entity: object, key: string): unknown {
  const entries = new Map<string, unknown>(Object.entries(entity));
  if (entries.has(key)) return entries.get(key);
  const attributes = entries.get("attributes");
  return typeof attributes === "object" && attributes !== null
    ? new Map<string, unknown>(Object.entries(attributes)).get(key)
    : undefined;
}

function matches(actual: unknown, expected: FilterValue): boolean {
  const text = actual == null ? "" : String(actual);
  return typeof expected === "object" ? expected.some((item) => String(item) === text) : String(expected) === text;
}

/** Filter, order and page in memory the way a PQL statement would. */
export function applyQuery<T extends object>(items: readonly T[], options: QueryOptions = {}): T[] {
  let result = items.filter((item) =>
    Object.entries(options.where ?? {}).every(([key, value]) => matches(fieldOf(item, key), value))
  );

  const [field = "id", direction = "ASC"] = (options.order ?? "id ASC").trim().split(/\s+/);
  const sign = direction.toUpperCase() === "DESC" ? -1 : 1;
  result = [...result].sort((a, b) => {
    const left = String(fieldOf(a, field) ?? "");
    const right = String(fieldOf(b, field) ?? "");
    return sign * left.localeCompare(right, "en", { numeric: true });
  });

  const offset = options.offset ?? 0;
  return result.slice(offset, options.limit === undefined ? undefined : offset + options.limit);
}

export class MockAdProvider implements AdProvider {
  readonly config: MockProviderConfig;
  private readonly fixtures: MockFixtures;
  private nextId = 1_000_000;

  constructor(config: MockProviderConfig, fixtures?: MockFixtures) {
    this.config = config;
    this.fixtures = fixtures ?? MockFixturesSchema.parse({});
  }

  toString(): string {
    return `MockAdProvider(timezone=${this.config.networkTimezone})`;
  }

  private allocateId(): string {
    this.nextId += 1;
    return String(this.nextId);
  }

  async getNetworkTimezone(): Promise<string> {
    return this.config.networkTimezone;
  }

  async getAdvertisers(): Promise<Advertiser[]> {
    return this.fixtures.advertisers.map((advertiser) => ({ ...advertiser }));
  }

  async getCampaign(campaignId: string): Promise<Campaign> {
    const campaign = this.fixtures.campaigns.find((candidate) => candidate.id === campaignId);
    if (!campaign) throw new NotFoundError("Campaign", campaignId);
    return { ...campaign };
  }

  async getCampaigns(options: QueryOptions = {}): Promise<Campaign[]> {
    return applyQuery(this.fixtures.campaigns, options).map((campaign) => ({ ...campaign }));
  }

  async getLineItem(lineItemId: string): Promise<LineItem> {
    const lineItem = this.fixtures.lineItems.find((candidate) => candidate.id === lineItemId);
    if (!lineItem) throw new NotFoundError("LineItem", lineItemId);
    return { ...lineItem };
  }

  async getLineItems(options: QueryOptions = {}): Promise<LineItem[]> {
    return applyQuery(this.fixtures.lineItems, options).map((lineItem) => ({ ...lineItem }));
  }

  async getCampaignLineItems(campaign: Campaign | string): Promise<LineItem[]> {
    return this.getLineItems({ where: { campaignId: campaignIdOf(campaign) } });
  }

  async getLineItemAvailableInventory(
    _lineItem: LineItem,
    _useStart: boolean,
    _preserveId: boolean
  ): Promise<number | null> {
    return this.config.forecastAvailableUnits;
  }

  async getCreative(creativeId: string): Promise<Creative> {
    const creative = this.fixtures.creatives.find((candidate) => candidate.id === creativeId);
    if (!creative) throw new NotFoundError("Creative", creativeId);
    return { ...creative };
  }

  async getCreatives(options: QueryOptions = {}): Promise<Creative[]> {
    return applyQuery(this.fixtures.creatives, options).map((creative) => ({ ...creative }));
  }

  async getLineItemCreatives(lineItem: LineItem | string): Promise<Creative[]> {
    const lineItemId = lineItemIdOf(lineItem);
    const creativeIds = new Set(
      this.fixtures.associations
        .filter((association) => association.lineItemId === lineItemId)
        .map((association) => association.creativeId)
    );
    return this.fixtures.creatives
      .filter((creative) => creativeIds.has(creative.id))
      .map((creative) => ({ ...creative }));
  }

  async getLineItemReport(_start: Date, _end: Date, _columns: readonly string[]): Promise<ReportRow[]> {
    return this.fixtures.reportRows.map((row) => ({ ...row }));
  }

  async getCustomTargets(keyName: string, valueName: string): Promise<CustomTarget[]> {
    return this.fixtures.customTargets
      .filter((target) => target.keyName === keyName && target.name === valueName)
      .map((target) => ({ ...target }));
  }

  async updateLineItems(lineItems: LineItem[]): Promise<LineItem[]> {
    // Resolve the whole batch before writing so a bad id leaves nothing applied.
    const indexes = lineItems.map((lineItem) => {
      const id = lineItemIdOf(lineItem);
      const index = this.fixtures.lineItems.findIndex((candidate) => candidate.id === id);
      if (index === -1) throw new NotFoundError("LineItem", id);
      return index;
    });
    return lineItems.map((lineItem, position) => {
      this.fixtures.lineItems[indexes[position]] = { ...lineItem };
      return { ...lineItem };
    });
  }

  async createCustomTarget(key: string, value: string): Promise<CustomTarget[]> {
    const existingKey = this.fixtures.customTargets.find((target) => target.keyName === key);
    const target: CustomTarget = {
      id: this.allocateId(),
      keyId: existingKey?.keyId ?? this.allocateId(),
      keyName: key,
      name: value,
      displayName: value,
      status: "ACTIVE",
    };
    this.fixtures.customTargets.push(target);
    return [{ ...target }];
  }

  async getHierarchyPage(entityType: HierarchyEntityType, page: PageRequest): Promise<HierarchyRecord[]> {
    const window = <T>(items: readonly T[]) => items.slice(page.offset, page.offset + page.limit);

    switch (entityType) {
      case HIERARCHY_ENTITY_TYPES.AD_UNIT:
        return window(this.fixtures.adUnits).map((adUnit) => ({
          id: adUnit.id,
          parentId: adUnit.parentId,
          entityType,
          name: adUnit.name,
          data: { ...adUnit },
        }));
      case HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_KEY: {
        const keys = new Map<string, string>();
        for (const target of this.fixtures.customTargets) keys.set(target.keyId, target.keyName);
        return window([...keys]).map(([keyId, keyName]) => ({
          id: `key:${keyId}`,
          parentId: null,
          entityType,
          name: keyName,
          data: { id: keyId, name: keyName },
        }));
      }
      case HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_VALUE:
        return window(this.fixtures.customTargets).map((target) => ({
          id: `value:${target.id}`,
          parentId: `key:${target.keyId}`,
          entityType,
          name: target.name,
          data: { ...target },
        }));
      default:
        throw new ValidationError(`Unsupported hierarchy entity type: ${String(entityType)}`);
    }
  }
}

/** Build a mock provider, loading fixtures from `fixturesPath` when set. */
export function createMockProvider(config: MockProviderConfig): MockAdProvider {
  const fixtures = config.fixturesPath ? loadMockFixtures(config.fixturesPath) : undefined;
  return new MockAdProvider(config, fixtures);
}

/**
 * Inventory gateway: the one entry point callers use to talk to an ad-inventory provider.
 *
 * Every provider call runs under a deadline and is logged and counted. Single line
 * item reads are retried on transient failures; everything else fails on the first
 * error. Writes are never retried.
 */

import type { AdProvider } from "../adapters/base.js";
import { createDefaultRegistry } from "../adapters/registryBootstrap.js";
import {
  DEFAULT_NETWORK_TIMEOUT_MS,
  MAX_REQUEST_ATTEMPTS,
  MAX_TIMER_DELAY_MS,
  REPORT_METRICS,
  type ProviderId,
  type TargetType,
} from "../core/constants.js";
import { AmbiguousTargetError, ConfigurationError, TimeoutError, errorMessage } from "../core/errors.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { gatewayRequestCounter, gatewayRequestDuration } from "../core/metrics.js";
import type { ProviderRegistry } from "../core/providerRegistry.js";
import { executeWithRetry } from "../core/retry.js";
import { createGuard, type Guard } from "../core/timeout.js";
import { TreeBuilder } from "../core/treeBuilder.js";
import type {
  Advertiser,
  Campaign,
  Creative,
  CustomTarget,
  LineItem,
  NodeTree,
  QueryOptions,
  ReportRow,
} from "../types/inventory.js";

export interface InventoryGatewayOptions {
  provider: string;
  /** A pre-built provider config; wins over `params`. */
  config?: unknown;
  /** Raw provider params, validated by the provider's config schema. */
  params?: Record<string, unknown>;
  registry?: ProviderRegistry;
  networkTimeoutMs?: number;
  maxRequestAttempts?: number;
  logger?: Logger;
}

interface GatewayParts {
  providerId: ProviderId;
  provider: AdProvider;
  guard: Guard;
  maxRequestAttempts: number;
  log: Logger;
}

function requirePositiveInteger(name: string, value: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  if (value > max) {
    throw new ConfigurationError(`${name} must be at most ${max}, got ${value}`);
  }
  return value;
}

export class InventoryGateway {
  readonly providerId: ProviderId;
  private readonly provider: AdProvider;
  private readonly guard: Guard;
  private readonly treeBuilder: TreeBuilder;
  private readonly maxRequestAttempts: number;
  private readonly log: Logger;

  private constructor(parts: GatewayParts) {
    this.providerId = parts.providerId;
    this.provider = parts.provider;
    this.guard = parts.guard;
    this.maxRequestAttempts = parts.maxRequestAttempts;
    this.log = parts.log;
    this.treeBuilder = new TreeBuilder(parts.providerId, parts.provider, {
      guard: parts.guard,
      logger: parts.log,
    });
  }

  /**
   * Build a gateway for `options.provider` and check that it can reach the network.
   * Resolves only once the liveness check has passed; throws ConfigurationError otherwise.
   */
  static async create(options: InventoryGatewayOptions): Promise<InventoryGateway> {
    const registry = options.registry ?? createDefaultRegistry();
    const registration = registry.resolve(options.provider);
    const timeoutMs = requirePositiveInteger(
      "networkTimeoutMs",
      options.networkTimeoutMs ?? DEFAULT_NETWORK_TIMEOUT_MS,
      MAX_TIMER_DELAY_MS
    );
    const maxRequestAttempts = requirePositiveInteger(
      "maxRequestAttempts",
      options.maxRequestAttempts ?? MAX_REQUEST_ATTEMPTS
    );
    const log = (options.logger ?? createChildLogger("inventoryGateway")).child({ provider: registration.id });

    const provider = registration.instantiate(options.config ?? options.params ?? {});
    const gateway = new InventoryGateway({
      providerId: registration.id,
      provider,
      guard: createGuard(timeoutMs),
      maxRequestAttempts,
      log,
    });

    try {
      const timeZone = await gateway.getNetworkTimezone();
      log.info({ timeZone, timeoutMs }, "Provider liveness check passed");
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Provider liveness check failed");
      throw new ConfigurationError(`Provider not configured correctly: ${errorMessage(err)}`, { cause: err });
    }
    return gateway;
  }

  toString(): string {
    return `InventoryGateway(provider=${this.providerId})`;
  }

  /** One guarded provider call, with its outcome logged and counted. */
  private async call<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const endTimer = gatewayRequestDuration.startTimer({ operation });
    try {
      const result = await this.guard(operation, work);
      gatewayRequestCounter.inc({ operation, status: "success" });
      return result;
    } catch (err) {
      if (err instanceof TimeoutError) {
        gatewayRequestCounter.inc({ operation, status: "timeout" });
        this.log.warn({ operation, timeoutMs: err.timeoutMs }, "Abandoned provider call after timeout");
      } else {
        gatewayRequestCounter.inc({ operation, status: "error" });
        this.log.debug({ operation, err: errorMessage(err) }, "Provider call failed");
      }
      throw err;
    } finally {
      endTimer();
    }
  }

  getNetworkTimezone(): Promise<string> {
    return this.call("getNetworkTimezone", () => this.provider.getNetworkTimezone());
  }

  getAdvertisers(): Promise<Advertiser[]> {
    return this.call("getAdvertisers", () => this.provider.getAdvertisers());
  }

  async getCampaign(campaignId: string, includeLineItems = false): Promise<Campaign> {
    const campaign = await this.call("getCampaign", () => this.provider.getCampaign(campaignId));
    if (!includeLineItems) return campaign;

    const lineItems = await this.call("getCampaignLineItems", () => this.provider.getCampaignLineItems(campaign));
    return { ...campaign, lineItems };
  }

  getCampaigns(options: QueryOptions = {}): Promise<Campaign[]> {
    return this.call("getCampaigns", () => this.provider.getCampaigns(options));
  }

  getLineItem(lineItemId: string): Promise<LineItem> {
    return executeWithRetry(() => this.call("getLineItem", () => this.provider.getLineItem(lineItemId)), {
      operation: "getLineItem",
      entityId: lineItemId,
      maxAttempts: this.maxRequestAttempts,
      logger: this.log,
    });
  }

  getLineItems(options: QueryOptions = {}): Promise<LineItem[]> {
    return this.call("getLineItems", () => this.provider.getLineItems(options));
  }

  getCampaignLineItems(campaign: Campaign | string): Promise<LineItem[]> {
    return this.call("getCampaignLineItems", () => this.provider.getCampaignLineItems(campaign));
  }

  /**
   * Forecast available impressions for a line item, or null when the provider has none.
   * Preserving the id means forecasting an existing item, which always uses its own start.
   */
  getLineItemAvailableInventory(
    lineItem: LineItem,
    useStart = false,
    preserveId = false
  ): Promise<number | null> {
    const effectiveUseStart = useStart || preserveId;
    return this.call("getLineItemAvailableInventory", () =>
      this.provider.getLineItemAvailableInventory(lineItem, effectiveUseStart, preserveId)
    );
  }

  getCreative(creativeId: string): Promise<Creative> {
    return this.call("getCreative", () => this.provider.getCreative(creativeId));
  }

  getCreatives(options: QueryOptions = {}): Promise<Creative[]> {
    return this.call("getCreatives", () => this.provider.getCreatives(options));
  }

  getLineItemCreatives(lineItem: LineItem | string): Promise<Creative[]> {
    return this.call("getLineItemCreatives", () => this.provider.getLineItemCreatives(lineItem));
  }

  /** Delivery rows per line item; the provider truncates both ends to whole days. */
  getLineItemReport(
    start: Date,
    end: Date,
    columns: readonly string[] = [REPORT_METRICS.AD_IMPRESSIONS]
  ): Promise<ReportRow[]> {
    return this.call("getLineItemReport", () => this.provider.getLineItemReport(start, end, columns));
  }

  async getCustomTargetByName(name: string, parentName: string): Promise<CustomTarget | null> {
    const matches = await this.call("getCustomTargets", () => this.provider.getCustomTargets(parentName, name));
    if (matches.length > 1) {
      throw new AmbiguousTargetError(parentName, name, matches.length);
    }
    return matches[0] ?? null;
  }

  updateLineItem(lineItem: LineItem): Promise<LineItem[]> {
    return this.updateLineItems([lineItem]);
  }

  updateLineItems(lineItems: LineItem[]): Promise<LineItem[]> {
    return this.call("updateLineItems", () => this.provider.updateLineItems(lineItems));
  }

  createCustomTarget(key: string, value: string): Promise<CustomTarget[]> {
    return this.call("createCustomTarget", () => this.provider.createCustomTarget(key, value));
  }

  constructTree(targetType: TargetType): Promise<NodeTree> {
    return this.treeBuilder.constructTree(targetType);
  }
}

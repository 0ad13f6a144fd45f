/**
 * Provider registry: an explicit, immutable map of provider id → (config schema, factory).
 * Built once at startup (see adapters/registryBootstrap.ts) and handed to whatever
 * constructs gateways. The set of providers is fixed when the registry is built.
 */

import type { z } from "zod";
import type { AdProvider } from "../adapters/base.js";
import type { ProviderId } from "./constants.js";
import { ConfigurationError, ProviderNotRegisteredError, errorMessage } from "./errors.js";

export interface ProviderRegistration {
  readonly id: ProviderId;
  /**
   * Validate a pre-built config or raw params against the provider's config type,
   * then construct a client bound to it. Throws ConfigurationError on bad input.
   */
  instantiate(configInput: unknown): AdProvider;
}

export interface ProviderRegistry {
  resolve(id: string): ProviderRegistration;
  ids(): ProviderId[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Bind a provider id to its typed config schema and typed factory. */
export function defineProvider<C>(
  id: ProviderId,
  configSchema: z.ZodType<C, z.ZodTypeDef, unknown>,
  createProvider: (config: C) => AdProvider
): ProviderRegistration {
  return {
    id,
    instantiate(configInput: unknown): AdProvider {
      const parsed = configSchema.safeParse(configInput);
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid ${id} configuration: ${formatIssues(parsed.error)}`, {
          cause: parsed.error,
        });
      }
      try {
        return createProvider(parsed.data);
      } catch (err) {
        if (err instanceof ConfigurationError) throw err;
        throw new ConfigurationError(`Could not construct ${id} provider: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}

export function createProviderRegistry(registrations: readonly ProviderRegistration[]): ProviderRegistry {
  const byId = new Map<string, ProviderRegistration>();
  for (const registration of registrations) {
    if (byId.has(registration.id)) {
      throw new ConfigurationError(`Provider registered twice: ${registration.id}`);
    }
    byId.set(registration.id, registration);
  }

  return Object.freeze({
    resolve(id: string): ProviderRegistration {
      const registration = byId.get(id);
      if (!registration) {
        throw new ProviderNotRegisteredError(id);
      }
      return registration;
    },
    ids(): ProviderId[] {
      return Array.from(byId.values(), (registration) => registration.id);
    },
  });
}

/**
 * GAM credentials from config.
 * Supports service account (JSON string) and OAuth (client id/secret + refresh token).
 */

import {
  GoogleRefreshTokenCredential,
  GoogleSACredential,
  type SACredential,
} from "@guardian/google-admanager-api";
import { z } from "zod";
import { ConfigurationError } from "../../core/errors.js";
import type { GamConfig } from "./types.js";

const ServiceAccountSchema = z.record(z.string(), z.unknown());

/** Build GAM credential from config. OAuth takes precedence over a service account. */
export function buildGamCredential(config: GamConfig): SACredential {
  const { refreshToken, oauthClientId, oauthClientSecret, serviceAccountJson } = config;

  if (refreshToken) {
    if (!oauthClientId || !oauthClientSecret) {
      throw new ConfigurationError(
        "GAM OAuth requires oauthClientId and oauthClientSecret when using refreshToken"
      );
    }
    return new GoogleRefreshTokenCredential(oauthClientId, oauthClientSecret, refreshToken);
  }

  if (serviceAccountJson) {
    let json: unknown;
    try {
      json = JSON.parse(serviceAccountJson);
    } catch (err) {
      throw new ConfigurationError("GAM serviceAccountJson is not valid JSON", { cause: err });
    }
    const parsed = ServiceAccountSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError("GAM serviceAccountJson must be a JSON object");
    }
    return new GoogleSACredential(parsed.data);
  }

  throw new ConfigurationError("GAM config requires either refreshToken or serviceAccountJson");
}

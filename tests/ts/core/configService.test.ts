import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { createGatewayFromEnv, loadGatewaySettings } from "../../../src/core/config/configService.js";
import { ConfigurationError, ProviderNotRegisteredError } from "../../../src/core/errors.js";

const FIXTURES_PATH = fileURLToPath(new URL("../fixtures/mockNetwork.json", import.meta.url));

describe("loadGatewaySettings", () => {
  it("reads mock params", () => {
    expect(
      loadGatewaySettings({ GATEWAY_PROVIDER: "mock", MOCK_NETWORK_TIMEZONE: "Europe/London" })
    ).toEqual({ provider: "mock", params: { networkTimezone: "Europe/London" } });
  });

  it("reads GAM params and skips blank values", () => {
    const settings = loadGatewaySettings({
      GATEWAY_PROVIDER: "google_ad_manager_premium",
      GATEWAY_NETWORK_TIMEOUT_MS: "30000",
      GAM_NETWORK_CODE: "12345678",
      GAM_REFRESH_TOKEN: "test-refresh-token",
      GAM_OAUTH_CLIENT_ID: "test-client-id",
      GAM_OAUTH_CLIENT_SECRET: "test-secret",
      GAM_APPLICATION_NAME: "  ",
      MOCK_NETWORK_TIMEZONE: "Europe/London",
    });
    expect(settings).toEqual({
      provider: "google_ad_manager_premium",
      networkTimeoutMs: 30000,
      params: {
        networkCode: "12345678",
        refreshToken: "test-refresh-token",
        oauthClientId: "test-client-id",
        oauthClientSecret: "test-secret",
      },
    });
  });

  it("requires GATEWAY_PROVIDER", () => {
    expect(() => loadGatewaySettings({})).toThrow(ConfigurationError);
    expect(() => loadGatewaySettings({})).toThrow("GATEWAY_PROVIDER is not set");
  });

  it("rejects unknown providers", () => {
    expect(() => loadGatewaySettings({ GATEWAY_PROVIDER: "openx" })).toThrow(ProviderNotRegisteredError);
  });

  it("rejects a malformed timeout", () => {
    expect(() => loadGatewaySettings({ GATEWAY_PROVIDER: "mock", GATEWAY_NETWORK_TIMEOUT_MS: "soon" })).toThrow(
      'GATEWAY_NETWORK_TIMEOUT_MS must be a positive integer up to 2147483647, got "soon"'
    );
    expect(() => loadGatewaySettings({ GATEWAY_PROVIDER: "mock", GATEWAY_NETWORK_TIMEOUT_MS: "-5" })).toThrow(
      ConfigurationError
    );
  });

  it("rejects a timeout too long for a Node timer", () => {
    expect(loadGatewaySettings({ GATEWAY_PROVIDER: "mock", GATEWAY_NETWORK_TIMEOUT_MS: "2147483647" })).toMatchObject({
      networkTimeoutMs: 2_147_483_647,
    });
    expect(() => loadGatewaySettings({ GATEWAY_PROVIDER: "mock", GATEWAY_NETWORK_TIMEOUT_MS: "2592000000" })).toThrow(
      'GATEWAY_NETWORK_TIMEOUT_MS must be a positive integer up to 2147483647, got "2592000000"'
    );
  });
});

describe("createGatewayFromEnv", () => {
  it("builds a live mock gateway", async () => {
    const gateway = await createGatewayFromEnv({
      GATEWAY_PROVIDER: "mock",
      MOCK_FIXTURES_PATH: FIXTURES_PATH,
      GATEWAY_NETWORK_TIMEOUT_MS: "5000",
    });
    expect(gateway.toString()).toBe("InventoryGateway(provider=mock)");
    expect((await gateway.getAdvertisers()).map((advertiser) => advertiser.name)).toEqual([
      "Acme Outdoors",
      "Birch Books",
    ]);
  });

  it("fails with ConfigurationError when GAM params are incomplete", async () => {
    await expect(
      createGatewayFromEnv({ GATEWAY_PROVIDER: "google_ad_manager_premium", GAM_NETWORK_CODE: "12345678" })
    ).rejects.toThrow(/requires either refreshToken or serviceAccountJson/);
  });
});

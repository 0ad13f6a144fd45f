export { GoogleAdManager } from "./GoogleAdManager.js";
export { createGamClient, type GamClientWrapper } from "./client.js";
export { buildGamCredential } from "./auth.js";
export { buildPqlQuery, toPqlId, whereEquals } from "./pql.js";
export { isTransientFailure, toProviderError } from "./errors.js";
export { parseReportCsv } from "./managers/index.js";
export { GamConfigSchema } from "./types.js";
export type { GamConfig, GamTier, PqlQuery } from "./types.js";

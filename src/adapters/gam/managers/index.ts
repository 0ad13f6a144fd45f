export {
  getAdvertisers,
  getCampaign,
  getCampaigns,
  getLineItem,
  getLineItems,
  getCampaignLineItems,
  updateLineItems,
} from "./delivery.js";
export { getCreative, getCreatives, getLineItemCreatives } from "./creatives.js";
export { getAvailableInventory } from "./forecasting.js";
export { getLineItemReport, parseReportCsv } from "./reporting.js";
export { getCustomTargets, createCustomTarget } from "./targeting.js";
export { getHierarchyPage } from "./inventory.js";

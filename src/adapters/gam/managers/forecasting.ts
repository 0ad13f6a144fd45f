/**
 * Availability forecasting through ForecastService.
 */

import { errorMessage } from "../../../core/errors.js";
import type { LineItem } from "../../../types/inventory.js";
import type { GamClientWrapper } from "../client.js";
import { fromLineItem } from "../mappers.js";
import type { GamForecastRecord } from "../types.js";
import { NO_FORECAST_FAULT, START_DATE_TIME_TYPES } from "../utils/constants.js";

/**
 * Impressions available for a prospective line item.
 * `useStart` false forecasts from now; `preserveId` sends the line item id so an
 * in-flight line item does not compete with itself for inventory.
 * Returns null when GAM has no forecast for it yet.
 */
export async function getAvailableInventory(
  client: GamClientWrapper,
  lineItem: LineItem,
  useStart: boolean,
  preserveId: boolean
): Promise<number | null> {
  const { id, ...payload } = fromLineItem(lineItem);
  const prospective = {
    lineItem: {
      ...payload,
      ...(preserveId && id !== undefined && { id }),
      startDateTimeType: useStart ? START_DATE_TIME_TYPES.USE_START_DATE_TIME : START_DATE_TIME_TYPES.IMMEDIATELY,
    },
  };

  let forecast: GamForecastRecord;
  try {
    forecast = await client.getAvailabilityForecast(prospective, {
      includeTargetingCriteriaBreakdown: false,
      includeContendingLineItems: false,
    });
  } catch (err) {
    if (errorMessage(err).includes(NO_FORECAST_FAULT)) return null;
    throw err;
  }

  const units = forecast.availableUnits;
  return typeof units === "number" && Number.isFinite(units) ? units : null;
}

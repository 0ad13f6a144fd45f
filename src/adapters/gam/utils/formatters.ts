/**
 * Format helpers for GAM dates: calendar days in the network zone and SOAP DateTime parsing.
 */

import { z } from "zod";
import type { CalendarDate, DateTimeValue } from "../../../types/inventory.js";

const GamDateTimeSchema = z.object({
  date: z.object({ year: z.number(), month: z.number(), day: z.number() }),
  hour: z.number().default(0),
  minute: z.number().default(0),
  second: z.number().default(0),
  timeZoneId: z.string().default(""),
});

/** Parse a GAM DateTime; anything that is not one yields null. */
export function parseGamDateTime(value: unknown): DateTimeValue | null {
  const parsed = GamDateTimeSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** The calendar day an instant falls on in `timeZone`. */
export function toCalendarDate(instant: Date, timeZone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(instant);
  const part = (type: "year" | "month" | "day") =>
    Number(parts.find((candidate) => candidate.type === type)?.value);
  return { year: part("year"), month: part("month"), day: part("day") };
}

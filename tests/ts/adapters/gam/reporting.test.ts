import { describe, expect, it } from "vitest";
import { parseReportCsv } from "../../../../src/adapters/gam/managers/reporting.js";
import { toCalendarDate } from "../../../../src/adapters/gam/utils/formatters.js";

describe("parseReportCsv", () => {
  it("strips header prefixes and converts columns to numbers", () => {
    const csv = [
      "Dimension.LINE_ITEM_ID,Dimension.LINE_ITEM_NAME,Column.AD_SERVER_IMPRESSIONS,Column.AD_SERVER_CTR",
      '300,"Homepage, above the fold",1200,0.0125',
      '301,"The ""big"" banner",0,',
    ].join("\r\n");

    expect(parseReportCsv(csv)).toEqual([
      {
        LINE_ITEM_ID: "300",
        LINE_ITEM_NAME: "Homepage, above the fold",
        AD_SERVER_IMPRESSIONS: 1200,
        AD_SERVER_CTR: 0.0125,
      },
      { LINE_ITEM_ID: "301", LINE_ITEM_NAME: 'The "big" banner', AD_SERVER_IMPRESSIONS: 0, AD_SERVER_CTR: "" },
    ]);
  });

  it("keeps line breaks inside quoted fields", () => {
    const csv = 'Dimension.LINE_ITEM_ID,Dimension.LINE_ITEM_NAME,Column.AD_SERVER_IMPRESSIONS\r\n300,"Homepage\r\nabove the fold",1200\n301,Sidebar,40\n';

    expect(parseReportCsv(csv)).toEqual([
      { LINE_ITEM_ID: "300", LINE_ITEM_NAME: "Homepage\r\nabove the fold", AD_SERVER_IMPRESSIONS: 1200 },
      { LINE_ITEM_ID: "301", LINE_ITEM_NAME: "Sidebar", AD_SERVER_IMPRESSIONS: 40 },
    ]);
  });

  it("returns no rows for an empty report", () => {
    expect(parseReportCsv("")).toEqual([]);
    expect(parseReportCsv("Dimension.LINE_ITEM_ID,Column.AD_SERVER_IMPRESSIONS\n")).toEqual([]);
  });
});

describe("toCalendarDate", () => {
  it("uses the day in the network zone", () => {
    const instant = new Date("2024-03-10T03:00:00Z");
    expect(toCalendarDate(instant, "America/New_York")).toEqual({ year: 2024, month: 3, day: 9 });
    expect(toCalendarDate(instant, "Europe/Berlin")).toEqual({ year: 2024, month: 3, day: 10 });
  });
});

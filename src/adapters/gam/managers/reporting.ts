/**
 * Delivery reporting: run a line item report job, wait for it, download and parse the CSV.
 */

import { AdapterError } from "../../../core/errors.js";
import type { ReportRow } from "../../../types/inventory.js";
import type { GamClientWrapper } from "../client.js";
import { toId } from "../mappers.js";
import { ADAPTER_TYPE, REPORT_JOB_STATUS } from "../utils/constants.js";
import { toCalendarDate } from "../utils/formatters.js";

const COLUMN_PREFIX = "Column.";
const DIMENSION_PREFIX = "Dimension.";

export interface ReportOptions {
  /** Network zone the date range is expressed in. */
  timeZone: string;
  pollIntervalMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Split CSV text into records of fields. Quoted fields may hold commas, quotes and line breaks. */
function splitCsvRecords(csv: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = "";
  let quoted = false;

  const endRecord = () => {
    fields.push(current);
    if (fields.length > 1 || fields[0].trim() !== "") records.push(fields);
    fields = [];
    current = "";
  };

  for (let i = 0; i < csv.length; i++) {
    const char = csv[i];
    if (quoted) {
      if (char === '"' && csv[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(current);
      current = "";
    } else if (char === "\n") {
      endRecord();
    } else if (char === "\r") {
      if (csv[i + 1] === "\n") i++;
      endRecord();
    } else {
      current += char;
    }
  }
  endRecord();
  return records;
}

/**
 * Parse a CSV_DUMP report. Header prefixes are dropped; Column.* values become numbers.
 */
export function parseReportCsv(csv: string): ReportRow[] {
  const records = splitCsvRecords(csv);
  if (records.length === 0) return [];

  const [headers, ...rows] = records;
  return rows.map((fields) => {
    const row: ReportRow = {};
    headers.forEach((header, index) => {
      const raw = fields[index] ?? "";
      if (header.startsWith(COLUMN_PREFIX)) {
        const value = Number(raw);
        row[header.slice(COLUMN_PREFIX.length)] = raw !== "" && Number.isFinite(value) ? value : raw;
      } else {
        const name = header.startsWith(DIMENSION_PREFIX) ? header.slice(DIMENSION_PREFIX.length) : header;
        row[name] = raw;
      }
    });
    return row;
  });
}

/**
 * Line item delivery between two instants. GAM only takes whole calendar days, so both
 * ends are reduced to their day in the network zone: start == end reports that full day.
 */
export async function getLineItemReport(
  client: GamClientWrapper,
  start: Date,
  end: Date,
  columns: readonly string[],
  options: ReportOptions
): Promise<ReportRow[]> {
  const sleep = options.sleep ?? delay;
  const reportJob = {
    reportQuery: {
      dimensions: ["LINE_ITEM_ID"],
      columns: [...columns],
      dateRangeType: "CUSTOM_DATE",
      startDate: toCalendarDate(start, options.timeZone),
      endDate: toCalendarDate(end, options.timeZone),
    },
  };

  const createdJob = await client.runReportJob(reportJob);
  const jobIdText = toId(createdJob.id);
  if (jobIdText == null) {
    throw new AdapterError("Report job was not created", ADAPTER_TYPE);
  }
  const reportJobId = Number(jobIdText);

  let status: string = await client.getReportJobStatus(reportJobId);
  while (status === REPORT_JOB_STATUS.IN_PROGRESS || status === REPORT_JOB_STATUS.STARTING) {
    await sleep(options.pollIntervalMs);
    status = await client.getReportJobStatus(reportJobId);
  }

  if (status !== REPORT_JOB_STATUS.COMPLETED) {
    throw new AdapterError(`Report job ${reportJobId} ended with status ${status}`, ADAPTER_TYPE);
  }

  return parseReportCsv(await client.downloadReportCsv(reportJobId));
}

/**
 * CSV serialization of RateRecords for table uploads.
 */

import { formatRate } from "../normalize";
import type { RateRecord } from "../types";

export const CSV_COLUMNS = ["date", "base_currency", "quote_currency", "rate", "inverse_rate", "source"] as const;

export function inverseRate(rate: string): string {
  return formatRate(1 / Number(rate));
}

function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Header line plus one line per record, each terminated by "\n". */
export function toCsv(records: RateRecord[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const r of records) {
    const fields = [r.date, r.base_currency, r.quote_currency, r.rate, inverseRate(r.rate), r.source];
    lines.push(fields.map(escapeCsv).join(","));
  }
  return lines.join("\n") + "\n";
}

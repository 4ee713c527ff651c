/**
 * Normalizer: turns provider payloads into canonical RateRecords.
 *
 * Bad entries never abort a batch. Each one becomes a NormalizationWarning,
 * is logged, and is left out of the records.
 */

import { isIsoDate } from "./dateUtils";
import { log } from "./logger";
import type { NormalizationWarning, NormalizeResult, RateRecord } from "./types";

export const RATE_DECIMALS = 9;

const CURRENCY_RE = /^[A-Z]{3}$/;
const PLAIN_RATE_RE = /^\d+\.\d+$/;
const PAIR_KEY_RE = /^([A-Z]{3})_([A-Z]{3})$/;

// ---------------------------------------------------------------------------
// Record factory
// ---------------------------------------------------------------------------

export function formatRate(value: number): string {
  return value.toFixed(RATE_DECIMALS);
}

/** A provider rate as a number, or undefined unless it is finite and > 0. */
export function parseRate(value: unknown): number | undefined {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n) || n <= 0) {
    return undefined;
  }
  return n;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function emptyResult(): NormalizeResult {
  return { records: [], warnings: [] };
}

export function addWarning(result: NormalizeResult, warning: NormalizationWarning): void {
  result.warnings.push(warning);
  log({ domain: "normalize", action: "warning", ...warning });
}

export interface RawRate {
  date: unknown;
  base: unknown;
  quote: unknown;
  rate: unknown;
  /** Store 1 / rate instead of rate (provider quotes the pair the other way round). */
  invert?: boolean;
}

/** True when both the formatted rate and its inverse are plain non-zero decimals. */
function isStorableRate(formatted: string): boolean {
  if (!PLAIN_RATE_RE.test(formatted) || Number(formatted) === 0) return false;
  const inverse = formatRate(1 / Number(formatted));
  return PLAIN_RATE_RE.test(inverse) && Number(inverse) !== 0;
}

function describeRate(value: unknown): string {
  return value === undefined || value === null ? "missing rate" : `invalid rate ${JSON.stringify(value)}`;
}

/**
 * Validate one raw entry and append either a record or a warning.
 * `entry` identifies the entry in warnings (currency code, pair key, ...).
 */
export function addRate(result: NormalizeResult, source: string, entry: string, raw: RawRate): void {
  const { date, base, quote } = raw;
  if (typeof date !== "string" || !isIsoDate(date)) {
    const reason = date === undefined || date === null ? "missing date" : `invalid date ${JSON.stringify(date)}`;
    addWarning(result, { source, entry, reason });
    return;
  }
  if (typeof base !== "string" || !CURRENCY_RE.test(base)) {
    addWarning(result, { source, entry, reason: `invalid base currency ${JSON.stringify(base)}` });
    return;
  }
  if (typeof quote !== "string" || !CURRENCY_RE.test(quote)) {
    addWarning(result, { source, entry, reason: `invalid quote currency ${JSON.stringify(quote)}` });
    return;
  }
  const rate = parseRate(raw.rate);
  if (rate === undefined) {
    addWarning(result, { source, entry, reason: describeRate(raw.rate) });
    return;
  }
  const formatted = formatRate(raw.invert ? 1 / rate : rate);
  if (!isStorableRate(formatted)) {
    addWarning(result, { source, entry, reason: `rate ${JSON.stringify(raw.rate)} out of range` });
    return;
  }
  result.records.push({
    date,
    base_currency: base,
    quote_currency: quote,
    rate: formatted,
    source,
  });
}

export function mergeResults(results: NormalizeResult[]): NormalizeResult {
  return {
    records: results.flatMap((r) => r.records),
    warnings: results.flatMap((r) => r.warnings),
  };
}

// ---------------------------------------------------------------------------
// Payload shapes
// ---------------------------------------------------------------------------

/**
 * Pair-keyed payload: {"USD_EUR": 0.92, "date": "2024-01-01"}.
 * Every key other than `date` must be BASE_QUOTE.
 */
export function normalizePairPayload(payload: unknown, source: string): NormalizeResult {
  const result = emptyResult();
  if (!isPlainObject(payload)) {
    addWarning(result, { source, entry: "payload", reason: "payload is not a JSON object" });
    return result;
  }

  for (const [key, value] of Object.entries(payload)) {
    if (key === "date") continue;
    const match = PAIR_KEY_RE.exec(key);
    if (!match) {
      addWarning(result, { source, entry: key, reason: "key is not a BASE_QUOTE currency pair" });
      continue;
    }
    addRate(result, source, key, { date: payload.date, base: match[1], quote: match[2], rate: value });
  }
  return result;
}

/**
 * Rates quoted as "units of currency per 1 base" keyed by currency code.
 * One record per requested currency; absent or zero rates are warned.
 */
export function normalizeConversionRates(
  date: string,
  base: string,
  rates: Record<string, unknown>,
  currencies: string[],
  source: string,
): NormalizeResult {
  const result = emptyResult();
  for (const currency of currencies) {
    addRate(result, source, currency, { date, base, quote: currency, rate: rates[currency] });
  }
  return result;
}

// ---------------------------------------------------------------------------
// Batch invariants
// ---------------------------------------------------------------------------

export function recordKey(record: RateRecord): string {
  return `${record.date}|${record.base_currency}|${record.quote_currency}|${record.source}`;
}

/** Keep the first record per (date, base, quote, source); return the keys dropped. */
export function dedupeRecords(records: RateRecord[]): { records: RateRecord[]; duplicates: string[] } {
  const seen = new Set<string>();
  const unique: RateRecord[] = [];
  const duplicates: string[] = [];
  for (const record of records) {
    const key = recordKey(record);
    if (seen.has(key)) {
      duplicates.push(key);
      continue;
    }
    seen.add(key);
    unique.push(record);
  }
  return { records: unique, duplicates };
}

// ---------------------------------------------------------------------------
// Weekend interpolation
// ---------------------------------------------------------------------------

const pairOf = (r: RateRecord): string => `${r.base_currency}/${r.quote_currency}`;

/**
 * Derive Saturday and Sunday rows from Friday and Monday rates.
 *
 * Saturday = 2/3 Friday + 1/3 Monday, Sunday = 1/3 Friday + 2/3 Monday.
 * Rows carry the source `<friday source>:interpolated`. Pairs present on
 * only one side are warned and skipped.
 */
export function interpolateWeekend(
  friday: RateRecord[],
  monday: RateRecord[],
  days: { saturday: string; sunday: string },
): NormalizeResult {
  const result = emptyResult();
  const mondayByPair = new Map(monday.map((r) => [pairOf(r), r]));
  const fridayPairs = new Set(friday.map(pairOf));

  const saturdayRows: RateRecord[] = [];
  const sundayRows: RateRecord[] = [];
  for (const fri of friday) {
    const pair = pairOf(fri);
    const mon = mondayByPair.get(pair);
    if (!mon) {
      addWarning(result, { source: fri.source, entry: pair, reason: "missing Monday rate" });
      continue;
    }
    const friRate = Number(fri.rate);
    const monRate = Number(mon.rate);
    const source = `${fri.source}:interpolated`;
    saturdayRows.push({
      ...fri,
      date: days.saturday,
      rate: formatRate((2 / 3) * friRate + (1 / 3) * monRate),
      source,
    });
    sundayRows.push({
      ...fri,
      date: days.sunday,
      rate: formatRate((1 / 3) * friRate + (2 / 3) * monRate),
      source,
    });
  }
  for (const mon of monday) {
    if (!fridayPairs.has(pairOf(mon))) {
      addWarning(result, { source: mon.source, entry: pairOf(mon), reason: "missing Friday rate" });
    }
  }

  result.records.push(...saturdayRows, ...sundayRows);
  return result;
}

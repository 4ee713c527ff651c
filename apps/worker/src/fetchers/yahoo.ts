/**
 * Fetch daily close series from the Yahoo Finance chart API.
 *
 * For quote currency CCY and base BASE the symbol BASECCY=X quotes
 * "CCY per 1 BASE" (canonical orientation). When Yahoo has no data for it,
 * the inverse symbol CCYBASE=X is tried and its closes are inverted.
 * The base currency itself gets an identity record for every day.
 *
 * Bar timestamps mark the exchange's local midnight, so dates are taken
 * after shifting by meta.gmtoffset.
 */

import { z } from "zod";
import { YAHOO_CHART_URL } from "../config";
import { ProviderError } from "../errors";
import { addDays, eachDay, fromUnixSeconds, sleep, toUnixSeconds } from "../dateUtils";
import { log } from "../logger";
import { addRate, addWarning, emptyResult, mergeResults } from "../normalize";
import type { DateRange, NormalizeResult, ProviderId } from "../types";
import { getJson, parseEnvelope } from "./http";

const PROVIDER: ProviderId = "yahoo";

// ---------------------------------------------------------------------------
// Type definitions
// ---------------------------------------------------------------------------

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ gmtoffset: z.number().optional() }).passthrough().optional(),
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({ quote: z.array(z.object({ close: z.array(z.unknown()).optional() })) })
            .optional(),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string().optional() }).nullable().optional(),
  }),
});

export interface ChartSeries {
  timestamps: number[];
  closes: unknown[];
  gmtoffset: number;
}

// ---------------------------------------------------------------------------
// Pure functions — chart parsing
// ---------------------------------------------------------------------------

/** Extract the daily close series, or undefined when Yahoo has no data. */
export function parseChartResponse(body: unknown): ChartSeries | undefined {
  const { chart } = parseEnvelope(PROVIDER, chartSchema, body);
  if (chart.error) {
    if (chart.error.code === "Not Found") return undefined;
    throw new ProviderError(PROVIDER, `chart error: ${chart.error.code} ${chart.error.description ?? ""}`.trim());
  }
  const first = chart.result?.[0];
  if (!first || !first.timestamp || first.timestamp.length === 0) {
    return undefined;
  }
  return {
    timestamps: first.timestamp,
    closes: first.indicators?.quote[0]?.close ?? [],
    gmtoffset: first.meta?.gmtoffset ?? 0,
  };
}

/**
 * Turn a close series into records within `range`.
 * When several bars fall on the same date the last one wins.
 */
export function normalizeSeries(
  series: ChartSeries,
  options: { base: string; quote: string; invert: boolean; symbol: string; range: DateRange },
): NormalizeResult {
  const byDate = new Map<string, unknown>();
  series.timestamps.forEach((ts, i) => {
    const date = fromUnixSeconds(ts + series.gmtoffset);
    if (date >= options.range.start && date <= options.range.end) {
      byDate.set(date, series.closes[i]);
    }
  });

  const result = emptyResult();
  for (const date of Array.from(byDate.keys()).sort()) {
    addRate(result, PROVIDER, `${options.symbol}@${date}`, {
      date,
      base: options.base,
      quote: options.quote,
      rate: byDate.get(date),
      invert: options.invert,
    });
  }
  return result;
}

function identitySeries(base: string, range: DateRange): NormalizeResult {
  const result = emptyResult();
  for (const date of eachDay(range.start, range.end)) {
    addRate(result, PROVIDER, base, { date, base, quote: base, rate: 1 });
  }
  return result;
}

export function chartUrl(symbol: string, range: DateRange): string {
  const params = new URLSearchParams({
    period1: String(toUnixSeconds(range.start)),
    period2: String(toUnixSeconds(addDays(range.end, 1))),
    interval: "1d",
  });
  return `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}?${params.toString()}`;
}

// ---------------------------------------------------------------------------
// Yahoo chart API
// ---------------------------------------------------------------------------

export interface YahooOptions {
  base: string;
  /** Pause before every request after the first one. */
  requestDelayMs: number;
}

export interface YahooClient {
  fetchCurrency(currency: string, range: DateRange): Promise<NormalizeResult>;
}

export function createYahooClient(options: YahooOptions): YahooClient {
  let requests = 0;

  const fetchSeries = async (symbol: string, range: DateRange): Promise<ChartSeries | undefined> => {
    if (requests > 0 && options.requestDelayMs > 0) {
      await sleep(options.requestDelayMs);
    }
    requests += 1;
    const { status, body } = await getJson(PROVIDER, chartUrl(symbol, range), { acceptStatuses: [404] });
    if (status === 404) return undefined;
    return parseChartResponse(body);
  };

  const fetchCurrency = async (currency: string, range: DateRange): Promise<NormalizeResult> => {
    const base = options.base;
    if (currency === base) {
      return identitySeries(base, range);
    }

    const direct = `${base}${currency}=X`;
    const directSeries = await fetchSeries(direct, range);
    if (directSeries) {
      return normalizeSeries(directSeries, { base, quote: currency, invert: false, symbol: direct, range });
    }

    const inverse = `${currency}${base}=X`;
    log({ domain: "fetch", action: "fallback", provider: PROVIDER, from: direct, to: inverse });
    const inverseSeries = await fetchSeries(inverse, range);
    if (inverseSeries) {
      return normalizeSeries(inverseSeries, { base, quote: currency, invert: true, symbol: inverse, range });
    }

    const result = emptyResult();
    addWarning(result, { source: PROVIDER, entry: currency, reason: `no data for ${direct} or ${inverse}` });
    return result;
  };

  return { fetchCurrency };
}

/** Fetch every currency over the range, sequentially. */
export async function fetchRange(
  client: YahooClient,
  range: DateRange,
  currencies: string[],
): Promise<NormalizeResult> {
  const results: NormalizeResult[] = [];
  for (const currency of currencies) {
    results.push(await client.fetchCurrency(currency, range));
  }
  return mergeResults(results);
}

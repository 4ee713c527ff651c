/**
 * Fetch daily closing rates from the TraderMade historical endpoint.
 *
 * Pairs are requested as CCY+BASE (e.g. EURUSD), so TraderMade quotes
 * "BASE per 1 CCY". Canonical records are BASE -> CCY, i.e. rate = 1 / close.
 * Quotes that already have BASE as their base currency are kept as they are.
 * The base currency itself gets an identity record (rate 1).
 */

import { z } from "zod";
import { TRADERMADE_HISTORICAL_URL } from "../config";
import { redact } from "../logger";
import { addRate, addWarning, emptyResult } from "../normalize";
import type { NormalizeResult, ProviderId } from "../types";
import { getJson, parseEnvelope } from "./http";

const PROVIDER: ProviderId = "tradermade";

// ---------------------------------------------------------------------------
// Pure functions — response parsing
// ---------------------------------------------------------------------------

const historicalSchema = z.object({
  date: z.string().optional(),
  quotes: z.array(z.record(z.unknown())),
});

export type TradermadeQuote = Record<string, unknown>;

export function parseHistoricalResponse(body: unknown): TradermadeQuote[] {
  return parseEnvelope(PROVIDER, historicalSchema, body).quotes;
}

/** Orient TraderMade quotes to `base` and add the identity row when requested. */
export function normalizeQuotes(
  date: string,
  base: string,
  quotes: TradermadeQuote[],
  currencies: string[],
): NormalizeResult {
  const result = emptyResult();
  for (const quote of quotes) {
    const quoteBase = quote.base_currency;
    const quoteQuote = quote.quote_currency;
    const entry = `${String(quoteBase)}${String(quoteQuote)}`;
    if (quoteQuote === base) {
      addRate(result, PROVIDER, entry, { date, base, quote: quoteBase, rate: quote.close, invert: true });
    } else if (quoteBase === base) {
      addRate(result, PROVIDER, entry, { date, base, quote: quoteQuote, rate: quote.close });
    } else {
      addWarning(result, { source: PROVIDER, entry, reason: `quote does not involve ${base}` });
    }
  }
  if (currencies.includes(base)) {
    addRate(result, PROVIDER, base, { date, base, quote: base, rate: 1 });
  }
  return result;
}

export function historicalUrl(apiKey: string, base: string, date: string, currencies: string[]): string {
  const pairs = currencies.filter((c) => c !== base).map((c) => `${c}${base}`);
  const params = new URLSearchParams({
    currency: pairs.join(","),
    date,
    api_key: apiKey,
  });
  return `${TRADERMADE_HISTORICAL_URL}?${params.toString()}`;
}

// ---------------------------------------------------------------------------
// TraderMade API
// ---------------------------------------------------------------------------

export interface TradermadeOptions {
  apiKey: string;
  base: string;
}

export async function fetchDay(
  options: TradermadeOptions,
  date: string,
  currencies: string[],
): Promise<NormalizeResult> {
  const url = historicalUrl(options.apiKey, options.base, date, currencies);
  const { body } = await getJson(PROVIDER, url, { logUrl: redact(url, options.apiKey) });
  const quotes = parseHistoricalResponse(body);
  return normalizeQuotes(date, options.base, quotes, currencies);
}

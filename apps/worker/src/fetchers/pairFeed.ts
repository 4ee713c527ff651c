/**
 * Fetch rates from a pair-keyed JSON feed.
 *
 * GET {url}?date=YYYY-MM-DD with a bearer key returns one object per date:
 *   {"USD_EUR": 0.92, "USD_GBP": 0.79, "date": "2024-01-01"}
 */

import { ProviderError } from "../errors";
import { isPlainObject, normalizePairPayload } from "../normalize";
import type { NormalizeResult, ProviderId } from "../types";
import { getJson } from "./http";

const PROVIDER: ProviderId = "pair-feed";

export interface PairFeedOptions {
  url: string;
  apiKey: string;
  base: string;
}

/** Keep only base -> quote pairs for the requested quote currencies. */
function selectCurrencies(result: NormalizeResult, base: string, currencies: string[]): NormalizeResult {
  return {
    records: result.records.filter((r) => r.base_currency === base && currencies.includes(r.quote_currency)),
    warnings: result.warnings,
  };
}

export async function fetchDay(
  options: PairFeedOptions,
  date: string,
  currencies: string[],
): Promise<NormalizeResult> {
  const url = new URL(options.url);
  url.searchParams.set("date", date);
  const { body } = await getJson(PROVIDER, url.toString(), {
    headers: { Authorization: `Bearer ${options.apiKey}` },
  });
  if (!isPlainObject(body)) {
    throw new ProviderError(PROVIDER, "malformed payload: expected a JSON object");
  }
  return selectCurrencies(normalizePairPayload(body, PROVIDER), options.base, currencies);
}

/**
 * Fetch daily rates from ExchangeRate-API (v6 history endpoint).
 *
 * One request per date. The response lists "units of currency per 1 base"
 * under conversion_rates, which is already the canonical orientation:
 * conversion_rates.EUR = 0.92 for base USD becomes USD -> EUR 0.92.
 *
 * The API key is part of the URL path, so logged URLs are redacted.
 */

import { z } from "zod";
import { EXCHANGE_RATE_API_BASE_URL } from "../config";
import { ProviderError } from "../errors";
import { redact } from "../logger";
import { normalizeConversionRates } from "../normalize";
import type { NormalizeResult, ProviderId } from "../types";
import { getJson, parseEnvelope } from "./http";

const PROVIDER: ProviderId = "exchangerate-api";

// ---------------------------------------------------------------------------
// Pure functions — response parsing
// ---------------------------------------------------------------------------

const historySchema = z.object({
  result: z.string(),
  "error-type": z.string().optional(),
  conversion_rates: z.record(z.unknown()).optional(),
});

/** Return conversion_rates from a history response, or throw ProviderError. */
export function parseHistoryResponse(body: unknown): Record<string, unknown> {
  const data = parseEnvelope(PROVIDER, historySchema, body);
  if (data.result !== "success") {
    throw new ProviderError(PROVIDER, `API returned error: ${data["error-type"] ?? "unknown"}`);
  }
  if (!data.conversion_rates) {
    throw new ProviderError(PROVIDER, "response missing conversion_rates");
  }
  return data.conversion_rates;
}

export function historyUrl(apiKey: string, base: string, date: string): string {
  const [year, month, day] = date.split("-");
  return `${EXCHANGE_RATE_API_BASE_URL}/${apiKey}/history/${base}/${year}/${month}/${day}`;
}

// ---------------------------------------------------------------------------
// ExchangeRate-API
// ---------------------------------------------------------------------------

export interface ExchangeRateApiOptions {
  apiKey: string;
  base: string;
}

/** Fetch and normalize rates for one date. */
export async function fetchDay(
  options: ExchangeRateApiOptions,
  date: string,
  currencies: string[],
): Promise<NormalizeResult> {
  const url = historyUrl(options.apiKey, options.base, date);
  // Error payloads (invalid-key, no-data-available, ...) come with 4xx statuses.
  const { body } = await getJson(PROVIDER, url, {
    logUrl: redact(url, options.apiKey),
    acceptStatuses: [400, 401, 403, 404],
  });
  const rates = parseHistoryResponse(body);
  return normalizeConversionRates(date, options.base, rates, currencies, PROVIDER);
}

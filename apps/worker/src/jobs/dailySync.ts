/**
 * daily-sync: rebuild the full rate history from Yahoo Finance.
 *
 * Fetches every configured currency from SYNC_START_DATE to today and
 * replaces the destination table contents. A currency whose request fails
 * is skipped; the run fails only when nothing usable came back, so the
 * table is never cleared for an empty batch.
 */

import { daysBetween } from "../dateUtils";
import { ConfigError, ProviderError, errorMessage } from "../errors";
import { createProvider } from "../fetchers";
import { log } from "../logger";
import { mergeResults } from "../normalize";
import { uploadRecords } from "../uploader";
import type { JobResult, NormalizeResult } from "../types";
import type { JobContext } from "./context";

export async function run({ config, destination, today }: JobContext): Promise<JobResult> {
  if (daysBetween(config.syncStartDate, today) < 0) {
    throw new ConfigError(`SYNC_START_DATE ${config.syncStartDate} is after ${today}`);
  }
  const provider = createProvider("yahoo", config);
  const range = { start: config.syncStartDate, end: today };

  const results: NormalizeResult[] = [];
  let failedCurrencies = 0;
  for (const currency of config.currencies) {
    try {
      results.push(await provider.fetchRange(range, [currency]));
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      failedCurrencies += 1;
      log({ domain: "fetch", action: "skipped", provider: provider.id, subject: currency, error: errorMessage(err) });
    }
  }

  const normalized = mergeResults(results);
  if (normalized.records.length === 0) {
    throw new ProviderError(provider.id, `no usable rates for ${range.start}..${range.end}`);
  }

  const upload = await uploadRecords(normalized.records, destination, { replace: true });

  return {
    job: "daily-sync",
    provider: provider.id,
    range,
    normalized: normalized.records.length,
    skipped: normalized.warnings.length + failedCurrencies,
    ...upload,
  };
}

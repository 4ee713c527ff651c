/**
 * daily-upload: fetch today's rates from the configured daily provider and
 * append them to the destination.
 */

import { ProviderError } from "../errors";
import { createProvider } from "../fetchers";
import { uploadRecords } from "../uploader";
import type { JobResult } from "../types";
import type { JobContext } from "./context";

export async function run({ config, destination, today }: JobContext): Promise<JobResult> {
  const provider = createProvider(config.dailyProvider, config);
  const range = { start: today, end: today };

  const normalized = await provider.fetchRange(range, config.currencies);
  if (normalized.records.length === 0) {
    throw new ProviderError(provider.id, `no usable rates for ${today}`);
  }

  const upload = await uploadRecords(normalized.records, destination);

  return {
    job: "daily-upload",
    provider: provider.id,
    range,
    normalized: normalized.records.length,
    skipped: normalized.warnings.length,
    ...upload,
  };
}

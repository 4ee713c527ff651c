/**
 * Uploader: pushes a batch of RateRecords to one destination.
 *
 * The batch is deduplicated on (date, base_currency, quote_currency, source)
 * before anything is sent; dropped duplicates count as failures. A rejected
 * batch raises UploadError and is not retried within the run.
 */

import { log } from "./logger";
import { dedupeRecords } from "./normalize";
import type { DestinationId, RateRecord, UploadResult } from "./types";

export interface RateDestination {
  id: DestinationId;
  /** Make sure the target table exists. */
  prepare(): Promise<void>;
  /** Store records, first removing every stored row in replace mode; returns how many were written. */
  write(records: RateRecord[], options: WriteOptions): Promise<number>;
}

export interface WriteOptions {
  replace: boolean;
}

export interface UploadOptions {
  /** Clear the destination before writing. */
  replace?: boolean;
}

export async function uploadRecords(
  records: RateRecord[],
  destination: RateDestination,
  options: UploadOptions = {},
): Promise<UploadResult> {
  const { records: unique, duplicates } = dedupeRecords(records);
  for (const key of duplicates) {
    log({ domain: "upload", action: "duplicate", key });
  }

  if (unique.length === 0) {
    log({ domain: "upload", action: "empty" });
    return { succeeded: 0, failed: records.length };
  }

  await destination.prepare();
  const succeeded = await destination.write(unique, { replace: options.replace ?? false });
  log({ domain: "upload", action: "write", destination: destination.id, rows: unique.length, succeeded });

  return { succeeded, failed: records.length - succeeded };
}

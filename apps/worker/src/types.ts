/**
 * Shared type definitions for the FX rate sync worker.
 */

/** One exchange rate: `rate` units of quote_currency per 1 base_currency. */
export interface RateRecord {
  date: string;
  base_currency: string;
  quote_currency: string;
  rate: string;
  source: string;
}

export interface DateRange {
  start: string;
  end: string;
}

/** A provider entry that was skipped during normalization. */
export interface NormalizationWarning {
  source: string;
  entry: string;
  reason: string;
}

export interface NormalizeResult {
  records: RateRecord[];
  warnings: NormalizationWarning[];
}

export interface UploadResult {
  succeeded: number;
  failed: number;
}

export type ProviderId = "exchangerate-api" | "tradermade" | "yahoo" | "pair-feed";

export type DestinationId = "dune" | "postgres";

export type JobName = "daily-sync" | "daily-upload" | "weekend-backfill";

export interface JobResult {
  job: JobName;
  provider: ProviderId;
  range: DateRange;
  normalized: number;
  skipped: number;
  succeeded: number;
  failed: number;
}

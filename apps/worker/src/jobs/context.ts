import type { AppConfig } from "../config";
import type { JobResult } from "../types";
import type { RateDestination } from "../uploader";

export interface JobContext {
  config: AppConfig;
  destination: RateDestination;
  /** Run date, 'YYYY-MM-DD' (UTC). */
  today: string;
}

export type Job = (ctx: JobContext) => Promise<JobResult>;

/**
 * Job registry and runner shared by the CLI and the scheduler.
 */

import { loadConfig } from "../config";
import { todayIso } from "../dateUtils";
import { log } from "../logger";
import { createDestination } from "../upload";
import type { JobName, JobResult } from "../types";
import type { RateDestination } from "../uploader";
import type { Job } from "./context";
import { run as runDailySync } from "./dailySync";
import { run as runDailyUpload } from "./dailyUpload";
import { run as runWeekendBackfill } from "./weekendBackfill";

export const JOBS: Record<JobName, Job> = {
  "daily-sync": runDailySync,
  "daily-upload": runDailyUpload,
  "weekend-backfill": runWeekendBackfill,
};

export const JOB_NAMES: readonly JobName[] = ["daily-sync", "daily-upload", "weekend-backfill"];

export const isJobName = (value: string): value is JobName => JOB_NAMES.some((name) => name === value);

export interface RunJobOptions {
  env?: NodeJS.ProcessEnv;
  today?: string;
  destination?: RateDestination;
}

/** Load configuration and run one job to completion. Errors propagate. */
export async function runJob(name: JobName, options: RunJobOptions = {}): Promise<JobResult> {
  log({ domain: "job", action: "start", job: name });
  const started = Date.now();

  const config = loadConfig(options.env);
  const destination = options.destination ?? createDestination(config);
  const today = options.today ?? todayIso();

  const result = await JOBS[name]({ config, destination, today });
  log({ domain: "job", action: "complete", job: name, result, durationMs: Date.now() - started });
  return result;
}

/**
 * Long-running entrypoint: run the FX jobs on their cron schedules (UTC).
 *
 * Default schedule:
 *   - daily-sync        06:00 daily
 *   - daily-upload      00:05 daily
 *   - weekend-backfill  00:10 Mondays
 *
 * Usage:
 *     node dist/scheduler.js
 */

import { loadConfig } from "./config";
import { registerSchedules } from "./jobs/schedules";

try {
  registerSchedules(loadConfig());
  console.log("Scheduler started. Waiting for the next tick.");
} catch (err: unknown) {
  console.error("Scheduler failed to start:", err);
  process.exit(1);
}

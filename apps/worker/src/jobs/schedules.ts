import * as cron from "node-cron";
import type { AppConfig } from "../config";
import { ConfigError, errorMessage } from "../errors";
import { log } from "../logger";
import type { JobName } from "../types";
import { JOB_NAMES, runJob } from "./index";

/** Run a job from a cron tick. A failure is logged; the next tick runs again. */
export async function runScheduled(name: JobName): Promise<void> {
  try {
    await runJob(name);
  } catch (err) {
    const errorName = err instanceof Error ? err.name : "Error";
    log({ domain: "job", action: "error", job: name, errorName, error: errorMessage(err) });
  }
}

/** Register every job with node-cron (UTC). */
export function registerSchedules(config: AppConfig): cron.ScheduledTask[] {
  return JOB_NAMES.map((name) => {
    const expression = config.schedules[name];
    if (!cron.validate(expression)) {
      throw new ConfigError(`Invalid cron expression for ${name}: ${JSON.stringify(expression)}`);
    }
    const task = cron.schedule(expression, () => { void runScheduled(name); }, { timezone: "UTC" });
    log({ domain: "job", action: "scheduled", job: name, cron: expression });
    return task;
  });
}

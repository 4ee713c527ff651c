/**
 * CLI: fx-sync <job>
 *
 * One positional job name, no flags. Exit codes:
 *   0  the job completed
 *   1  a fetch, upload or configuration error aborted the run
 *   2  unknown job name
 */

import { endPool } from "./db";
import { errorMessage } from "./errors";
import { JOB_NAMES, isJobName, runJob } from "./jobs";
import { log } from "./logger";

export const usage = (): string => `Usage: fx-sync <${JOB_NAMES.join("|")}>`;

export async function main(argv: string[]): Promise<number> {
  const [name, ...rest] = argv;
  if (name === undefined || rest.length > 0 || !isJobName(name)) {
    console.error(usage());
    return 2;
  }

  try {
    await runJob(name);
    return 0;
  } catch (err) {
    const errorName = err instanceof Error ? err.name : "Error";
    log({ domain: "job", action: "error", job: name, errorName, error: errorMessage(err) });
    return 1;
  } finally {
    await endPool();
  }
}

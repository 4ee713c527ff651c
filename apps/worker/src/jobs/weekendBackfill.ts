/**
 * weekend-backfill: runs on Monday and fills Saturday and Sunday.
 *
 * Providers publish no weekend closes, so weekend rows are interpolated
 * between Friday's and Monday's rates (see interpolateWeekend).
 */

import { addDays, weekday } from "../dateUtils";
import { ConfigError } from "../errors";
import { createProvider } from "../fetchers";
import { interpolateWeekend } from "../normalize";
import { uploadRecords } from "../uploader";
import type { JobResult } from "../types";
import type { JobContext } from "./context";

const MONDAY = 1;

export async function run({ config, destination, today }: JobContext): Promise<JobResult> {
  if (weekday(today) !== MONDAY) {
    throw new ConfigError(`weekend-backfill must run on a Monday, got ${today}`);
  }

  const friday = addDays(today, -3);
  const provider = createProvider("exchangerate-api", config);

  const fridayRates = await provider.fetchRange({ start: friday, end: friday }, config.currencies);
  const mondayRates = await provider.fetchRange({ start: today, end: today }, config.currencies);

  const weekend = interpolateWeekend(fridayRates.records, mondayRates.records, {
    saturday: addDays(friday, 1),
    sunday: addDays(friday, 2),
  });

  const upload = await uploadRecords(weekend.records, destination);

  return {
    job: "weekend-backfill",
    provider: provider.id,
    range: { start: friday, end: today },
    normalized: weekend.records.length,
    skipped: fridayRates.warnings.length + mondayRates.warnings.length + weekend.warnings.length,
    ...upload,
  };
}

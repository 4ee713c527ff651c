/**
 * Configuration for the FX rate sync worker.
 *
 * Everything is read from the environment through loadConfig(). Provider and
 * destination credentials are optional at parse time and required only by
 * the provider or destination a job actually uses (see requireSetting).
 *
 * Database URL (postgres destination only):
 * - reads DATABASE_URL directly, or
 * - fetches credentials from Secrets Manager using DB_SECRET_ARN,
 *   then constructs the URL from DB_HOST and DB_NAME.
 */

import { SecretsManagerClient, GetSecretValueCommand } from "@aws-sdk/client-secrets-manager";
import { z } from "zod";
import { isIsoDate } from "./dateUtils";
import { ConfigError } from "./errors";
import type { DestinationId, JobName, ProviderId } from "./types";

// ---------------------------------------------------------------------------
// Currencies
// ---------------------------------------------------------------------------

// Quote currencies fetched against the base currency (USD by default).
// The base currency itself is kept in the list so it gets an identity row.
export const DEFAULT_CURRENCIES: string[] = [
  "AED", "ARS", "AUD", "CAD", "CHF", "CNY", "EUR", "GBP", "HKD", "IDR", "ILS", "JPY",
  "KES", "MXN", "MYR", "NZD", "PLN", "SAR", "SGD", "THB", "TRY", "USD", "VND", "ZAR",
];

// ---------------------------------------------------------------------------
// Provider and destination endpoints
// ---------------------------------------------------------------------------

// Docs: https://www.exchangerate-api.com/docs/historical-data-requests
export const EXCHANGE_RATE_API_BASE_URL: string = "https://v6.exchangerate-api.com/v6";

// Docs: https://tradermade.com/docs/restful-api
export const TRADERMADE_HISTORICAL_URL: string = "https://marketdata.tradermade.com/api/v1/historical";

export const YAHOO_CHART_URL: string = "https://query1.finance.yahoo.com/v8/finance/chart";

// Docs: https://docs.dune.com/api-reference/tables/endpoint/create
export const DUNE_API_BASE_URL: string = "https://api.dune.com/api/v1";

export const DEFAULT_SCHEDULES: Record<JobName, string> = {
  "daily-sync": "0 6 * * *",
  "daily-upload": "5 0 * * *",
  "weekend-backfill": "10 0 * * 1",
};

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface AppConfig {
  baseCurrency: string;
  currencies: string[];
  dailyProvider: Exclude<ProviderId, "yahoo">;
  syncStartDate: string;
  yahooRequestDelayMs: number;
  destination: DestinationId;
  dune: {
    apiKey: string | undefined;
    namespace: string | undefined;
    tableName: string;
  };
  exchangeRateApiKey: string | undefined;
  tradermadeApiKey: string | undefined;
  pairFeed: {
    url: string | undefined;
    apiKey: string | undefined;
  };
  schedules: Record<JobName, string>;
}

// Blank variables (e.g. an unset GitHub secret) count as unset.
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);

const currencyCode = z.string().regex(/^[A-Z]{3}$/, "expected a three-letter upper-case currency code");

const currencyList = z
  .string()
  .transform((raw) => raw.split(",").map((c) => c.trim().toUpperCase()).filter((c) => c !== ""))
  .pipe(z.array(currencyCode).min(1));

const isoDate = z.string().refine(isIsoDate, "expected a calendar date YYYY-MM-DD");

const envSchema = z.object({
  FX_BASE_CURRENCY: blankAsUnset(currencyCode.default("USD")),
  FX_CURRENCIES: blankAsUnset(currencyList.optional()),
  DAILY_PROVIDER: blankAsUnset(z.enum(["exchangerate-api", "tradermade", "pair-feed"]).default("exchangerate-api")),
  SYNC_START_DATE: blankAsUnset(isoDate.default("2025-01-01")),
  YAHOO_REQUEST_DELAY_MS: blankAsUnset(z.coerce.number().int().nonnegative().default(1000)),
  UPLOAD_DESTINATION: blankAsUnset(z.enum(["dune", "postgres"]).default("dune")),
  DUNE_API_KEY: blankAsUnset(z.string().optional()),
  DUNE_NAMESPACE: blankAsUnset(z.string().optional()),
  DUNE_TABLE_NAME: blankAsUnset(z.string().default("fx_rates")),
  EXCHANGE_RATE_API_KEY: blankAsUnset(z.string().optional()),
  TRADERMADE_API_KEY: blankAsUnset(z.string().optional()),
  PAIR_FEED_URL: blankAsUnset(z.string().url().optional()),
  PAIR_FEED_API_KEY: blankAsUnset(z.string().optional()),
  DAILY_SYNC_CRON: blankAsUnset(z.string().default(DEFAULT_SCHEDULES["daily-sync"])),
  DAILY_UPLOAD_CRON: blankAsUnset(z.string().default(DEFAULT_SCHEDULES["daily-upload"])),
  WEEKEND_BACKFILL_CRON: blankAsUnset(z.string().default(DEFAULT_SCHEDULES["weekend-backfill"])),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    baseCurrency: e.FX_BASE_CURRENCY,
    currencies: e.FX_CURRENCIES ?? DEFAULT_CURRENCIES,
    dailyProvider: e.DAILY_PROVIDER,
    syncStartDate: e.SYNC_START_DATE,
    yahooRequestDelayMs: e.YAHOO_REQUEST_DELAY_MS,
    destination: e.UPLOAD_DESTINATION,
    dune: {
      apiKey: e.DUNE_API_KEY,
      namespace: e.DUNE_NAMESPACE,
      tableName: e.DUNE_TABLE_NAME,
    },
    exchangeRateApiKey: e.EXCHANGE_RATE_API_KEY,
    tradermadeApiKey: e.TRADERMADE_API_KEY,
    pairFeed: {
      url: e.PAIR_FEED_URL,
      apiKey: e.PAIR_FEED_API_KEY,
    },
    schedules: {
      "daily-sync": e.DAILY_SYNC_CRON,
      "daily-upload": e.DAILY_UPLOAD_CRON,
      "weekend-backfill": e.WEEKEND_BACKFILL_CRON,
    },
  };
}

export function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError(`Missing ${name} env var`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Postgres
// ---------------------------------------------------------------------------

const dbSecretSchema = z.object({ username: z.string(), password: z.string() });

let resolvedDatabaseUrl: string | undefined;

export async function getDatabaseUrl(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  if (resolvedDatabaseUrl) return resolvedDatabaseUrl;

  const secretArn = env.DB_SECRET_ARN;
  if (secretArn) {
    const client = new SecretsManagerClient({});
    const resp = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));
    if (!resp.SecretString) {
      throw new ConfigError(`Secret ${secretArn} has no SecretString`);
    }
    const secret = dbSecretSchema.parse(JSON.parse(resp.SecretString));
    const host = requireSetting(env.DB_HOST, "DB_HOST");
    const dbName = requireSetting(env.DB_NAME, "DB_NAME");
    resolvedDatabaseUrl = `postgresql://${secret.username}:${encodeURIComponent(secret.password)}@${host}:5432/${dbName}`;
  } else {
    resolvedDatabaseUrl = requireSetting(env.DATABASE_URL, "DATABASE_URL");
  }

  return resolvedDatabaseUrl;
}

/**
 * Postgres upload destination: idempotent upsert into fx_rates.
 *
 * The primary key is the RateRecord uniqueness key, so uploading the same
 * batch twice leaves one row per record (the second upload rewrites rates).
 * A write, including the clear in replace mode, runs in one transaction.
 */

import { query, withTransaction, type QueryFn } from "../db";
import { UploadError, errorMessage } from "../errors";
import { log } from "../logger";
import type { RateRecord } from "../types";
import type { RateDestination } from "../uploader";
import { inverseRate } from "./csv";

export const FX_TABLE = "fx_rates";

// Max rows per INSERT to stay well within PostgreSQL's 65535 parameter limit.
const INSERT_BATCH_SIZE = 1000;
const COLUMNS_PER_ROW = 6;

const CREATE_TABLE_SQL =
  `CREATE TABLE IF NOT EXISTS ${FX_TABLE} (` +
  "rate_date date NOT NULL, " +
  "base_currency text NOT NULL, " +
  "quote_currency text NOT NULL, " +
  "rate numeric(24, 9) NOT NULL, " +
  "inverse_rate numeric(24, 9) NOT NULL, " +
  "source text NOT NULL, " +
  "uploaded_at timestamptz NOT NULL DEFAULT now(), " +
  "PRIMARY KEY (rate_date, base_currency, quote_currency, source))";

async function run<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof UploadError) throw err;
    throw new UploadError("postgres", `${action} failed: ${errorMessage(err)}`);
  }
}

/** Upsert rows in batches. Returns total count of rows inserted or updated. */
export async function upsertRows(rows: RateRecord[], tx: QueryFn = query): Promise<number> {
  let total = 0;
  for (let batchStart = 0; batchStart < rows.length; batchStart += INSERT_BATCH_SIZE) {
    const batch = rows.slice(batchStart, batchStart + INSERT_BATCH_SIZE);
    const values: string[] = [];
    const params: unknown[] = [];
    batch.forEach((row, i) => {
      const offset = i * COLUMNS_PER_ROW;
      const placeholders = Array.from({ length: COLUMNS_PER_ROW }, (_, c) => `$${offset + c + 1}`);
      values.push(`(${placeholders.join(", ")})`);
      params.push(row.date, row.base_currency, row.quote_currency, row.rate, inverseRate(row.rate), row.source);
    });
    const result = await run("upsert", () =>
      tx(
        `INSERT INTO ${FX_TABLE} (rate_date, base_currency, quote_currency, rate, inverse_rate, source) ` +
        "VALUES " + values.join(", ") + " " +
        "ON CONFLICT (rate_date, base_currency, quote_currency, source) " +
        "DO UPDATE SET rate = EXCLUDED.rate, inverse_rate = EXCLUDED.inverse_rate, uploaded_at = now()",
        params,
      ),
    );
    total += result.rowCount ?? 0;
  }
  return total;
}

export function createPostgresDestination(): RateDestination {
  return {
    id: "postgres",
    prepare: async () => {
      await run("create table", () => query(CREATE_TABLE_SQL, []));
    },
    write: (records, options) =>
      run("transaction", () =>
        withTransaction(async (tx) => {
          if (options.replace) {
            await run("clear", () => tx(`DELETE FROM ${FX_TABLE}`, []));
            log({ domain: "upload", action: "clear", destination: "postgres" });
          }
          return upsertRows(records, tx);
        }),
      ),
  };
}

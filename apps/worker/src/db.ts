/**
 * Postgres connection pool for the postgres upload destination.
 *
 * Pool is created lazily on first query: with DB_SECRET_ARN the connection
 * string is resolved from Secrets Manager (async).
 * A CLI run closes the pool with endPool() before exiting.
 */

import { Pool, type QueryResult } from "pg";
import { getDatabaseUrl } from "./config";
import { errorMessage } from "./errors";
import { log } from "./logger";

// Jobs write sequentially; one connection is enough.
const POOL_SIZE = 1;

let pool: Pool | undefined;

async function getPool(): Promise<Pool> {
  if (!pool) {
    const connectionString = await getDatabaseUrl();
    // ssl:true enables full certificate verification. RDS certs are signed by
    // Amazon's CA (not in Node.js defaults), so NODE_EXTRA_CA_CERTS must point
    // to the RDS CA bundle.
    const ssl = process.env.DB_SECRET_ARN ? true : false;
    pool = new Pool({ connectionString, ssl, max: POOL_SIZE, application_name: "fx-sync-worker" });
    // An idle client losing its connection must not crash the process.
    pool.on("error", (err) => {
      log({ domain: "upload", action: "error", destination: "postgres", error: errorMessage(err) });
    });
  }
  return pool;
}

export type QueryFn = (text: string, params: ReadonlyArray<unknown>) => Promise<QueryResult>;

export const query: QueryFn = async (text, params) =>
  (await getPool()).query(text, [...params]);

/** Run fn on one client inside BEGIN/COMMIT; ROLLBACK and rethrow on failure. */
export async function withTransaction<T>(fn: (tx: QueryFn) => Promise<T>): Promise<T> {
  const client = await (await getPool()).connect();
  try {
    await client.query("BEGIN");
    const result = await fn((text, params) => client.query(text, [...params]));
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

export const endPool = async (): Promise<void> => {
  if (pool) {
    const closing = pool;
    pool = undefined;
    await closing.end();
  }
};

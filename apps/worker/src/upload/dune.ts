/**
 * Dune uploads: table creation, clearing and CSV inserts.
 *
 * Dune tables are append-only through the insert endpoint, so re-uploading
 * a date appends rows. The daily-sync job uses replace mode (clear, then
 * insert) to rewrite the whole history in one run. Dune has no transactions:
 * a failed insert after a clear leaves the table empty until the next run.
 */

import { z } from "zod";
import { DUNE_API_BASE_URL } from "../config";
import { UploadError, errorMessage } from "../errors";
import { log } from "../logger";
import type { RateRecord } from "../types";
import type { RateDestination, WriteOptions } from "../uploader";
import { toCsv } from "./csv";

// Column types follow Dune's table API; order matches CSV_COLUMNS.
export const FX_TABLE_SCHEMA = [
  { name: "date", type: "date", nullable: false },
  { name: "base_currency", type: "varchar", nullable: false },
  { name: "quote_currency", type: "varchar", nullable: false },
  { name: "rate", type: "double", nullable: false },
  { name: "inverse_rate", type: "double", nullable: false },
  { name: "source", type: "varchar", nullable: false },
] as const;

export interface DuneOptions {
  apiKey: string;
  namespace: string;
  tableName: string;
}

const createResponseSchema = z.object({ already_existed: z.boolean().optional() }).passthrough();
const insertResponseSchema = z.object({ rows_written: z.number().int().nonnegative() }).passthrough();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function post(
  url: string,
  headers: Record<string, string>,
  body?: string,
): Promise<{ status: number; text: string }> {
  try {
    const response = await fetch(url, { method: "POST", headers, body });
    return { status: response.status, text: await response.text() };
  } catch (err) {
    throw new UploadError("dune", `request failed: ${errorMessage(err)}`);
  }
}

export function createDuneDestination(options: DuneOptions): RateDestination {
  const tableUrl = `${DUNE_API_BASE_URL}/table/${options.namespace}/${options.tableName}`;
  const auth = { "X-DUNE-API-KEY": options.apiKey };

  /** Create the table; an existing table is fine. */
  const prepare = async (): Promise<void> => {
    const payload = {
      namespace: options.namespace,
      table_name: options.tableName,
      description: "Daily FX rates: quote currency units per 1 base currency",
      schema: FX_TABLE_SCHEMA,
      is_private: false,
    };
    const { status, text } = await post(
      `${DUNE_API_BASE_URL}/table/create`,
      { ...auth, "Content-Type": "application/json" },
      JSON.stringify(payload),
    );
    if (status === 200 || status === 201) {
      const parsed = createResponseSchema.safeParse(parseJson(text));
      const existed = parsed.success ? parsed.data.already_existed ?? false : false;
      log({ domain: "upload", action: "table_ensure", destination: "dune", status, existed });
      return;
    }
    if (status === 409 || text.includes("already exists")) {
      log({ domain: "upload", action: "table_ensure", destination: "dune", status, existed: true });
      return;
    }
    throw new UploadError("dune", `create table failed: ${status} ${text}`, status);
  };

  const clear = async (): Promise<void> => {
    const { status, text } = await post(`${tableUrl}/clear`, auth);
    if (status !== 200) {
      throw new UploadError("dune", `clear failed: ${status} ${text}`, status);
    }
    log({ domain: "upload", action: "clear", destination: "dune" });
  };

  /** Insert records as CSV, clearing the table first in replace mode; returns rows written. */
  const write = async (records: RateRecord[], writeOptions: WriteOptions): Promise<number> => {
    if (writeOptions.replace) {
      await clear();
    }
    const { status, text } = await post(
      `${tableUrl}/insert`,
      { ...auth, "Content-Type": "text/csv" },
      toCsv(records),
    );
    if (status !== 200) {
      throw new UploadError("dune", `insert failed: ${status} ${text}`, status);
    }
    const parsed = insertResponseSchema.safeParse(parseJson(text));
    return parsed.success ? parsed.data.rows_written : records.length;
  };

  return { id: "dune", prepare, write };
}

/**
 * HTTP helpers shared by the provider fetchers.
 *
 * Every failure on the fetch side surfaces as a ProviderError: network
 * errors, unexpected statuses, non-JSON bodies and envelopes that do not
 * match the provider's schema.
 */

import type { z } from "zod";
import { ProviderError, errorMessage } from "../errors";
import { log } from "../logger";
import type { ProviderId } from "../types";

export interface JsonResponse {
  status: number;
  body: unknown;
}

export interface GetJsonOptions {
  headers?: Record<string, string>;
  /** URL as it should appear in logs (credentials redacted). */
  logUrl?: string;
  /** Non-2xx statuses whose body the caller wants to inspect. */
  acceptStatuses?: number[];
}

export async function getJson(
  provider: ProviderId,
  url: string,
  options: GetJsonOptions = {},
): Promise<JsonResponse> {
  log({ domain: "fetch", action: "request", provider, url: options.logUrl ?? url });

  let response: Response;
  try {
    response = await fetch(url, { headers: options.headers });
  } catch (err) {
    throw new ProviderError(provider, `request failed: ${errorMessage(err)}`);
  }

  const accepted = options.acceptStatuses?.includes(response.status) ?? false;
  if (!response.ok && !accepted) {
    throw new ProviderError(provider, `API error: ${response.status} ${response.statusText}`, response.status);
  }

  const text = await response.text();
  try {
    return { status: response.status, body: JSON.parse(text) };
  } catch (err) {
    if (!response.ok) {
      return { status: response.status, body: null };
    }
    throw new ProviderError(provider, `response is not JSON: ${errorMessage(err)}`, response.status);
  }
}

/** Validate a response envelope, raising ProviderError with the zod issues. */
export function parseEnvelope<T extends z.ZodTypeAny>(
  provider: ProviderId,
  schema: T,
  body: unknown,
): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ProviderError(provider, `malformed payload: ${issues.join("; ")}`);
  }
  return parsed.data;
}

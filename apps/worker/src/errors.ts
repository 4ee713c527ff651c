/**
 * Error taxonomy for the worker.
 *
 * ProviderError and UploadError abort a run; ConfigError is raised before
 * anything is fetched. Per-record problems are NormalizationWarnings (see
 * types.ts) and never thrown.
 */

import type { DestinationId, ProviderId } from "./types";

export class ProviderError extends Error {
  readonly provider: ProviderId;
  readonly status: number | undefined;

  constructor(provider: ProviderId, message: string, status?: number) {
    super(`${provider}: ${message}`);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = status;
  }
}

export class UploadError extends Error {
  readonly destination: DestinationId;
  readonly status: number | undefined;

  constructor(destination: DestinationId, message: string, status?: number) {
    super(`${destination}: ${message}`);
    this.name = "UploadError";
    this.destination = destination;
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

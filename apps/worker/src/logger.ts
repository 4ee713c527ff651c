import type { DestinationId, JobName, JobResult, ProviderId } from "./types";

type JobEvent =
  | Readonly<{ domain: "job"; action: "start"; job: JobName }>
  | Readonly<{ domain: "job"; action: "complete"; job: JobName; result: JobResult; durationMs: number }>
  | Readonly<{ domain: "job"; action: "error"; job: JobName; errorName: string; error: string }>
  | Readonly<{ domain: "job"; action: "scheduled"; job: JobName; cron: string }>;

type FetchEvent =
  | Readonly<{ domain: "fetch"; action: "request"; provider: ProviderId; url: string }>
  | Readonly<{ domain: "fetch"; action: "response"; provider: ProviderId; records: number; warnings: number }>
  | Readonly<{ domain: "fetch"; action: "fallback"; provider: ProviderId; from: string; to: string }>
  | Readonly<{ domain: "fetch"; action: "skipped"; provider: ProviderId; subject: string; error: string }>;

type NormalizeEvent =
  | Readonly<{ domain: "normalize"; action: "warning"; source: string; entry: string; reason: string }>;

type UploadEvent =
  | Readonly<{ domain: "upload"; action: "table_ensure"; destination: DestinationId; status: number; existed: boolean }>
  | Readonly<{ domain: "upload"; action: "clear"; destination: DestinationId }>
  | Readonly<{ domain: "upload"; action: "write"; destination: DestinationId; rows: number; succeeded: number }>
  | Readonly<{ domain: "upload"; action: "duplicate"; key: string }>
  | Readonly<{ domain: "upload"; action: "empty" }>
  | Readonly<{ domain: "upload"; action: "error"; destination: DestinationId; error: string }>;

export type LogEvent = JobEvent | FetchEvent | NormalizeEvent | UploadEvent;

const isWarning = (event: LogEvent): boolean =>
  event.action === "warning" || event.action === "duplicate" || event.action === "skipped";

export const log = (event: LogEvent): void => {
  const line = JSON.stringify(event);
  if (event.action === "error") {
    console.error(line);
  } else if (isWarning(event)) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/** Replace every occurrence of a credential in a URL before it is logged. */
export const redact = (url: string, secret: string | undefined): string =>
  secret ? url.split(secret).join("***") : url;

export type CollectorErrorKind =
  | "source_unavailable"
  | "rate_limited"
  | "protocol"
  | "storage_io";

export abstract class CollectorError extends Error {
  abstract readonly kind: CollectorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transient: the source could not answer. Skip this cycle. */
export class SourceUnavailableError extends CollectorError {
  readonly kind = "source_unavailable";
}

/** Transient: the endpoint is throttling us. Triggers failover. */
export class RateLimitedError extends CollectorError {
  readonly kind = "rate_limited";
}

/** The upstream sent something we cannot decode. Drop it. */
export class ProtocolError extends CollectorError {
  readonly kind = "protocol";
}

export class StorageIOError extends CollectorError {
  readonly kind = "storage_io";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

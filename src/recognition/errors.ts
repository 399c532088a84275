import type { FailureKind, RecognitionFailure, StageResult } from "../types";

export type FailureStatus = 400 | 413 | 500 | 502 | 503;

export const FAILURE_STATUS: Record<FailureKind, FailureStatus> = {
  MissingInput: 400,
  UnsupportedFormat: 400,
  NoPlateDetected: 400,
  PayloadTooLarge: 413,
  DetectionFailed: 502,
  ExtractionTimeout: 502,
  ExtractionUnreachable: 502,
  ExtractionServiceError: 502,
  ExtractionNotConfigured: 503,
  ExtractionParseFailure: 500,
  InternalError: 500,
};

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(
  kind: FailureKind,
  error: string,
  extra: Omit<RecognitionFailure, "kind" | "error"> = {}
): StageResult<T> {
  return { ok: false, failure: { kind, error, ...extra } };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node's fetch rejects with `TypeError("fetch failed")` and hides the socket
 * error in `cause`.
 */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const cause = error.cause instanceof Error ? error.cause.message : "";
  const text = `${error.message} ${cause}`;
  return (
    text.includes("fetch failed") ||
    text.includes("ENOTFOUND") ||
    text.includes("ECONNREFUSED") ||
    text.includes("ECONNRESET")
  );
}

/** `AbortSignal.timeout` rejects with a `DOMException` named TimeoutError. */
export function isTimeoutError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return false;
  }
  return error.name === "TimeoutError" || error.name === "AbortError";
}

// apps/runner/src/errors.ts
//
// Error taxonomy for a run. Per-job errors (TransportError, PersistenceError) are
// caught at the unit-of-work boundary; StoreInitError and JobSourceError abort the
// run before any job starts.

import type { FailureClass } from "shared-types";

export type TransportFailureClass = Extract<FailureClass, "http_error" | "timeout" | "network_error">;

export class TransportError extends Error {
  public readonly failureClass: TransportFailureClass;
  public readonly status?: number;
  public readonly statusText?: string;
  public readonly bodySnippet?: string;

  constructor(
    failureClass: TransportFailureClass,
    message: string,
    extra: { status?: number; statusText?: string; bodySnippet?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: extra.cause });
    this.name = "TransportError";
    this.failureClass = failureClass;
    if (extra.status !== undefined) this.status = extra.status;
    if (extra.statusText !== undefined) this.statusText = extra.statusText;
    if (extra.bodySnippet !== undefined) this.bodySnippet = extra.bodySnippet;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class StoreInitError extends Error {
  public readonly exitCode = 1;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreInitError";
  }
}

export class JobSourceError extends Error {
  public readonly exitCode = 1;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JobSourceError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Sync error taxonomy
 *
 * Every error here is fatal for the run. The CLI maps them to exit code 1;
 * nothing below it swallows or downgrades them.
 */

export type SyncErrorCode =
  | "CONFIGURATION_ERROR"
  | "TRANSIENT_REMOTE_ERROR"
  | "PROTOCOL_ERROR"
  | "STORE_ERROR";

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;
}

/**
 * Missing credential or malformed setting, detected before any network call
 */
export class ConfigurationError extends SyncError {
  readonly code = "CONFIGURATION_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Rate limiting (HTTP 429) that outlasted the backoff schedule
 */
export class TransientRemoteError extends SyncError {
  readonly code = "TRANSIENT_REMOTE_ERROR" as const;
  readonly status: number;
  readonly attempts: number;

  constructor(message: string, status: number, attempts: number) {
    super(message);
    this.name = "TransientRemoteError";
    this.status = status;
    this.attempts = attempts;
  }
}

/**
 * The remote broke its contract: unexpected status or body shape
 */
export class ProtocolError extends SyncError {
  readonly code = "PROTOCOL_ERROR" as const;
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = "ProtocolError";
    this.status = status;
    this.body = body;
  }
}

export class StoreError extends SyncError {
  readonly code = "STORE_ERROR" as const;
  readonly phase: "delete" | "insert" | "transaction";

  constructor(
    message: string,
    phase: "delete" | "insert" | "transaction",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreError";
    this.phase = phase;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extraction error taxonomy
 *
 * Every failure that can end an extraction run is one of these classes, so
 * callers (orchestrator, retry policy, HTTP error handler) can branch on
 * `code` and `retryable` instead of parsing messages.
 *
 * Hard (run-aborting): AuthenticationError, FetchError (after retries),
 * ListingParseError, ExportError, ConfigError.
 * Soft (absorbed, logged): DetailParseError, skipped rows.
 * StateWriteError is reported on the result, never thrown to the caller.
 */

import type { BackendKind } from "@/core/domain/PageDescriptor";

export enum ExtractionErrorCode {
  AUTHENTICATION_FAILED = "AUTHENTICATION_FAILED",
  SESSION_EXPIRED = "SESSION_EXPIRED",
  FETCH_TRANSIENT = "FETCH_TRANSIENT",
  FETCH_PERMANENT = "FETCH_PERMANENT",
  LISTING_PARSE_FAILED = "LISTING_PARSE_FAILED",
  DETAIL_PARSE_FAILED = "DETAIL_PARSE_FAILED",
  STATE_WRITE_FAILED = "STATE_WRITE_FAILED",
  EXPORT_FAILED = "EXPORT_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
}

/**
 * Where in a run an error happened
 */
export interface ErrorContext {
  page?: number;
  backend?: BackendKind;
  url?: string;
  orderId?: number;
  status?: number;
}

export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly context: ErrorContext = {},
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

/** Credentials rejected, login page unrecognized, or login unreachable */
export class AuthenticationError extends ExtractionError {
  readonly code = ExtractionErrorCode.AUTHENTICATION_FAILED;
}

/**
 * An authenticated fetch came back as the login page / 401 / 419.
 * The caller invalidates the session and logs in again once.
 */
export class SessionExpiredError extends ExtractionError {
  readonly code = ExtractionErrorCode.SESSION_EXPIRED;
  override readonly retryable = true;
}

export type FetchErrorKind = "transient" | "permanent";

export class FetchError extends ExtractionError {
  readonly code: ExtractionErrorCode;
  override readonly retryable: boolean;

  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    context: ErrorContext = {},
    cause?: unknown,
  ) {
    super(message, context, cause);
    this.retryable = kind === "transient";
    this.code =
      kind === "transient"
        ? ExtractionErrorCode.FETCH_TRANSIENT
        : ExtractionErrorCode.FETCH_PERMANENT;
  }

  static transient(
    message: string,
    context: ErrorContext = {},
    cause?: unknown,
  ): FetchError {
    return new FetchError("transient", message, context, cause);
  }

  static permanent(
    message: string,
    context: ErrorContext = {},
    cause?: unknown,
  ): FetchError {
    return new FetchError("permanent", message, context, cause);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

/** No row container could be located on a listing page */
export class ListingParseError extends ExtractionError {
  readonly code = ExtractionErrorCode.LISTING_PARSE_FAILED;
}

/** The page does not look like an order detail page at all */
export class DetailParseError extends ExtractionError {
  readonly code = ExtractionErrorCode.DETAIL_PARSE_FAILED;
}

/** Cursor persistence failed; the run's progress is not committed */
export class StateWriteError extends ExtractionError {
  readonly code = ExtractionErrorCode.STATE_WRITE_FAILED;
}

/** The export file could not be written */
export class ExportError extends ExtractionError {
  readonly code = ExtractionErrorCode.EXPORT_FAILED;
}

export class ConfigError extends ExtractionError {
  readonly code = ExtractionErrorCode.CONFIG_INVALID;
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

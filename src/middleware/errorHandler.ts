/**
 * Error handler middleware
 *
 * Maps extraction errors to HTTP statuses:
 * - AuthenticationError → 401
 * - FetchError, ListingParseError → 502 (the panel misbehaved)
 * - anything else → 500
 * Body: { success: false, error, message, details? }
 */

/// <reference path="../types/express.d.ts" />

import { Request, Response, NextFunction } from "express";
import { logger as rootLogger } from "@/config/logger";
import {
  AuthenticationError,
  ExtractionError,
  FetchError,
  isExtractionError,
  ListingParseError,
} from "@/core/errors";

export interface ErrorBody {
  success: false;
  error: string;
  message: string;
  details?: unknown;
}

export function statusForError(error: unknown): number {
  if (error instanceof AuthenticationError) {
    return 401;
  }
  if (error instanceof FetchError || error instanceof ListingParseError) {
    return 502;
  }
  return 500;
}

function bodyForError(error: unknown): ErrorBody {
  if (isExtractionError(error)) {
    return {
      success: false,
      error: error.code,
      message: error.message,
      details: extractionDetails(error),
    };
  }
  return {
    success: false,
    error: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : "Internal server error",
  };
}

function extractionDetails(error: ExtractionError): Record<string, unknown> {
  return { retryable: error.retryable, ...error.context };
}

/**
 * Global error handler
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction,
): void {
  const status = statusForError(err);
  const log = req.log ?? rootLogger;

  const error =
    err instanceof Error
      ? { name: err.name, message: err.message, stack: err.stack }
      : String(err);

  if (status >= 500) {
    log.error({ error, request_id: req.id, status }, "Request failed");
  } else {
    log.warn({ error, request_id: req.id, status }, "Request failed");
  }

  res.status(status).json(bodyForError(err));
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  (req.log ?? rootLogger).warn({ path: req.path }, "Route not found");

  const body: ErrorBody = {
    success: false,
    error: "NOT_FOUND",
    message: `Route ${req.method} ${req.path} not found`,
  };
  res.status(404).json(body);
}

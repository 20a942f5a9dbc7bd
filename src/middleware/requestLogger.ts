/**
 * Request logger middleware
 *
 * Assigns a request ID (or reuses X-Request-Id), attaches a request-scoped
 * logger and logs completion with status and duration.
 */

/// <reference path="../types/express.d.ts" />

import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";

/** Polled by orchestration tools; logged at debug only */
const QUIET_PATHS = ["/health"];

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const incoming = req.header("x-request-id");
  const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  const startTime = Date.now();
  const quiet = QUIET_PATHS.includes(req.path);

  const logger = createRequestLogger(requestId, req.method, req.path);
  req.log = logger;
  req.id = requestId;
  res.setHeader("X-Request-Id", requestId);

  logger[quiet ? "debug" : "info"]({ query: req.query, ip: req.ip }, "Request received");

  res.on("finish", () => {
    const payload = {
      status: res.statusCode,
      duration_ms: Date.now() - startTime,
    };
    if (res.statusCode >= 500) {
      logger.error(payload, "Request completed");
    } else if (res.statusCode >= 400) {
      logger.warn(payload, "Request completed");
    } else {
      logger[quiet ? "debug" : "info"](payload, "Request completed");
    }
  });

  next();
}

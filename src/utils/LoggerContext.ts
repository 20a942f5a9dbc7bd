/**
 * Logger context helpers
 *
 * Child loggers carrying request / run identifiers.
 */

import { logger, Logger } from "@/config/logger";

/**
 * Service-scoped logger (server, extractor script)
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service_name: serviceName });
}

/**
 * Request-scoped logger
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - request path
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * Extraction-run logger
 * @param runId - run ID (UUID)
 * @param mode - "full" | "incremental" | "raw_page"
 */
export function createRunLogger(runId: string, mode: string): Logger {
  return logger.child({
    run_id: runId,
    mode,
  });
}

/**
 * Log a line flagged as important (dashboards filter on it)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}

/**
 * Express Request extension
 *
 * - id: request ID (UUID), set by requestLogger
 * - log: request-scoped logger (request_id, method, path)
 */

import type { Logger } from "pino";

declare global {
  namespace Express {
    interface Request {
      id?: string;
      log?: Logger;
    }
  }
}

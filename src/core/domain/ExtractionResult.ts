/**
 * Extraction result payload
 *
 * Returned by the HTTP API and written verbatim to the export file.
 */

import type { OrderRecord } from "@/core/domain/Order";
import type { BackendKind } from "@/core/domain/PageDescriptor";

/**
 * Present only when the caller supplied `limit`
 */
export interface PaginationMetadata {
  /** Smallest id returned (the listing is newest-first, so the window's end) */
  last_id_processed: number | null;
  has_more: boolean;
  limit: number;
  last_id_requested: number | null;
}

/**
 * What happened to the cursor at the end of the run
 * - persisted: cursor advanced and durably written
 * - probe: run bounded by after_id/limit, cursor deliberately untouched
 * - unchanged: nothing newer than the cursor was seen
 * - write_failed: StateWriteError, progress NOT committed
 * - truncated: page limit hit before the previous cursor, cursor not moved
 */
export type CursorMode =
  | "persisted"
  | "probe"
  | "unchanged"
  | "write_failed"
  | "truncated";

export interface CursorOutcome {
  previous: number | null;
  current: number | null;
  advanced: boolean;
  mode: CursorMode;
  error?: string;
}

export interface RunDiagnostics {
  pages_fetched: number;
  parse_failures: number;
  detail_failures: number;
  stopped_early: boolean;
  backend: BackendKind;
  fallback_used: boolean;
}

export interface ExtractionResult {
  total: number;
  generated_at: string;
  records: OrderRecord[];
  pagination?: PaginationMetadata;
  cursor: CursorOutcome;
  diagnostics: RunDiagnostics;
  /** Path of the export file, when export is enabled */
  export_file?: string;
}

/**
 * Part of a result written to the export file (known before the cursor moves)
 */
export type ExportPayload = Pick<
  ExtractionResult,
  "total" | "generated_at" | "records" | "pagination"
>;

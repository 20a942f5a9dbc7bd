/**
 * OrderExtractionService - extraction orchestrator
 *
 * One run = authenticate → walk listing pages → fetch each order's detail →
 * merge → export → advance cursor. Runs are sequential and serialized per
 * process: concurrent callers queue on a mutex instead of racing on the
 * cursor file.
 *
 * Failure policy:
 * - AuthenticationError, FetchError on a listing page, ListingParseError,
 *   ExportError: the run fails, the cursor does not move
 * - any detail fetch/parse failure: the record keeps empty detail fields
 * - StateWriteError: the result is still returned, cursor.mode = write_failed
 * - page limit hit before the threshold: cursor.mode = truncated, not moved
 */

import { Mutex } from "async-mutex";
import { v7 as uuidv7 } from "uuid";
import type { Logger } from "@/config/logger";
import type {
  CursorOutcome,
  ExportPayload,
  ExtractionResult,
  PaginationMetadata,
} from "@/core/domain/ExtractionResult";
import { mergeOrder, OrderRecord, OrderSummary } from "@/core/domain/Order";
import type {
  BackendKind,
  PageDescriptor,
  RawContent,
} from "@/core/domain/PageDescriptor";
import type { ICursorStore } from "@/core/interfaces/ICursorStore";
import type { IResultExporter } from "@/core/interfaces/IResultExporter";
import {
  errorMessage,
  isExtractionError,
  ListingParseError,
  StateWriteError,
} from "@/core/errors";
import type { PageFetcherRequest } from "@/fetchers/FetchBackendFactory";
import type { PageFetcher } from "@/fetchers/PageFetcher";
import type {
  ListingDiagnostics,
  OrderListingExtractor,
} from "@/extractors/OrderListingExtractor";
import type { OrderDetailExtractor } from "@/extractors/OrderDetailExtractor";
import { PaginationWalker, StopReason } from "@/walker/PaginationWalker";
import { createRunLogger, logImportant } from "@/utils/LoggerContext";
import { getUtcTimestamp } from "@/utils/timestamp";

export interface ExtractFullOptions {
  /** Max records to return; also marks the run as a probe */
  limit?: number | null;
  /** Only ids greater than this; also marks the run as a probe */
  afterId?: number | null;
}

export interface ExtractIncrementalOptions {
  /** Overrides the stored cursor as the threshold */
  lastOrderId?: number | null;
}

export interface RawPageResult extends PageDescriptor {
  status: number;
  url: string;
  html: string;
  listing:
    | { ok: true; records: number; hasNextPage: boolean; diagnostics: ListingDiagnostics }
    | { ok: false; error: string };
}

export type RunMode = "full" | "incremental";

interface RunPlan {
  mode: RunMode;
  threshold: number | null;
  limit: number | null;
  /** Probe runs never move the cursor */
  persistCursor: boolean;
}

interface WalkOutcome {
  previous: number | null;
  threshold: number | null;
  stopReason: StopReason | null;
}

export interface OrderExtractionDeps {
  createFetcher: (request: PageFetcherRequest, logger: Logger) => PageFetcher;
  listingExtractor: OrderListingExtractor;
  detailExtractor: OrderDetailExtractor;
  cursorStore: ICursorStore;
  /** null when EXPORT_JSON=false */
  exporter: IResultExporter | null;
  maxPages: number;
  now?: () => Date;
}

export class OrderExtractionService {
  private readonly mutex = new Mutex();

  constructor(private readonly deps: OrderExtractionDeps) {}

  /** A run is in progress (further calls will queue) */
  get isRunning(): boolean {
    return this.mutex.isLocked();
  }

  /**
   * Every order newer than `afterId` (all orders when absent), up to `limit`
   */
  async extractFull(options: ExtractFullOptions = {}): Promise<ExtractionResult> {
    const limit = options.limit ?? null;
    const afterId = options.afterId ?? null;

    return this.exclusive(() =>
      this.run({
        mode: "full",
        threshold: afterId,
        limit,
        persistCursor: afterId === null && limit === null,
      }),
    );
  }

  /**
   * Orders newer than `lastOrderId`, else newer than the stored cursor
   */
  async extractIncremental(
    options: ExtractIncrementalOptions = {},
  ): Promise<ExtractionResult> {
    return this.exclusive(() =>
      this.run({
        mode: "incremental",
        threshold: options.lastOrderId ?? null,
        limit: null,
        persistCursor: true,
      }),
    );
  }

  /**
   * Fetch one listing page as-is on a given backend (no fallback, no cursor)
   */
  async rawPage(page: number, backend: BackendKind): Promise<RawPageResult> {
    return this.exclusive(async () => {
      const log = createRunLogger(uuidv7(), "raw_page");
      const fetcher = this.deps.createFetcher(
        { backend, allowFallback: false },
        log,
      );

      try {
        await fetcher.authenticate();
        const raw = await fetcher.fetch({ kind: "listing", page });
        return { page, ...pickRaw(raw), listing: this.inspectListing(raw) };
      } finally {
        await fetcher.close();
      }
    });
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.mutex.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private async run(plan: RunPlan): Promise<ExtractionResult> {
    const runId = uuidv7();
    const log = createRunLogger(runId, plan.mode);
    const startedAt = Date.now();

    const previous = await this.deps.cursorStore.read();
    const threshold =
      plan.mode === "incremental" ? plan.threshold ?? previous : plan.threshold;

    log.info(
      { threshold, limit: plan.limit, cursor: previous, persist: plan.persistCursor },
      "Extraction run started",
    );

    const fetcher = this.deps.createFetcher({}, log);
    try {
      await fetcher.authenticate();

      const walker = new PaginationWalker(
        (page) => fetcher.fetch({ kind: "listing", page }),
        this.deps.listingExtractor,
        { threshold, maxRecords: plan.limit, maxPages: this.deps.maxPages },
        log,
      );

      const records: OrderRecord[] = [];
      let detailFailures = 0;
      for await (const summary of walker.walk()) {
        const record = await this.enrich(summary, fetcher, log);
        if (!record.ok) {
          detailFailures++;
        }
        records.push(record.value);
      }

      const payload: ExportPayload = {
        total: records.length,
        generated_at: getUtcTimestamp(this.now()),
        records,
        pagination:
          plan.limit !== null
            ? buildPagination(records, plan.limit, plan.threshold)
            : undefined,
      };
      const exportFile = this.deps.exporter
        ? await this.deps.exporter.export(payload)
        : undefined;

      const cursor = await this.advanceCursor(
        plan,
        { previous, threshold, stopReason: walker.diagnostics.stopReason },
        records,
        log,
      );

      const result: ExtractionResult = {
        ...payload,
        cursor,
        diagnostics: {
          pages_fetched: walker.diagnostics.pagesFetched,
          parse_failures: walker.diagnostics.parseFailures,
          detail_failures: detailFailures,
          stopped_early: walker.stoppedEarly,
          backend: fetcher.backend,
          fallback_used: fetcher.fallbackUsed,
        },
        export_file: exportFile,
      };

      logImportant(log, "Extraction run finished", {
        total: result.total,
        cursor_mode: cursor.mode,
        cursor: cursor.current,
        ...result.diagnostics,
        duration_ms: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      log.error(
        { error: errorMessage(error), duration_ms: Date.now() - startedAt },
        "Extraction run failed",
      );
      throw error;
    } finally {
      await fetcher.close();
    }
  }

  /**
   * Listing row + detail page; detail failures keep the row with empty fields
   */
  private async enrich(
    summary: OrderSummary,
    fetcher: PageFetcher,
    log: Logger,
  ): Promise<{ ok: boolean; value: OrderRecord }> {
    if (!summary.detalhes_url) {
      log.warn({ order_id: summary.id }, "Order row has no detail link");
      return { ok: false, value: mergeOrder(summary, null) };
    }

    try {
      const raw = await fetcher.fetch({
        kind: "detail",
        orderId: summary.id,
        url: summary.detalhes_url,
      });
      const detail = this.deps.detailExtractor.extractDetail(raw.html);
      return { ok: true, value: mergeOrder(summary, detail) };
    } catch (error) {
      // Includes AuthenticationError from a failed re-login on this page
      if (!isExtractionError(error)) {
        throw error;
      }
      log.warn(
        { order_id: summary.id, url: summary.detalhes_url, error: errorMessage(error) },
        "Order detail unavailable, keeping listing fields only",
      );
      return { ok: false, value: mergeOrder(summary, null) };
    }
  }

  /**
   * Move the cursor to max(previous, highest id seen), never backwards.
   * A walk cut by the page limit before reaching the threshold leaves a gap
   * of unvisited newer orders, so the cursor stays put.
   */
  private async advanceCursor(
    plan: RunPlan,
    walk: WalkOutcome,
    records: OrderRecord[],
    log: Logger,
  ): Promise<CursorOutcome> {
    const { previous } = walk;
    const unchanged = { previous, current: previous, advanced: false };

    if (!plan.persistCursor) {
      return { ...unchanged, mode: "probe" };
    }
    if (walk.stopReason === "max_pages" && walk.threshold !== null) {
      log.warn(
        { threshold: walk.threshold, previous },
        "Page limit reached before the last processed order, cursor not moved",
      );
      return { ...unchanged, mode: "truncated" };
    }

    const maxSeen = records.reduce<number | null>(
      (max, record) => (max === null || record.id > max ? record.id : max),
      null,
    );
    if (maxSeen === null || (previous !== null && maxSeen <= previous)) {
      return { ...unchanged, mode: "unchanged" };
    }

    try {
      await this.deps.cursorStore.write(maxSeen);
    } catch (error) {
      if (!(error instanceof StateWriteError)) {
        throw error;
      }
      log.error(
        { cursor: maxSeen, previous, error: error.message },
        "Cursor write failed, progress not committed",
      );
      return { ...unchanged, mode: "write_failed", error: error.message };
    }

    return { previous, current: maxSeen, advanced: true, mode: "persisted" };
  }

  private inspectListing(raw: RawContent): RawPageResult["listing"] {
    try {
      const listing = this.deps.listingExtractor.extractListing(raw.html);
      return {
        ok: true,
        records: listing.records.length,
        hasNextPage: listing.hasNextPage,
        diagnostics: listing.diagnostics,
      };
    } catch (error) {
      if (error instanceof ListingParseError) {
        return { ok: false, error: error.message };
      }
      throw error;
    }
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}

function pickRaw(raw: RawContent): Omit<RawPageResult, "page" | "listing"> {
  return { backend: raw.backend, status: raw.status, url: raw.url, html: raw.html };
}

/**
 * Window metadata of a limited run (listing is newest-first)
 */
export function buildPagination(
  records: OrderRecord[],
  limit: number,
  lastIdRequested: number | null,
): PaginationMetadata {
  return {
    last_id_processed:
      records.length > 0 ? Math.min(...records.map((record) => record.id)) : null,
    has_more: records.length === limit,
    limit,
    last_id_requested: lastIdRequested,
  };
}

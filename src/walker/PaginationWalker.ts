/**
 * Pagination walker
 *
 * START → FETCHING(n) → EXTRACTING(n) → CONTINUE(n+1) | STOP
 *
 * Lazily walks listing pages newest-first and yields summary records. Stops
 * at the first page holding an id <= threshold (yielding only the newer rows
 * of that page), on the last page, after `maxRecords`, or after `maxPages`.
 * A walker is single-use: it can be iterated once.
 */

import type { Logger } from "@/config/logger";
import type { OrderSummary } from "@/core/domain/Order";
import type { RawContent } from "@/core/domain/PageDescriptor";
import type {
  ListingExtraction,
  OrderListingExtractor,
} from "@/extractors/OrderListingExtractor";
import { ListingParseError } from "@/core/errors";

export type WalkState = "START" | "FETCHING" | "EXTRACTING" | "CONTINUE" | "STOP";

export type StopReason = "threshold" | "last_page" | "max_records" | "max_pages";

export interface WalkOptions {
  /** Only ids strictly greater than this are yielded */
  threshold?: number | null;
  maxRecords?: number | null;
  maxPages: number;
}

export interface WalkDiagnostics {
  pagesFetched: number;
  parseFailures: number;
  /** Rows seen twice because the listing shifted while walking */
  duplicatesSkipped: number;
  stopReason: StopReason | null;
}

export type ListingPageSource = (page: number) => Promise<RawContent>;

export class PaginationWalker {
  private state: WalkState = "START";
  private readonly stats: WalkDiagnostics = {
    pagesFetched: 0,
    parseFailures: 0,
    duplicatesSkipped: 0,
    stopReason: null,
  };

  constructor(
    private readonly fetchPage: ListingPageSource,
    private readonly extractor: OrderListingExtractor,
    private readonly options: WalkOptions,
    private readonly logger: Logger,
  ) {}

  get diagnostics(): Readonly<WalkDiagnostics> {
    return this.stats;
  }

  get currentState(): WalkState {
    return this.state;
  }

  /**
   * Stopped for any reason other than reaching the last page
   */
  get stoppedEarly(): boolean {
    return this.stats.stopReason !== null && this.stats.stopReason !== "last_page";
  }

  /**
   * @throws FetchError | AuthenticationError | ListingParseError
   */
  async *walk(): AsyncGenerator<OrderSummary, void, undefined> {
    if (this.state !== "START") {
      throw new Error("PaginationWalker can only be iterated once");
    }

    const threshold = this.options.threshold ?? null;
    const maxRecords = this.options.maxRecords ?? null;
    const seen = new Set<number>();
    let yielded = 0;
    let page = 1;

    if (maxRecords !== null && maxRecords <= 0) {
      this.stop("max_records", page);
      return;
    }

    while (true) {
      this.state = "FETCHING";
      const raw = await this.fetchPage(page);
      this.stats.pagesFetched++;

      this.state = "EXTRACTING";
      const listing = this.extractListing(raw, page);
      this.stats.parseFailures += listing.diagnostics.parseFailures;

      this.logger.debug(
        {
          page,
          rows: listing.diagnostics.rowCount,
          selector: listing.diagnostics.matchedSelector,
          parse_failures: listing.diagnostics.parseFailures,
        },
        "Listing page extracted",
      );

      const reachedThreshold =
        threshold !== null &&
        listing.records.some((record) => record.id <= threshold);

      for (const record of listing.records) {
        if (threshold !== null && record.id <= threshold) {
          continue;
        }
        if (seen.has(record.id)) {
          this.stats.duplicatesSkipped++;
          continue;
        }
        seen.add(record.id);
        yield record;
        yielded++;

        if (maxRecords !== null && yielded >= maxRecords) {
          this.stop("max_records", page);
          return;
        }
      }

      if (reachedThreshold) {
        this.stop("threshold", page);
        return;
      }
      if (!listing.hasNextPage) {
        this.stop("last_page", page);
        return;
      }
      if (page >= this.options.maxPages) {
        this.logger.warn(
          { max_pages: this.options.maxPages },
          "Page limit reached before the end of the listing",
        );
        this.stop("max_pages", page);
        return;
      }

      this.state = "CONTINUE";
      page++;
    }
  }

  private extractListing(raw: RawContent, page: number): ListingExtraction {
    try {
      return this.extractor.extractListing(raw.html);
    } catch (error) {
      if (error instanceof ListingParseError) {
        throw new ListingParseError(
          error.message,
          { page, backend: raw.backend, url: raw.url },
          error,
        );
      }
      throw error;
    }
  }

  private stop(reason: StopReason, page: number): void {
    this.state = "STOP";
    this.stats.stopReason = reason;
    this.logger.debug({ reason, page }, "Listing walk stopped");
  }
}

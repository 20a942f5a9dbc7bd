/**
 * Order listing extractor
 *
 * Turns one listing page into summary records. Row containers and fields are
 * located through ordered selector candidates so a markup change in one
 * layout variant degrades to the next candidate instead of failing the page.
 */

import { ListingParseError } from "@/core/errors";
import type { OrderSummary } from "@/core/domain/Order";
import {
  cleanText,
  Doc,
  firstAttr,
  firstText,
  loadHtml,
  Nodes,
  resolveUrl,
} from "@/extractors/common/DOMHelper";
import { firstMatch, FieldStrategy } from "@/extractors/common/FieldStrategy";
import { matchPattern, parseOrderId } from "@/extractors/common/TextPatterns";

/**
 * Row container candidates, highest priority first
 */
export const ROW_SELECTORS = [
  ".nk-tb-item:not(.nk-tb-head)",
  "table tbody tr",
  "tr[data-id]",
  "[data-order-id]",
  ".order-row",
] as const;

/** A listing page with zero orders still renders one of these */
const EMPTY_STATE_SELECTORS = [
  ".nk-tb-list",
  ".empty-state",
  ".no-results",
  "[data-empty-state]",
];
const EMPTY_STATE_TEXT =
  /nenhum (pedido|registro|resultado)|no (orders|records|results) found/i;

const NEXT_PAGE_SELECTORS = [
  "a[rel='next']",
  ".pagination .next",
  ".page-item.next",
  ".page-next",
];

/** Status dot colour classes, when a row has no badge */
const STATUS_BY_DOT_CLASS: Record<string, string> = {
  "bg-success": "Aprovado",
  "bg-danger": "Cancelado",
  "bg-warning": "Pendente",
};

export interface ListingDiagnostics {
  /** Row selector that matched ("" on an empty-state page) */
  matchedSelector: string;
  rowCount: number;
  /** Rows skipped because no order id could be read */
  parseFailures: number;
}

export interface ListingExtraction {
  records: OrderSummary[];
  hasNextPage: boolean;
  diagnostics: ListingDiagnostics;
}

type RowStrategy = FieldStrategy<Nodes>;

export class OrderListingExtractor {
  constructor(private readonly baseUrl: string) {}

  /**
   * @throws ListingParseError - no row container and no empty-state marker
   */
  extractListing(html: string): ListingExtraction {
    const $ = loadHtml(html);
    const match = this.findRows($);

    if (!match) {
      if (this.isEmptyState($)) {
        return {
          records: [],
          hasNextPage: false,
          diagnostics: { matchedSelector: "", rowCount: 0, parseFailures: 0 },
        };
      }
      throw new ListingParseError(
        `No order rows found (tried ${ROW_SELECTORS.join(", ")})`,
      );
    }

    const records: OrderSummary[] = [];
    let parseFailures = 0;

    for (const row of match.rows) {
      const record = this.extractRow(row);
      if (record) {
        records.push(record);
      } else {
        parseFailures++;
      }
    }

    return {
      records,
      hasNextPage: this.hasNextPage($),
      diagnostics: {
        matchedSelector: match.selector,
        rowCount: match.rows.length,
        parseFailures,
      },
    };
  }

  /**
   * First candidate with at least one non-empty, non-header row
   */
  private findRows($: Doc): { selector: string; rows: Nodes[] } | null {
    for (const selector of ROW_SELECTORS) {
      const rows = $(selector)
        .toArray()
        .map((element) => $(element))
        .filter(
          (row) =>
            cleanText(row.text()) !== "" &&
            !row.hasClass("nk-tb-head") &&
            row.find("th").length === 0,
        );

      if (rows.length > 0) {
        return { selector, rows };
      }
    }
    return null;
  }

  private isEmptyState($: Doc): boolean {
    return (
      EMPTY_STATE_SELECTORS.some((selector) => $(selector).length > 0) ||
      EMPTY_STATE_TEXT.test($.root().text())
    );
  }

  private hasNextPage($: Doc): boolean {
    for (const selector of NEXT_PAGE_SELECTORS) {
      const link = $(selector).first();
      if (link.length === 0) {
        continue;
      }
      const disabled =
        link.hasClass("disabled") ||
        link.attr("aria-disabled") === "true" ||
        link.closest(".disabled").length > 0;
      if (!disabled) {
        return true;
      }
    }
    return false;
  }

  /**
   * One row → summary; null when the row carries no usable id
   */
  private extractRow(row: Nodes): OrderSummary | null {
    const id = this.extractId(row);
    if (id === null) {
      return null;
    }

    const userInfos = row.find(".user-card .user-info");

    return {
      id,
      criado: firstMatch(row, CREATED_STRATEGIES),
      status: firstMatch(row, STATUS_STRATEGIES),
      sorteio: firstText(userInfos.eq(0), ".tb-lead"),
      bilhetes_totais_sorteio: firstText(
        row,
        "[data-field='bilhetes_totais_sorteio']",
      ),
      cliente:
        userInfos.length > 1 ? firstText(userInfos.eq(1), ".tb-lead") : "",
      telefone: firstText(row, ".whatsapp-message-link").replace(/^\+?\s*/, ""),
      qtd_bilhetes: firstText(row, ".nk-tb-col.tb-col-md .tb-sub.text-primary"),
      valor: firstMatch(row, VALUE_STRATEGIES),
      detalhes_url: resolveUrl(
        firstAttr(row, 'a[href*="detalhes"]', "href") ??
          firstAttr(row, 'a[href*="/pedidos/"]', "href"),
        this.baseUrl,
      ),
    };
  }

  private extractId(row: Nodes): number | null {
    const candidates = [
      firstAttr(row, "input.model-id-checkbox", "value"),
      row.attr("data-id"),
      row.attr("data-order-id"),
      firstText(row, ".nk-tb-col:first-child .tb-lead a"),
    ];
    for (const candidate of candidates) {
      const id = parseOrderId(candidate);
      if (id !== null) {
        return id;
      }
    }
    return null;
  }
}

const CREATED_STRATEGIES: readonly RowStrategy[] = [
  (row) =>
    firstAttr(
      row,
      ".nk-tb-col.tb-col-md .tb-lead[data-original-title]",
      "data-original-title",
    ),
  (row) => firstText(row, ".nk-tb-col.tb-col-md .tb-lead[data-original-title]"),
];

const STATUS_STRATEGIES: readonly RowStrategy[] = [
  (row) => firstText(row, ".nk-tb-col.tb-col-xl .badge"),
  (row) => firstText(row, ".badge"),
  (row) => {
    const dot = row.find(".dot").first();
    const colour = Object.keys(STATUS_BY_DOT_CLASS).find((name) =>
      dot.hasClass(name),
    );
    return colour ? STATUS_BY_DOT_CLASS[colour] : undefined;
  },
];

const VALUE_STRATEGIES: readonly RowStrategy[] = [
  (row) => {
    const text = firstText(row, ".nk-tb-col.tb-col-sm .tb-lead");
    return matchPattern("MONEY", text) || text;
  },
];

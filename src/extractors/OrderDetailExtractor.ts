/**
 * Order detail extractor
 *
 * Every field has ordered strategies: structured selectors first, then a
 * labelled value in the page text, then a bare pattern match. A field with
 * no hit is "" (descontos defaults to "R$ 0,00").
 */

import { DetailParseError } from "@/core/errors";
import type { OrderDetail } from "@/core/domain/Order";
import {
  Doc,
  documentText,
  loadHtml,
  selectText,
} from "@/extractors/common/DOMHelper";
import { firstMatch, FieldStrategy } from "@/extractors/common/FieldStrategy";
import {
  matchPattern,
  TEXT_PATTERNS,
  TextPatternName,
} from "@/extractors/common/TextPatterns";

/** At least one of these must exist on a detail page */
export const DETAIL_CONTAINER_SELECTORS = [
  ".invoice",
  ".invoice-contact-info",
  ".nk-block",
  "[data-order-detail]",
] as const;

export const NO_DISCOUNT = "R$ 0,00";

interface DetailScope {
  $: Doc;
  /** Whole page text, whitespace collapsed */
  text: string;
}

type DetailStrategy = FieldStrategy<DetailScope>;

const bySelector =
  (selector: string, pattern?: TextPatternName): DetailStrategy =>
  ({ $ }) => {
    const text = selectText($, selector);
    return pattern ? matchPattern(pattern, text) : text;
  };

/**
 * Pattern match within the text right after a label ("Nascimento: 01/02/1990")
 */
const byLabel =
  (label: RegExp, pattern: TextPatternName): DetailStrategy =>
  ({ text }) => {
    const found = label.exec(text);
    if (!found) {
      return undefined;
    }
    const tail = text.slice(found.index + found[0].length, found.index + found[0].length + 60);
    const value = TEXT_PATTERNS[pattern].exec(tail);
    return value && value.index <= 5 ? value[0] : undefined;
  };

const byPattern =
  (pattern: TextPatternName): DetailStrategy =>
  ({ text }) =>
    matchPattern(pattern, text);

const INVOICE_FOOTER = (row: string) =>
  [
    `table.invoice-bills table tfoot tr:${row} td:last-child`,
    `table tfoot tr:${row} td:last-child`,
  ].map((selector) => bySelector(selector));

const FIELD_STRATEGIES: Record<keyof OrderDetail, readonly DetailStrategy[]> = {
  detalhe_data_hora: [
    bySelector("[data-field='data_hora'], .data-hora, .pedido-data", "DATETIME"),
    bySelector("[data-field='data_hora'], .data-hora, .pedido-data", "DATE"),
    byPattern("DATETIME"),
    byPattern("DATE"),
  ],
  detalhe_email: [
    bySelector(".invoice-contact-info ul.list-plain li:first-child span", "EMAIL"),
    bySelector(".invoice-contact-info li:first-child span", "EMAIL"),
    byPattern("EMAIL"),
  ],
  detalhe_telefone: [
    bySelector(".telefone, [data-field='telefone']"),
    byLabel(/telefone|whatsapp|celular/i, "PHONE"),
    byPattern("PHONE"),
  ],
  detalhe_cpf: [
    bySelector(".cpf, [data-field='cpf']"),
    byPattern("CPF"),
  ],
  detalhe_nascimento: [
    bySelector(".nascimento, [data-field='nascimento']"),
    byLabel(/nascimento/i, "DATE"),
  ],
  detalhe_data_compra: [
    bySelector(".data-compra, [data-field='data_compra']"),
    byLabel(/data (da|de) compra/i, "DATE"),
    byPattern("DATE"),
  ],
  detalhe_pagamento_id: [
    bySelector(".pagamento-id, [data-field='pagamento_id'], .transaction-id"),
  ],
  detalhe_subtotal: [...INVOICE_FOOTER("first-child"), byPattern("MONEY")],
  detalhe_descontos: [...INVOICE_FOOTER("nth-child(2)")],
  detalhe_total: [...INVOICE_FOOTER("last-child"), byPattern("MONEY")],
};

export class OrderDetailExtractor {
  /**
   * @throws DetailParseError - the page has no detail container at all
   */
  extractDetail(html: string): OrderDetail {
    const $ = loadHtml(html);

    if (!DETAIL_CONTAINER_SELECTORS.some((selector) => $(selector).length > 0)) {
      throw new DetailParseError(
        `Not an order detail page (none of ${DETAIL_CONTAINER_SELECTORS.join(", ")})`,
      );
    }

    const scope: DetailScope = { $, text: documentText($) };
    const field = (name: keyof OrderDetail, fallback = "") =>
      firstMatch(scope, FIELD_STRATEGIES[name], fallback);

    return {
      detalhe_data_hora: field("detalhe_data_hora"),
      detalhe_email: field("detalhe_email"),
      detalhe_telefone: field("detalhe_telefone"),
      detalhe_cpf: field("detalhe_cpf"),
      detalhe_nascimento: field("detalhe_nascimento"),
      detalhe_data_compra: field("detalhe_data_compra"),
      detalhe_pagamento_id: field("detalhe_pagamento_id"),
      detalhe_subtotal: field("detalhe_subtotal"),
      detalhe_descontos: field("detalhe_descontos", NO_DISCOUNT),
      detalhe_total: field("detalhe_total"),
    };
  }
}

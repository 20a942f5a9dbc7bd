/**
 * OrderDetailExtractor unit tests
 */

import { describe, it, expect } from "@jest/globals";
import { DetailParseError } from "@/core/errors";
import { OrderDetailExtractor } from "@/extractors/OrderDetailExtractor";
import { detailPage, LOGIN_PAGE } from "../helpers/panelPages";

describe("OrderDetailExtractor", () => {
  const extractor = new OrderDetailExtractor();

  it("extracts every field from a complete invoice", () => {
    expect(extractor.extractDetail(detailPage())).toEqual({
      detalhe_data_hora: "22/11/2025 01:12:55",
      detalhe_email: "maria@example.com",
      detalhe_telefone: "+55 11 98765-4321",
      detalhe_cpf: "123.456.789-00",
      detalhe_nascimento: "01/02/1990",
      detalhe_data_compra: "21/11/2025",
      detalhe_pagamento_id: "pix-0001",
      detalhe_subtotal: "R$ 50,00",
      detalhe_descontos: "R$ 5,00",
      detalhe_total: "R$ 45,00",
    });
  });

  it("falls back to labelled text and defaults", () => {
    const detail = extractor.extractDetail(
      `<html><body><div class="invoice">
        <p>WhatsApp: 11 98765-4321</p>
      </div></body></html>`,
    );

    expect(detail.detalhe_telefone).toBe("11 98765-4321");
    expect(detail.detalhe_descontos).toBe("R$ 0,00");
    expect(detail.detalhe_subtotal).toBe("");
    expect(detail.detalhe_total).toBe("");
    expect(detail.detalhe_email).toBe("");
  });

  it("does not take the purchase date as the birth date", () => {
    const detail = extractor.extractDetail(
      `<html><body><div class="invoice"><p>Data da compra: 21/11/2025</p></div></body></html>`,
    );

    expect(detail.detalhe_data_compra).toBe("21/11/2025");
    expect(detail.detalhe_nascimento).toBe("");
  });

  it("throws DetailParseError when the page is not a detail page", () => {
    expect(() => extractor.extractDetail(LOGIN_PAGE)).toThrow(DetailParseError);
  });
});

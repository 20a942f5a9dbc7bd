/**
 * OrderListingExtractor unit tests
 */

import { describe, it, expect } from "@jest/globals";
import { ListingParseError } from "@/core/errors";
import { OrderListingExtractor } from "@/extractors/OrderListingExtractor";
import { BASE_URL, listingPage } from "../helpers/panelPages";

describe("OrderListingExtractor", () => {
  const extractor = new OrderListingExtractor(BASE_URL);

  it("extracts every field of a row", () => {
    const listing = extractor.extractListing(listingPage([1313]));

    expect(listing.records).toEqual([
      {
        id: 1313,
        criado: "22/11/2025 01:12:55",
        status: "Aprovado",
        sorteio: "Rifa do Carro",
        bilhetes_totais_sorteio: "1000",
        cliente: "Maria Souza",
        telefone: "55 11 98765-4321",
        qtd_bilhetes: "3",
        valor: "R$ 25,00",
        detalhes_url: "https://panel.example.com/pedidos/1313/detalhes",
      },
    ]);
    expect(listing.diagnostics).toEqual({
      matchedSelector: ".nk-tb-item:not(.nk-tb-head)",
      rowCount: 1,
      parseFailures: 0,
    });
  });

  it("keeps page order and skips the header row", () => {
    const listing = extractor.extractListing(listingPage([1315, 1314, 1313]));

    expect(listing.records.map((record) => record.id)).toEqual([1315, 1314, 1313]);
  });

  it("reads the next-page link", () => {
    expect(extractor.extractListing(listingPage([2], true)).hasNextPage).toBe(true);
    expect(extractor.extractListing(listingPage([1], false)).hasNextPage).toBe(false);
  });

  it("leaves detalhes_url empty when a row has no link", () => {
    const listing = extractor.extractListing(
      listingPage([{ id: 9, detailHref: null }]),
    );

    expect(listing.records[0].detalhes_url).toBe("");
  });

  it("counts rows without an id as parse failures", () => {
    const html = `<html><body><table><tbody>
      <tr data-id="77"><td>Pedido 77</td><td><a href="/pedidos/77">ver</a></td></tr>
      <tr><td>linha sem identificador</td></tr>
    </tbody></table></body></html>`;

    const listing = extractor.extractListing(html);

    expect(listing.records.map((record) => record.id)).toEqual([77]);
    expect(listing.records[0].detalhes_url).toBe("https://panel.example.com/pedidos/77");
    expect(listing.diagnostics).toEqual({
      matchedSelector: "table tbody tr",
      rowCount: 2,
      parseFailures: 1,
    });
  });

  it("treats an empty listing as zero records", () => {
    const listing = extractor.extractListing(listingPage([]));

    expect(listing.records).toEqual([]);
    expect(listing.hasNextPage).toBe(false);
  });

  it("recognizes an empty-state message", () => {
    const listing = extractor.extractListing(
      "<html><body><p>Nenhum pedido encontrado</p></body></html>",
    );

    expect(listing.records).toEqual([]);
  });

  it("throws ListingParseError on an unrecognized page", () => {
    expect(() =>
      extractor.extractListing("<html><body><h1>Erro interno</h1></body></html>"),
    ).toThrow(ListingParseError);
  });
});

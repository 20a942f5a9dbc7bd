/**
 * Order records
 *
 * Field names are the panel's export contract (the keys downstream
 * automations already consume), so they stay in the panel's language.
 */

/**
 * One row of the order listing
 */
export interface OrderSummary {
  /** Vendor-assigned, increases with creation order, may have gaps */
  id: number;
  /** Creation label as shown ("1 hora atrás" or a full date) */
  criado: string;
  status: string;
  /** Raffle / prize name */
  sorteio: string;
  bilhetes_totais_sorteio: string;
  cliente: string;
  telefone: string;
  /** Tickets bought in this order */
  qtd_bilhetes: string;
  valor: string;
  /** Absolute URL of the detail page ("" when the row has no link) */
  detalhes_url: string;
}

/**
 * Enrichment scraped from an order's detail page
 */
export interface OrderDetail {
  detalhe_data_hora: string;
  detalhe_email: string;
  detalhe_telefone: string;
  /** Document id (CPF) */
  detalhe_cpf: string;
  detalhe_nascimento: string;
  detalhe_data_compra: string;
  detalhe_pagamento_id: string;
  detalhe_subtotal: string;
  detalhe_descontos: string;
  detalhe_total: string;
}

/**
 * Listing row merged with its detail page
 */
export type OrderRecord = OrderSummary & OrderDetail;

/**
 * Detail with every field set to "" (used when a detail fetch fails)
 */
export function emptyOrderDetail(): OrderDetail {
  return {
    detalhe_data_hora: "",
    detalhe_email: "",
    detalhe_telefone: "",
    detalhe_cpf: "",
    detalhe_nascimento: "",
    detalhe_data_compra: "",
    detalhe_pagamento_id: "",
    detalhe_subtotal: "",
    detalhe_descontos: "",
    detalhe_total: "",
  };
}

export function mergeOrder(
  summary: OrderSummary,
  detail: OrderDetail | null,
): OrderRecord {
  return { ...summary, ...(detail ?? emptyOrderDetail()) };
}

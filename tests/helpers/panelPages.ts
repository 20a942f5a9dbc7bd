/**
 * HTML builders shaped like the panel's listing and detail pages
 */

export const BASE_URL = "https://panel.example.com";

export interface RowFixture {
  id: number;
  status?: string;
  cliente?: string;
  valor?: string;
  /** null renders the row without a detail link */
  detailHref?: string | null;
}

export function listingRow(row: RowFixture): string {
  const href =
    row.detailHref === undefined ? `/pedidos/${row.id}/detalhes` : row.detailHref;
  const idCell = href ? `<a href="${href}">#${row.id}</a>` : `#${row.id}`;

  return `
    <div class="nk-tb-item">
      <div class="nk-tb-col">
        <input type="checkbox" class="model-id-checkbox" value="${row.id}">
        <span class="tb-lead">${idCell}</span>
      </div>
      <div class="nk-tb-col tb-col-md">
        <span class="tb-lead" data-original-title="22/11/2025 01:12:55">1 hora atrás</span>
      </div>
      <div class="nk-tb-col">
        <div class="user-card"><div class="user-info"><span class="tb-lead">Rifa do Carro</span></div></div>
      </div>
      <div class="nk-tb-col">
        <div class="user-card"><div class="user-info">
          <span class="tb-lead">${row.cliente ?? "Maria Souza"}</span>
          <a class="whatsapp-message-link" href="#">+55 11 98765-4321</a>
        </div></div>
      </div>
      <div class="nk-tb-col tb-col-md"><span class="tb-sub text-primary">3</span></div>
      <div class="nk-tb-col tb-col-sm"><span class="tb-lead">${row.valor ?? "R$ 25,00"}</span></div>
      <div class="nk-tb-col tb-col-xl"><span class="badge">${row.status ?? "Aprovado"}</span></div>
      <span data-field="bilhetes_totais_sorteio">1000</span>
    </div>`;
}

/**
 * Listing page; `hasNext` renders an enabled or a disabled next link
 */
export function listingPage(
  rows: Array<number | RowFixture>,
  hasNext = false,
): string {
  const body = rows
    .map((row) => listingRow(typeof row === "number" ? { id: row } : row))
    .join("");
  const next = hasNext
    ? `<li class="page-item next"><a class="page-link" rel="next" href="?page=2">›</a></li>`
    : `<li class="page-item next disabled"><span class="page-link">›</span></li>`;

  return `<html><body>
    <div class="nk-tb-list">
      <div class="nk-tb-item nk-tb-head"><div class="nk-tb-col"><span>Pedido</span></div></div>
      ${body}
    </div>
    <ul class="pagination">${next}</ul>
  </body></html>`;
}

export interface DetailFixture {
  email?: string;
  total?: string;
}

export function detailPage(detail: DetailFixture = {}): string {
  return `<html><body>
    <div class="nk-block">
      <div class="invoice">
        <div class="invoice-contact-info">
          <ul class="list-plain">
            <li><em class="icon ni ni-mail"></em><span>${detail.email ?? "maria@example.com"}</span></li>
            <li><span class="telefone">+55 11 98765-4321</span></li>
            <li><span class="cpf">123.456.789-00</span></li>
            <li>Nascimento: 01/02/1990</li>
          </ul>
        </div>
        <div class="invoice-desc">
          <span class="data-hora">22/11/2025 01:12:55</span>
          <p>Data da compra: 21/11/2025</p>
          <span class="pagamento-id">pix-0001</span>
        </div>
        <table class="invoice-bills"><tbody><tr><td>
          <table>
            <tfoot>
              <tr><td colspan="2">Subtotal</td><td>R$ 50,00</td></tr>
              <tr><td colspan="2">Descontos</td><td>R$ 5,00</td></tr>
              <tr><td colspan="2">Total</td><td>${detail.total ?? "R$ 45,00"}</td></tr>
            </tfoot>
          </table>
        </td></tr></tbody></table>
      </div>
    </div>
  </body></html>`;
}

export const LOGIN_PAGE = `<html><head><meta name="csrf-token" content="meta-token"></head><body>
  <form method="POST" action="/login">
    <input type="hidden" name="_token" value="form-token">
    <input type="email" name="email">
    <input type="password" name="password">
    <button type="submit">Entrar</button>
  </form>
</body></html>`;

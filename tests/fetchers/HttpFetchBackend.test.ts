/**
 * HttpFetchBackend unit tests (fetch answered in-process)
 */

import { describe, it, expect, afterEach, jest } from "@jest/globals";
import { CookieJar } from "@/auth/CookieJar";
import { HttpAuthenticator } from "@/auth/HttpAuthenticator";
import type { HttpSession } from "@/core/domain/Session";
import { FetchError, SessionExpiredError } from "@/core/errors";
import { HttpFetchBackend, listingPageUrl } from "@/fetchers/HttpFetchBackend";
import { BASE_URL, detailPage, listingPage, LOGIN_PAGE } from "../helpers/panelPages";
import {
  htmlResponse,
  mockPanelFetch,
  redirectResponse,
} from "../helpers/fakePanel";

const urls = {
  base: BASE_URL,
  login: `${BASE_URL}/login`,
  listing: `${BASE_URL}/pedidos`,
};

function createBackend(): HttpFetchBackend {
  const authenticator = new HttpAuthenticator({
    urls,
    credentials: { email: "operator@example.com", password: "test-secret" },
    requestTimeoutMs: 1000,
    retry: { maxAttempts: 1, delayMs: 0, maxDelayMs: 0, backoff: "fixed" },
  });
  return new HttpFetchBackend(authenticator, { urls, requestTimeoutMs: 1000 });
}

function createSession(): HttpSession {
  const cookies = new CookieJar();
  cookies.storeLine("panel_session=abc");
  return { backend: "http", cookies, csrfToken: "form-token", createdAt: new Date() };
}

describe("listingPageUrl", () => {
  it("sets the page parameter and keeps existing filters", () => {
    expect(listingPageUrl(`${BASE_URL}/pedidos?status=pago`, 3)).toBe(
      `${BASE_URL}/pedidos?status=pago&page=3`,
    );
  });
});

describe("HttpFetchBackend", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("fetches a listing page with the session cookies", async () => {
    const html = listingPage([1313]);
    const { requests } = mockPanelFetch(() => htmlResponse(html));

    const raw = await createBackend().fetch({ kind: "listing", page: 2 }, createSession());

    expect(raw).toEqual({
      html,
      status: 200,
      url: `${BASE_URL}/pedidos?page=2`,
      backend: "http",
    });
    expect(requests[0].cookie).toBe("panel_session=abc");
  });

  it("fetches a detail page by its own URL", async () => {
    const { requests } = mockPanelFetch(() => htmlResponse(detailPage()));

    await createBackend().fetch(
      { kind: "detail", orderId: 7, url: `${BASE_URL}/pedidos/7/detalhes` },
      createSession(),
    );

    expect(requests[0].url).toBe(`${BASE_URL}/pedidos/7/detalhes`);
  });

  it("reports a 419 as an expired session", async () => {
    mockPanelFetch(() => htmlResponse("Page Expired", 419));

    await expect(
      createBackend().fetch({ kind: "listing", page: 1 }, createSession()),
    ).rejects.toThrow(SessionExpiredError);
  });

  it("reports a redirect to the login page as an expired session", async () => {
    mockPanelFetch(({ url }) =>
      url.endsWith("/login") ? htmlResponse(LOGIN_PAGE) : redirectResponse("/login"),
    );

    await expect(
      createBackend().fetch({ kind: "listing", page: 1 }, createSession()),
    ).rejects.toThrow("Redirected to the login page");
  });

  it("classifies server errors as transient and client errors as permanent", async () => {
    mockPanelFetch(({ url }) =>
      url.includes("page=1") ? htmlResponse("Bad Gateway", 502) : htmlResponse("Not Found", 404),
    );
    const backend = createBackend();

    const transient = await backend
      .fetch({ kind: "listing", page: 1 }, createSession())
      .catch((caught: unknown) => caught);
    const permanent = await backend
      .fetch({ kind: "listing", page: 2 }, createSession())
      .catch((caught: unknown) => caught);

    expect(transient).toBeInstanceOf(FetchError);
    expect(transient).toMatchObject({ kind: "transient", retryable: true, context: { status: 502 } });
    expect(permanent).toMatchObject({ kind: "permanent", retryable: false, context: { status: 404 } });
  });

  it("classifies a timeout as transient", async () => {
    mockPanelFetch(() => {
      throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
    });

    await expect(
      createBackend().fetch({ kind: "listing", page: 1 }, createSession()),
    ).rejects.toMatchObject({ kind: "transient", message: "Request timeout" });
  });
});

/**
 * API v1 route tests (supertest against createApp with a stubbed service)
 */

import { describe, it, expect, jest } from "@jest/globals";
import request from "supertest";
import { createApp } from "@/app";
import type { OrderExtractionApi } from "@/controllers/OrderController";
import type { ExtractionResult } from "@/core/domain/ExtractionResult";
import {
  AuthenticationError,
  FetchError,
  ListingParseError,
} from "@/core/errors";
import type { RawPageResult } from "@/services/OrderExtractionService";

const RESULT: ExtractionResult = {
  total: 0,
  generated_at: "2025-11-22T04:12:55Z",
  records: [],
  cursor: { previous: 105, current: 105, advanced: false, mode: "unchanged" },
  diagnostics: {
    pages_fetched: 1,
    parse_failures: 0,
    detail_failures: 0,
    stopped_early: true,
    backend: "http",
    fallback_used: false,
  },
};

function createStubs() {
  const extractFull = jest.fn<OrderExtractionApi["extractFull"]>();
  const extractIncremental = jest.fn<OrderExtractionApi["extractIncremental"]>();
  const rawPage = jest.fn<OrderExtractionApi["rawPage"]>();

  extractFull.mockResolvedValue(RESULT);
  extractIncremental.mockResolvedValue(RESULT);
  rawPage.mockImplementation(
    async (page, backend): Promise<RawPageResult> => ({
      page,
      backend,
      status: 200,
      url: `https://panel.example.com/pedidos?page=${page}`,
      html: "<html><body>listing</body></html>",
      listing: { ok: false, error: "No order rows found" },
    }),
  );

  const service: OrderExtractionApi = { extractFull, extractIncremental, rawPage };
  return {
    app: createApp({ service, defaultBackend: "http" }),
    extractFull,
    extractIncremental,
    rawPage,
  };
}

describe("GET /health", () => {
  it("reports the service as up", async () => {
    const response = await request(createStubs().app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });
});

describe("GET /api/v1/orders/full", () => {
  it("passes limit and after_id to the service", async () => {
    const { app, extractFull } = createStubs();

    const response = await request(app).get("/api/v1/orders/full?limit=2&after_id=10");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, ...RESULT });
    expect(extractFull).toHaveBeenCalledWith({ limit: 2, afterId: 10 });
  });

  it("runs unbounded without parameters", async () => {
    const { app, extractFull } = createStubs();

    await request(app).get("/api/v1/orders/full");

    expect(extractFull).toHaveBeenCalledWith({ limit: undefined, afterId: undefined });
  });

  it("rejects a limit below 1", async () => {
    const { app, extractFull } = createStubs();

    const response = await request(app).get("/api/v1/orders/full?limit=0");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: "VALIDATION_FAILED",
      message: "limit must be >= 1",
      details: [{ field: "limit", message: "limit must be >= 1" }],
    });
    expect(extractFull).not.toHaveBeenCalled();
  });

  it("rejects a non-numeric after_id", async () => {
    const response = await request(createStubs().app).get("/api/v1/orders/full?after_id=abc");

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("VALIDATION_FAILED");
  });
});

describe("GET /api/v1/orders/incremental", () => {
  it("passes last_order_id to the service", async () => {
    const { app, extractIncremental } = createStubs();

    const response = await request(app).get("/api/v1/orders/incremental?last_order_id=1300");

    expect(response.status).toBe(200);
    expect(extractIncremental).toHaveBeenCalledWith({ lastOrderId: 1300 });
  });

  it("rejects a negative last_order_id", async () => {
    const response = await request(createStubs().app).get(
      "/api/v1/orders/incremental?last_order_id=-1",
    );

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("last_order_id must be >= 0");
  });

  it("maps an authentication failure to 401", async () => {
    const { app, extractIncremental } = createStubs();
    extractIncremental.mockRejectedValue(new AuthenticationError("Credentials rejected"));

    const response = await request(app).get("/api/v1/orders/incremental");

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      success: false,
      error: "AUTHENTICATION_FAILED",
      message: "Credentials rejected",
      details: { retryable: false },
    });
  });

  it("maps panel failures to 502", async () => {
    const { app, extractIncremental } = createStubs();
    extractIncremental
      .mockRejectedValueOnce(FetchError.transient("HTTP 503", { page: 1, backend: "http" }))
      .mockRejectedValueOnce(new ListingParseError("No order rows found", { page: 2 }));

    const fetchFailure = await request(app).get("/api/v1/orders/incremental");
    const parseFailure = await request(app).get("/api/v1/orders/incremental");

    expect(fetchFailure.status).toBe(502);
    expect(fetchFailure.body.error).toBe("FETCH_TRANSIENT");
    expect(fetchFailure.body.details).toEqual({ retryable: true, page: 1, backend: "http" });
    expect(parseFailure.status).toBe(502);
    expect(parseFailure.body.error).toBe("LISTING_PARSE_FAILED");
  });

  it("maps unexpected errors to 500", async () => {
    const { app, extractIncremental } = createStubs();
    extractIncremental.mockRejectedValue(new Error("boom"));

    const response = await request(app).get("/api/v1/orders/incremental");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      success: false,
      error: "INTERNAL_ERROR",
      message: "boom",
    });
  });
});

describe("GET /api/v1/debug/raw-page", () => {
  it("returns a preview instead of the whole page", async () => {
    const { app, rawPage } = createStubs();

    const response = await request(app).get("/api/v1/debug/raw-page?page=2");

    expect(response.status).toBe(200);
    expect(rawPage).toHaveBeenCalledWith(2, "http");
    expect(response.body.html).toBeUndefined();
    expect(response.body.html_length).toBe(33);
    expect(response.body.html_preview).toBe("<html><body>listing</body></html>");
    expect(response.body.listing).toEqual({ ok: false, error: "No order rows found" });
  });

  it("accepts a backend override", async () => {
    const { app, rawPage } = createStubs();

    await request(app).get("/api/v1/debug/raw-page?backend=browser");

    expect(rawPage).toHaveBeenCalledWith(1, "browser");
  });

  it("rejects an unknown backend", async () => {
    const response = await request(createStubs().app).get(
      "/api/v1/debug/raw-page?backend=curl",
    );

    expect(response.status).toBe(400);
  });
});

describe("request handling", () => {
  it("answers unknown routes with 404", async () => {
    const response = await request(createStubs().app).get("/api/v1/nope");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: "NOT_FOUND",
      message: "Route GET /api/v1/nope not found",
    });
  });

  it("echoes the caller's request id", async () => {
    const response = await request(createStubs().app)
      .get("/health")
      .set("X-Request-Id", "req-123");

    expect(response.headers["x-request-id"]).toBe("req-123");
  });
});

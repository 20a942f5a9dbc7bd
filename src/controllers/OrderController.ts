/**
 * Order controller
 * HTTP request ↔ OrderExtractionService
 *
 * Errors are forwarded to errorHandler, which maps them to status codes.
 */

import { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { API_CONFIG } from "@/config/constants";
import { BACKEND_KINDS, BackendKind } from "@/core/domain/PageDescriptor";
import type { OrderExtractionService } from "@/services/OrderExtractionService";
import { parseQuery } from "@/middleware/validation";

const orderId = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(0, `${name} must be >= 0`);

export const FullQuerySchema = z.object({
  limit: z.coerce
    .number({ invalid_type_error: "limit must be a number" })
    .int("limit must be an integer")
    .min(1, "limit must be >= 1")
    .max(API_CONFIG.MAX_LIMIT, `limit must be <= ${API_CONFIG.MAX_LIMIT}`)
    .optional(),
  after_id: orderId("after_id").optional(),
});

export const IncrementalQuerySchema = z.object({
  last_order_id: orderId("last_order_id").optional(),
});

export const RawPageQuerySchema = z.object({
  page: z.coerce
    .number({ invalid_type_error: "page must be a number" })
    .int("page must be an integer")
    .min(1, "page must be >= 1")
    .default(1),
  backend: z.enum(BACKEND_KINDS).optional(),
});

export type OrderExtractionApi = Pick<
  OrderExtractionService,
  "extractFull" | "extractIncremental" | "rawPage"
>;

export class OrderController {
  constructor(
    private readonly service: OrderExtractionApi,
    private readonly defaultBackend: BackendKind,
  ) {}

  /**
   * GET /api/v1/orders/full?limit&after_id
   */
  async full(req: Request, res: Response, next: NextFunction): Promise<void> {
    const query = parseQuery(FullQuerySchema, req, res);
    if (!query) {
      return;
    }

    try {
      const result = await this.service.extractFull({
        limit: query.limit,
        afterId: query.after_id,
      });
      res.status(200).json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/orders/incremental?last_order_id
   */
  async incremental(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    const query = parseQuery(IncrementalQuerySchema, req, res);
    if (!query) {
      return;
    }

    try {
      const result = await this.service.extractIncremental({
        lastOrderId: query.last_order_id,
      });
      res.status(200).json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/debug/raw-page?page&backend
   * HTML preview + listing diagnostics of one page
   */
  async rawPage(req: Request, res: Response, next: NextFunction): Promise<void> {
    const query = parseQuery(RawPageQuerySchema, req, res);
    if (!query) {
      return;
    }

    try {
      const { html, ...raw } = await this.service.rawPage(
        query.page,
        query.backend ?? this.defaultBackend,
      );
      res.status(200).json({
        success: true,
        ...raw,
        html_length: html.length,
        html_preview: html.slice(0, API_CONFIG.RAW_PAGE_PREVIEW_CHARS),
      });
    } catch (error) {
      next(error);
    }
  }
}

/**
 * Orders API v1 router
 *
 * - GET /api/v1/orders/full
 * - GET /api/v1/orders/incremental
 */

import { Router } from "express";
import type { OrderController } from "@/controllers/OrderController";

export function createOrdersRouter(controller: OrderController): Router {
  const router = Router();

  router.get("/full", (req, res, next) => controller.full(req, res, next));
  router.get("/incremental", (req, res, next) =>
    controller.incremental(req, res, next),
  );

  return router;
}

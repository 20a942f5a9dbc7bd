/**
 * Debug API v1 router
 *
 * - GET /api/v1/debug/raw-page
 */

import { Router } from "express";
import type { OrderController } from "@/controllers/OrderController";

export function createDebugRouter(controller: OrderController): Router {
  const router = Router();

  router.get("/raw-page", (req, res, next) => controller.rawPage(req, res, next));

  return router;
}

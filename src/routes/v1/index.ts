/**
 * API v1 main router
 */

import { Router } from "express";
import type { OrderController } from "@/controllers/OrderController";
import { createOrdersRouter } from "./orders.router";
import { createDebugRouter } from "./debug.router";

export function createV1Router(controller: OrderController): Router {
  const router = Router();

  router.use("/orders", createOrdersRouter(controller));
  router.use("/debug", createDebugRouter(controller));

  return router;
}

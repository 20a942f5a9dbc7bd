/**
 * Express application
 *
 * Built from its dependencies so tests can mount it with a fake service.
 */

import express, { Express } from "express";
import { APP_METADATA } from "@/config/constants";
import type { BackendKind } from "@/core/domain/PageDescriptor";
import { OrderController, OrderExtractionApi } from "@/controllers/OrderController";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { createV1Router } from "@/routes/v1";

export interface AppDependencies {
  service: OrderExtractionApi;
  defaultBackend: BackendKind;
}

export function createApp({ service, defaultBackend }: AppDependencies): Express {
  const app = express();
  const controller = new OrderController(service, defaultBackend);

  app.use(requestLogger);

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      message: `${APP_METADATA.NAME} is running`,
      version: APP_METADATA.VERSION,
      architecture: APP_METADATA.ARCHITECTURE,
    });
  });

  app.use("/api/v1", createV1Router(controller));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

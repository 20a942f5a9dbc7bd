/**
 * Order Extractor server
 * API v1
 */

import "dotenv/config";
import { ConfigLoader } from "@/config/ConfigLoader";
import { APP_METADATA, SERVICE_NAMES } from "@/config/constants";
import { errorMessage } from "@/core/errors";
import { createApp } from "@/app";
import { createOrderExtractionService } from "@/services/createOrderExtractionService";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

function main(): void {
  const config = ConfigLoader.getInstance().load();
  const service = createOrderExtractionService(config);
  const app = createApp({ service, defaultBackend: config.backend });

  const server = app.listen(config.server.port, () => {
    logImportant(logger, `${APP_METADATA.NAME} server started`, {
      port: config.server.port,
      env: process.env.NODE_ENV || "development",
      version: APP_METADATA.VERSION,
      backend: config.backend,
      fallback: config.fallbackEnabled,
    });

    logger.info(
      {
        endpoints: {
          health: "GET /health",
          full: "GET /api/v1/orders/full?limit&after_id",
          incremental: "GET /api/v1/orders/incremental?last_order_id",
          rawPage: "GET /api/v1/debug/raw-page?page&backend",
        },
      },
      "API v1 endpoints registered",
    );
  });

  // Runs close their own fetchers; only the listener needs closing
  const shutdown = (signal: string) => {
    logger.warn({ signal, running: service.isRunning }, "Shutting down server");
    server.close(() => {
      logImportant(logger, "Server stopped", {});
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (error) {
  logger.fatal({ error: errorMessage(error) }, "Server failed to start");
  process.exit(1);
}

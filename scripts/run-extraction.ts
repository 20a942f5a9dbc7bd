/**
 * One-off extraction run
 *
 * Usage:
 *   npx tsx scripts/run-extraction.ts <full|incremental> [OPTIONS]
 *
 * Options:
 *   --limit <n>           full: at most n records (probe run, cursor untouched)
 *   --after-id <id>       full: only ids greater than id (probe run)
 *   --last-order-id <id>  incremental: overrides the stored cursor
 *
 * Examples:
 *   npx tsx scripts/run-extraction.ts incremental
 *   npx tsx scripts/run-extraction.ts full --limit 50
 *   npx tsx scripts/run-extraction.ts incremental --last-order-id 1300
 *
 * Environment: see .env.example (ORDERS_EMAIL, ORDERS_PASSWORD, ORDERS_BASE_URL)
 */

import "dotenv/config";
import { ConfigLoader } from "@/config/ConfigLoader";
import { SERVICE_NAMES } from "@/config/constants";
import { errorMessage, isExtractionError } from "@/core/errors";
import type { ExtractionResult } from "@/core/domain/ExtractionResult";
import { createOrderExtractionService } from "@/services/createOrderExtractionService";
import { parseCliArgs } from "@/utils/cliArgs";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.EXTRACTOR);

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = ConfigLoader.getInstance().load();
  const service = createOrderExtractionService(config);

  const result: ExtractionResult =
    args.mode === "full"
      ? await service.extractFull({ limit: args.limit, afterId: args.afterId })
      : await service.extractIncremental({ lastOrderId: args.lastOrderId });

  logImportant(logger, "Extraction finished", {
    mode: args.mode,
    total: result.total,
    cursor: result.cursor,
    export_file: result.export_file,
  });

  // Progress was returned but not committed
  if (result.cursor.mode === "write_failed" || result.cursor.mode === "truncated") {
    process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  logger.fatal(
    {
      error: errorMessage(error),
      code: isExtractionError(error) ? error.code : undefined,
    },
    "Extraction failed",
  );
  process.exitCode = 1;
});

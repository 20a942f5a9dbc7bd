/**
 * JSON result exporter
 *
 * Writes each run's records to EXPORTS_DIR/orders_<YYYY-MM-DDTHH-mm-ss>.json.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "@/config/logger";
import type { ExportPayload } from "@/core/domain/ExtractionResult";
import type { IResultExporter } from "@/core/interfaces/IResultExporter";
import { errorMessage, ExportError } from "@/core/errors";
import { getFileTimestamp } from "@/utils/timestamp";

export class JsonResultExporter implements IResultExporter {
  constructor(
    private readonly exportsDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async export(payload: ExportPayload): Promise<string> {
    const filePath = path.join(
      this.exportsDir,
      `orders_${getFileTimestamp(this.now())}.json`,
    );

    try {
      await fs.mkdir(this.exportsDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf-8");
    } catch (error) {
      throw new ExportError(`Export write failed: ${errorMessage(error)}`, {}, error);
    }

    logger.info({ path: filePath, total: payload.total }, "Export written");
    return filePath;
  }
}

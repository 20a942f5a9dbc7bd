/**
 * File-backed cursor store
 *
 * Document: {"last_order_id": 1313, "updated_at": "2025-11-22T04:12:55Z"}.
 * A file holding a bare integer is accepted on read.
 *
 * Writes go to a temp file in the same directory, are fsynced, then renamed
 * over the target, so a crash at any point leaves either the old or the new
 * cursor on disk, never a truncated one.
 */

import * as fsPromises from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { logger } from "@/config/logger";
import type { ICursorStore } from "@/core/interfaces/ICursorStore";
import { errorMessage, StateWriteError } from "@/core/errors";
import { getUtcTimestamp } from "@/utils/timestamp";

const CursorDocumentSchema = z.object({
  last_order_id: z.number().int().nonnegative(),
  updated_at: z.string().optional(),
});

export type CursorDocument = z.infer<typeof CursorDocumentSchema>;

/**
 * Filesystem calls the store makes (replaceable in tests)
 */
export type CursorFileSystem = Pick<
  typeof fsPromises,
  "readFile" | "mkdir" | "open" | "rename" | "rm"
>;

export class FileCursorStore implements ICursorStore {
  constructor(
    private readonly filePath: string,
    private readonly fs: CursorFileSystem = fsPromises,
  ) {}

  async read(): Promise<number | null> {
    let content: string;
    try {
      content = await this.fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug({ path: this.filePath }, "No cursor file, starting fresh");
      } else {
        logger.warn(
          { path: this.filePath, error: errorMessage(error) },
          "Cursor file unreadable, starting fresh",
        );
      }
      return null;
    }

    const cursor = parseCursor(content);
    if (cursor === null) {
      logger.warn({ path: this.filePath }, "Cursor file corrupt, starting fresh");
    }
    return cursor;
  }

  /**
   * @throws StateWriteError
   */
  async write(orderId: number): Promise<void> {
    const document: CursorDocument = {
      last_order_id: orderId,
      updated_at: getUtcTimestamp(),
    };
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`,
    );

    try {
      await this.fs.mkdir(path.dirname(this.filePath), { recursive: true });

      const handle = await this.fs.open(tempPath, "w");
      try {
        await handle.writeFile(JSON.stringify(document, null, 2), "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }

      await this.fs.rename(tempPath, this.filePath);
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new StateWriteError(
        `Cursor write failed: ${errorMessage(error)}`,
        { orderId },
        error,
      );
    }

    logger.debug({ path: this.filePath, last_order_id: orderId }, "Cursor persisted");
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await this.fs.rm(tempPath, { force: true });
    } catch (error) {
      logger.warn(
        { path: tempPath, error: errorMessage(error) },
        "Temp cursor file left behind",
      );
    }
  }
}

/**
 * Cursor from file content; null when the content is not a valid cursor
 */
export function parseCursor(content: string): number | null {
  const trimmed = content.trim();
  if (/^\d+$/.test(trimmed)) {
    const value = Number(trimmed);
    return Number.isSafeInteger(value) ? value : null;
  }

  try {
    const parsed = CursorDocumentSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data.last_order_id : null;
  } catch {
    return null;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

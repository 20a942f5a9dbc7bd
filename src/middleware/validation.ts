/**
 * Query validation
 *
 * zod-validates req.query; on failure answers 400 and returns null.
 */

import { Request, Response } from "express";
import { z } from "zod";
import type { ErrorBody } from "@/middleware/errorHandler";

export function parseQuery<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  req: Request,
  res: Response,
): z.infer<TSchema> | null {
  const parsed = schema.safeParse(req.query);
  if (parsed.success) {
    return parsed.data;
  }

  const body: ErrorBody = {
    success: false,
    error: "VALIDATION_FAILED",
    message: parsed.error.errors.map((e) => e.message).join(", "),
    details: parsed.error.errors.map((e) => ({
      field: e.path.join("."),
      message: e.message,
    })),
  };
  res.status(400).json(body);
  return null;
}

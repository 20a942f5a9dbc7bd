/**
 * JsonResultExporter unit tests
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { ExportPayload } from "@/core/domain/ExtractionResult";
import { ExportError } from "@/core/errors";
import { JsonResultExporter } from "@/state/JsonResultExporter";

const payload: ExportPayload = {
  total: 0,
  generated_at: "2025-11-22T04:12:55Z",
  records: [],
  pagination: { last_id_processed: null, has_more: false, limit: 10, last_id_requested: null },
};

describe("JsonResultExporter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "exports-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the payload to a timestamped file", async () => {
    const exportsDir = path.join(dir, "exports");
    const exporter = new JsonResultExporter(
      exportsDir,
      () => new Date("2025-11-22T04:12:55.123Z"),
    );

    const written = await exporter.export(payload);

    expect(written).toBe(path.join(exportsDir, "orders_2025-11-22T04-12-55.json"));
    expect(JSON.parse(await fs.readFile(written, "utf-8"))).toEqual(payload);
  });

  it("wraps filesystem failures in ExportError", async () => {
    const blocker = path.join(dir, "not-a-dir");
    await fs.writeFile(blocker, "", "utf-8");

    await expect(new JsonResultExporter(blocker).export(payload)).rejects.toThrow(
      ExportError,
    );
  });
});

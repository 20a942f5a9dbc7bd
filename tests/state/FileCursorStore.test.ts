/**
 * FileCursorStore unit tests
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { StateWriteError } from "@/core/errors";
import {
  CursorFileSystem,
  FileCursorStore,
  parseCursor,
} from "@/state/FileCursorStore";

describe("parseCursor", () => {
  it("accepts the cursor document and a bare integer", () => {
    expect(parseCursor('{"last_order_id": 1313, "updated_at": "2025-11-22T04:12:55Z"}')).toBe(1313);
    expect(parseCursor("1313\n")).toBe(1313);
  });

  it("rejects corrupt content", () => {
    expect(parseCursor('{"last_order_id": "1313"}')).toBeNull();
    expect(parseCursor('{"last_order_id": -1}')).toBeNull();
    expect(parseCursor('{"last_order')).toBeNull();
    expect(parseCursor("")).toBeNull();
  });
});

describe("FileCursorStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "cursor-store-"));
    filePath = path.join(dir, "state", "last_order_state.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads null when no cursor was written", async () => {
    expect(await new FileCursorStore(filePath).read()).toBeNull();
  });

  it("reads back what it wrote", async () => {
    const store = new FileCursorStore(filePath);
    await store.write(1313);

    expect(await store.read()).toBe(1313);
    const document = JSON.parse(await fs.readFile(filePath, "utf-8"));
    expect(document.last_order_id).toBe(1313);
    expect(document.updated_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it("reads null from a corrupt file", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "{not json", "utf-8");

    expect(await new FileCursorStore(filePath).read()).toBeNull();
  });

  it("keeps the previous cursor when the write fails before the rename", async () => {
    const store = new FileCursorStore(filePath);
    await store.write(100);

    const failingRename: CursorFileSystem = {
      readFile: fs.readFile,
      mkdir: fs.mkdir,
      open: fs.open,
      rm: fs.rm,
      rename: async () => {
        throw new Error("disk full");
      },
    };
    const crashing = new FileCursorStore(filePath, failingRename);

    await expect(crashing.write(200)).rejects.toThrow(StateWriteError);
    expect(await store.read()).toBe(100);
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["last_order_state.json"]);
  });

  it("reports the id it failed to persist", async () => {
    const readOnly: CursorFileSystem = {
      readFile: fs.readFile,
      mkdir: async () => {
        throw new Error("read-only file system");
      },
      open: fs.open,
      rm: fs.rm,
      rename: fs.rename,
    };

    const error = await new FileCursorStore(filePath, readOnly)
      .write(55)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StateWriteError);
    expect(error).toMatchObject({
      message: "Cursor write failed: read-only file system",
      context: { orderId: 55 },
    });
  });
});

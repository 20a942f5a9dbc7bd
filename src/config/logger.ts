/**
 * Logger
 * Pino-based structured logging
 *
 * - stdout: JSON lines at LOG_LEVEL and above
 * - files (LOG_TO_FILE=true): logs/YYYY-MM-DD/{service}.log plus error.log,
 *   rotated daily and kept for 30 days
 */

import pino from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone } from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * Date directory name (YYYY-MM-DD, local time)
 */
function getDateDir(): string {
  const now = new Date();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${month}-${day}`;
}

/**
 * Rotating file stream writing to LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateDir();
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "order_extractor",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

function buildStreams(): pino.StreamEntry[] {
  const streams: pino.StreamEntry[] = [
    { level: "trace", stream: process.stdout },
  ];

  if (LOG_TO_FILE) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    streams.push(
      { level: "trace", stream: createRotatingStream(SERVICE_NAME) },
      { level: "error", stream: createRotatingStream("error") },
    );
  }

  return streams;
}

const logger: pino.Logger = pino(baseConfig, pino.multistream(buildStreams()));

export { logger };

export type Logger = pino.Logger;

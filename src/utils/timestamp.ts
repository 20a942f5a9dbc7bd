/**
 * Timestamp utilities
 */

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * Local-time ISO 8601 timestamp with offset
 * (e.g. 2025-10-30T12:34:56.789-03:00)
 *
 * Used by the logger so log lines carry the container's TZ.
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  return (
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}` +
    `T${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}` +
    `.${pad(now.getMilliseconds(), 3)}` +
    `${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`
  );
}

/**
 * UTC timestamp without milliseconds (2025-11-22T04:12:55Z)
 * Format of `generated_at` in extraction results.
 */
export function getUtcTimestamp(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Filesystem-safe UTC timestamp (2025-11-22T04-12-55)
 * Used in export file names.
 */
export function getFileTimestamp(now: Date = new Date()): string {
  return getUtcTimestamp(now).replace(/:/g, "-").replace(/Z$/, "");
}

/**
 * Cursor store interface
 *
 * Holds the highest order id of the last successful run.
 * Single writer: concurrent runs against the same store are not supported.
 */
export interface ICursorStore {
  /**
   * Persisted cursor, or null when missing or unreadable (fresh start)
   */
  read(): Promise<number | null>;

  /**
   * Durably replace the cursor
   * @throws StateWriteError - previous value is left intact
   */
  write(orderId: number): Promise<void>;
}

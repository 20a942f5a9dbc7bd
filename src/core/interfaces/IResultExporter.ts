import type { ExportPayload } from "@/core/domain/ExtractionResult";

/**
 * Result exporter interface
 */
export interface IResultExporter {
  /**
   * Persist one run's records
   * @returns path (or identifier) of the written export
   * @throws ExportError
   */
  export(payload: ExportPayload): Promise<string>;
}

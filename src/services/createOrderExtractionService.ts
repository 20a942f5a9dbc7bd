/**
 * Wires OrderExtractionService from validated config
 */

import type { ExtractorConfig } from "@/config/ConfigLoader";
import { OrderDetailExtractor } from "@/extractors/OrderDetailExtractor";
import { OrderListingExtractor } from "@/extractors/OrderListingExtractor";
import { createPageFetcher } from "@/fetchers/FetchBackendFactory";
import { FileCursorStore } from "@/state/FileCursorStore";
import { JsonResultExporter } from "@/state/JsonResultExporter";
import { OrderExtractionService } from "@/services/OrderExtractionService";

export function createOrderExtractionService(
  config: ExtractorConfig,
): OrderExtractionService {
  return new OrderExtractionService({
    createFetcher: (request, logger) =>
      createPageFetcher(config, logger, request),
    listingExtractor: new OrderListingExtractor(config.urls.base),
    detailExtractor: new OrderDetailExtractor(),
    cursorStore: new FileCursorStore(config.state.stateFile),
    exporter: config.state.exportEnabled
      ? new JsonResultExporter(config.state.exportsDir)
      : null,
    maxPages: config.maxPages,
  });
}

/**
 * Tool registration and exports
 */

import { ToolCatalog } from '../registry.js';
import { TOOL_NAMES } from '../config.js';
import type { ForecastingClient } from '../clients/forecasting-client.js';
import type { IPersistentMemory } from '../types.js';

// Coordination tools
import { createSharedMemoryTool } from './shared-memory.js';
import { createMemoryManagerTool } from './memory-manager.js';
import { createSubagentManagerTool } from './subagent-manager.js';
import { createReportResultsTool, createRequestGuidanceTool } from './reporting.js';
import { createPersistentMemoryTool } from './persistent-memory.js';

// External collaborators
import {
  createListForecastsTool,
  createGetForecastTool,
  createGetForecastPointsTool,
  createSubmitForecastTool,
} from './forecasting.js';
import { createQuerySearchTool, type QuerySearchOptions, type SearchCompletionsClient } from './search.js';

export interface ToolCatalogOptions {
  /** Registers persistent_memory */
  persistentMemory?: IPersistentMemory;
  /** Registers the four forecasting tools */
  forecasting?: ForecastingClient;
  /** Registers query_search */
  search?: { client: SearchCompletionsClient } & QuerySearchOptions;
}

/**
 * Create the catalog with the built-in tools and the configured collaborators.
 */
export function createToolCatalog(options: ToolCatalogOptions = {}): ToolCatalog {
  const catalog = new ToolCatalog();

  catalog.register(TOOL_NAMES.sharedMemory, createSharedMemoryTool);
  catalog.register(TOOL_NAMES.memoryManager, createMemoryManagerTool);
  catalog.register(TOOL_NAMES.subagentManager, createSubagentManagerTool);
  catalog.register(TOOL_NAMES.reportResults, createReportResultsTool);
  catalog.register(TOOL_NAMES.requestGuidance, createRequestGuidanceTool);

  if (options.persistentMemory) {
    catalog.register(TOOL_NAMES.persistentMemory, createPersistentMemoryTool(options.persistentMemory));
  }

  if (options.forecasting) {
    catalog.register(TOOL_NAMES.listForecasts, createListForecastsTool(options.forecasting));
    catalog.register(TOOL_NAMES.getForecast, createGetForecastTool(options.forecasting));
    catalog.register(TOOL_NAMES.getForecastPoints, createGetForecastPointsTool(options.forecasting));
    catalog.register(TOOL_NAMES.submitForecast, createSubmitForecastTool(options.forecasting));
  }

  if (options.search) {
    const { client, ...searchOptions } = options.search;
    catalog.register(TOOL_NAMES.querySearch, createQuerySearchTool(client, searchOptions));
  }

  return catalog;
}

export {
  createSharedMemoryTool,
  createMemoryManagerTool,
  createSubagentManagerTool,
  createReportResultsTool,
  createRequestGuidanceTool,
  createPersistentMemoryTool,
  createListForecastsTool,
  createGetForecastTool,
  createGetForecastPointsTool,
  createSubmitForecastTool,
  createQuerySearchTool,
};
export type { QuerySearchOptions, SearchCompletionsClient };
export { formatRunResult } from './subagent-manager.js';
export { formatReport, formatGuidanceRequest } from './reporting.js';
export { toolError, toolSuccess, toolErrorFromException } from './tool-error.js';

/**
 * Tools available to agent runs
 */

export { ToolRegistry, ToolCatalog } from './registry.js';
export type {
  Tool,
  ToolExecutor,
  ToolContext,
  ToolFactory,
  ITaskMemory,
  ISubagentManager,
  IPersistentMemory,
} from './types.js';
export * from './tools/index.js';
export {
  ForecastingClient,
  ForecastingApiError,
} from './clients/forecasting-client.js';
export type { ForecastingClientOptions, ForecastSubmission } from './clients/forecasting-client.js';
export {
  TOOL_NAMES,
  COORDINATOR_ONLY_TOOLS,
  SUBAGENT_ONLY_TOOLS,
  MEMORY_TOOL_CONFIG,
  PERSISTENT_MEMORY_CONFIG,
  FORECASTING_CONFIG,
  SEARCH_CONFIG,
} from './config.js';
export { parseToolInput, normalizeLimit, formatEntry, formatEntries } from './utils.js';

/**
 * Centralized configuration constants for agent tools.
 *
 * Tool implementations import from this module instead of defining
 * inline constants.
 */

// ═══════════════════════════════════════════════════════════════════════════
// Tool names
// ═══════════════════════════════════════════════════════════════════════════

export const TOOL_NAMES = {
  sharedMemory: 'shared_memory',
  memoryManager: 'memory_manager',
  subagentManager: 'subagent_manager',
  reportResults: 'report_results',
  listForecasts: 'list_forecasts',
  getForecast: 'get_forecast',
  getForecastPoints: 'get_forecast_points',
  submitForecast: 'submit_forecast',
  querySearch: 'query_search',
  requestGuidance: 'request_guidance',
  persistentMemory: 'persistent_memory',
} as const;

/** Tools that act on the whole task; subagents may not request them */
export const COORDINATOR_ONLY_TOOLS: readonly string[] = [TOOL_NAMES.subagentManager, TOOL_NAMES.memoryManager];

/** Tools addressed to the coordinator; the coordinator itself does not get them */
export const SUBAGENT_ONLY_TOOLS: readonly string[] = [TOOL_NAMES.requestGuidance];

// ═══════════════════════════════════════════════════════════════════════════
// Shared memory tool config
// ═══════════════════════════════════════════════════════════════════════════

export const MEMORY_TOOL_CONFIG = {
  /** Default number of entries returned by search / get_recent */
  defaultLimit: 10,
  /** Hard cap on entries returned in one call */
  maxLimit: 50,
  /** Content preview length in listings (full content via `get`) */
  previewChars: 500,
  /** Hard cap on stored content size (100KB) */
  maxContentChars: 100_000,
  maxTitleChars: 200,
} as const;

export const PERSISTENT_MEMORY_CONFIG = {
  defaultLimit: 10,
  maxLimit: 50,
  previewChars: 200,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Subagent tool config
// ═══════════════════════════════════════════════════════════════════════════

export const SUBAGENT_TOOL_CONFIG = {
  /** Answer preview length in run summaries */
  answerPreviewChars: 2_000,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Forecasting service config
// ═══════════════════════════════════════════════════════════════════════════

export const FORECASTING_CONFIG = {
  /** Request timeout (30s) */
  timeoutMs: 30_000,
  /** Hard cap on response text handed to the model */
  maxResponseChars: 20_000,
  minPoint: 0,
  maxPoint: 1,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Search tool config
// ═══════════════════════════════════════════════════════════════════════════

export const SEARCH_CONFIG = {
  baseURL: 'https://api.perplexity.ai',
  model: 'sonar',
  maxTokens: 2_000,
  timeoutMs: 60_000,
  systemPrompt:
    'You are a research assistant. Provide current, relevant and accurate information on the topic, citing sources where possible.',
} as const;

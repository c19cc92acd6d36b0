// ============================================
// Agent Runtime - Type Contracts
// ============================================

// Messages, tools and shared memory
export { MEMORY_CATEGORIES } from './types.js';
export type {
  LLMRole,
  LLMToolCall,
  LLMMessage,
  ToolParameterSchema,
  ToolDefinition,
  ToolResult,
  ToolCallOutcome,
  MemoryCategory,
  SharedMemoryEntry,
  StoreMemoryInput,
  MemorySearchQuery,
  CategorySummary,
  MemoryStats,
  PersistentMemoryEntry,
  StorePersistentInput,
  PersistentSearchQuery,
} from './types.js';

// Run lifecycle
export type {
  RunState,
  RunOutcomeState,
  TerminationReason,
  RunError,
  RunResult,
  SubagentInfo,
  SubagentTask,
  BatchOutcome,
  SubagentStats,
} from './agent-config.js';

// Configuration schemas
export {
  AgentNameSchema,
  AgentConfigSchema,
  RetryPolicySchema,
  RuntimeSettingsSchema,
  MemoryCategorySchema,
  validateAgentConfig,
} from './agent-schemas.js';
export type {
  AgentConfig,
  AgentConfigInput,
  AgentConfigDraft,
  RetryPolicy,
  RuntimeSettings,
  RuntimeSettingsInput,
} from './agent-schemas.js';

// Stop conditions
export { StopPriority } from './control.js';
export type { StopConditionResult } from './control.js';

// Model provider
export type { ILLM, LLMRequest, LLMResponse, LLMUsage } from './llm.js';

// Errors
export {
  AgentError,
  NameConflictError,
  CapacityExceededError,
  UnknownSubagentError,
  InvalidRunStateError,
  InvalidConfigError,
  InvalidMemoryEntryError,
  ProviderError,
  TimeoutError,
  CancelledError,
  isAgentError,
  errorMessage,
} from './errors.js';
export type { AgentErrorCode } from './errors.js';

// Events
export type {
  RuntimeEventType,
  RuntimeEventBase,
  RunStartEvent,
  RunEndEvent,
  LLMStartEvent,
  LLMEndEvent,
  LLMRetryEvent,
  ToolStartEvent,
  ToolEndEvent,
  HistoryTruncatedEvent,
  SubagentStateEvent,
  RuntimeEvent,
  RuntimeEventCallback,
  RuntimeEventInput,
} from './events.js';

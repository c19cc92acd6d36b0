/**
 * Core message and tool types shared by the runtime, the tools and the providers.
 */

// ═══════════════════════════════════════════════════════════════════════
// Messages
// ═══════════════════════════════════════════════════════════════════════

export type LLMRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A tool invocation emitted by the model.
 * `id` links the invocation to exactly one tool message carrying its result.
 */
export interface LLMToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface LLMMessage {
  role: LLMRole;
  content: string;
  /** Assistant messages only */
  toolCalls?: LLMToolCall[];
  /** Tool messages only: id of the call this message answers */
  toolCallId?: string;
  /** Tool messages only */
  name?: string;
}

// ═══════════════════════════════════════════════════════════════════════
// Tools
// ═══════════════════════════════════════════════════════════════════════

/**
 * JSON schema fragment describing one tool argument.
 */
export interface ToolParameterSchema {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description?: string;
  enum?: readonly string[];
  items?: ToolParameterSchema;
  properties?: Record<string, ToolParameterSchema>;
  required?: readonly string[];
  minimum?: number;
  maximum?: number;
}

/**
 * Tool definition in the function-calling format most providers accept.
 */
export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, ToolParameterSchema>;
      required?: readonly string[];
    };
  };
}

/**
 * Tool execution result.
 * Failures are values, never exceptions: `error` carries the text the model sees.
 */
export interface ToolResult {
  success: boolean;
  output?: string;
  error?: string;
  errorDetails?: {
    code: string;
    message: string;
    retryable?: boolean;
    hint?: string;
    details?: Record<string, unknown>;
  };
  metadata?: Record<string, unknown>;
}

/**
 * Result of one tool call inside a turn, correlated to its invocation.
 */
export interface ToolCallOutcome {
  toolCallId: string;
  toolName: string;
  result: ToolResult;
  durationMs: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Shared memory
// ═══════════════════════════════════════════════════════════════════════

export const MEMORY_CATEGORIES = [
  'research',
  'analysis',
  'forecast_data',
  'decisions',
  'progress',
  'errors',
  'coordination',
] as const;

export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

/**
 * One immutable entry of the shared memory log.
 */
export interface SharedMemoryEntry {
  readonly id: number;
  readonly taskId: string;
  readonly category: MemoryCategory;
  readonly title: string;
  readonly content: string;
  readonly tags: readonly string[];
  /** Name of the agent that wrote the entry */
  readonly author: string;
  /** ISO timestamp */
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface StoreMemoryInput {
  category: MemoryCategory;
  title: string;
  content: string;
  tags?: readonly string[];
  author: string;
  metadata?: Record<string, unknown>;
}

export interface MemorySearchQuery {
  category?: MemoryCategory;
  /** Matches entries carrying at least one of these tags */
  tags?: readonly string[];
  /** Case-insensitive substring of title or content */
  text?: string;
  author?: string;
  limit?: number;
}

export interface CategorySummary {
  category: MemoryCategory;
  count: number;
  latest?: SharedMemoryEntry;
}

export interface MemoryStats {
  totalEntries: number;
  byCategory: Record<MemoryCategory, number>;
  byAuthor: Record<string, number>;
}

// ═══════════════════════════════════════════════════════════════════════
// Persistent memory (cross-task)
// ═══════════════════════════════════════════════════════════════════════

/**
 * Knowledge kept across tasks and runs, e.g. lessons learned or reference data.
 */
export interface PersistentMemoryEntry {
  readonly id: string;
  /** Free-form, unlike shared memory categories */
  readonly category: string;
  readonly title: string;
  readonly content: string;
  readonly tags: readonly string[];
  readonly author: string;
  /** Task the entry was written during */
  readonly taskId: string;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface StorePersistentInput {
  category: string;
  title: string;
  content: string;
  tags?: readonly string[];
  author: string;
  taskId: string;
  metadata?: Record<string, unknown>;
}

export interface PersistentSearchQuery {
  category?: string;
  tags?: readonly string[];
  /** Case-insensitive substring of title or content */
  text?: string;
  limit?: number;
}

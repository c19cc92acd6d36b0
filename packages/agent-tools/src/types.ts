/**
 * Tool types and interfaces
 */

import type {
  AgentConfigDraft,
  BatchOutcome,
  CategorySummary,
  MemorySearchQuery,
  MemoryStats,
  PersistentMemoryEntry,
  PersistentSearchQuery,
  RunResult,
  SharedMemoryEntry,
  StoreMemoryInput,
  StorePersistentInput,
  SubagentInfo,
  SubagentStats,
  SubagentTask,
  ToolDefinition,
  ToolResult,
} from '@conclave/agent-contracts';

/**
 * Tool executor function. Never throws on purpose: failures are ToolResult values.
 */
export type ToolExecutor = (input: Record<string, unknown>) => Promise<ToolResult> | ToolResult;

/**
 * Tool registration
 */
export interface Tool {
  definition: ToolDefinition;
  executor: ToolExecutor;
  /**
   * Overrides the run's tool timeout. `null` waits for the call to settle;
   * such tools must honour `ToolContext.signal` instead.
   */
  timeoutMs?: number | null;
}

/**
 * Task-bound view of the shared memory store (matches TaskMemory from agent-core).
 * Defined here to avoid circular dependency: agent-tools cannot import agent-core.
 */
export interface ITaskMemory {
  readonly taskId: string;
  store(input: StoreMemoryInput): number;
  get(id: number): SharedMemoryEntry | undefined;
  search(query?: MemorySearchQuery): SharedMemoryEntry[];
  getRecent(count: number): SharedMemoryEntry[];
  getHistory(): SharedMemoryEntry[];
  browseCategories(): CategorySummary[];
  listByAgent(): Map<string, SharedMemoryEntry[]>;
  getStats(): MemoryStats;
  exportTo(filePath: string): Promise<number>;
  purge(): number;
}

/**
 * Cross-task store (PersistentMemoryStore in agent-core).
 */
export interface IPersistentMemory {
  store(input: StorePersistentInput): string;
  get(id: string): PersistentMemoryEntry | undefined;
  search(query?: PersistentSearchQuery): PersistentMemoryEntry[];
}

/**
 * Interface for SubagentManager (agent-core).
 * Defined here to avoid circular dependency: agent-tools cannot import agent-core.
 */
export interface ISubagentManager {
  create(config: AgentConfigDraft): SubagentInfo;
  run(name: string, input: string): Promise<RunResult>;
  runParallel(tasks: SubagentTask[]): Promise<RunResult[]>;
  runBatch(tasks: SubagentTask[], options?: { stopOnFailure?: boolean }): Promise<BatchOutcome[]>;
  delete(name: string): Promise<void>;
  status(name: string): SubagentInfo;
  list(): SubagentInfo[];
  stats(): SubagentStats;
}

/**
 * Per-run tool context. Identity fields come from the runtime, never from model input.
 */
export interface ToolContext {
  /** Name of the agent run the tools belong to (memory author) */
  agentName: string;
  taskId: string;
  memory?: ITaskMemory;
  /** Only the coordinator gets a subagent manager */
  subagents?: ISubagentManager;
  /** Cancellation of the owning run */
  signal?: AbortSignal;
}

/**
 * Builds a tool for one run.
 */
export type ToolFactory = (context: ToolContext) => Tool;

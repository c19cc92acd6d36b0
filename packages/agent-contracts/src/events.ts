/**
 * Runtime Event System
 *
 * Callback-based event streaming for agent runs.
 * The client decides how to handle events (CLI renderer, logs, tests).
 */

import type { RunOutcomeState, TerminationReason } from './agent-config.js';

export type RuntimeEventType =
  | 'run:start'
  | 'run:end'
  | 'llm:start'
  | 'llm:end'
  | 'llm:retry'
  | 'tool:start'
  | 'tool:end'
  | 'history:truncated'
  | 'subagent:state';

/**
 * Base event structure. `agentName` identifies the emitting run.
 */
export interface RuntimeEventBase {
  type: RuntimeEventType;
  timestamp: string;
  agentName: string;
  taskId?: string;
}

export interface RunStartEvent extends RuntimeEventBase {
  type: 'run:start';
  data: {
    input: string;
    model: string;
    maxIterations: number;
    toolCount: number;
  };
}

export interface RunEndEvent extends RuntimeEventBase {
  type: 'run:end';
  data: {
    state: RunOutcomeState;
    reason: TerminationReason;
    iterations: number;
    tokensUsed: number;
    durationMs: number;
  };
}

export interface LLMStartEvent extends RuntimeEventBase {
  type: 'llm:start';
  data: {
    iteration: number;
    messageCount: number;
  };
}

export interface LLMEndEvent extends RuntimeEventBase {
  type: 'llm:end';
  data: {
    iteration: number;
    durationMs: number;
    tokensUsed: number;
    toolCallCount: number;
    content: string;
  };
}

export interface LLMRetryEvent extends RuntimeEventBase {
  type: 'llm:retry';
  data: {
    attempt: number;
    delayMs: number;
    error: string;
  };
}

export interface ToolStartEvent extends RuntimeEventBase {
  type: 'tool:start';
  data: {
    toolCallId: string;
    toolName: string;
    input: Record<string, unknown>;
  };
}

export interface ToolEndEvent extends RuntimeEventBase {
  type: 'tool:end';
  data: {
    toolCallId: string;
    toolName: string;
    success: boolean;
    /** Output on success, error text on failure */
    output: string;
    durationMs: number;
  };
}

export interface HistoryTruncatedEvent extends RuntimeEventBase {
  type: 'history:truncated';
  data: {
    droppedMessages: number;
    totalDropped: number;
    estimatedTokens: number;
  };
}

export interface SubagentStateEvent extends RuntimeEventBase {
  type: 'subagent:state';
  data: {
    from: string;
    to: string;
  };
}

export type RuntimeEvent =
  | RunStartEvent
  | RunEndEvent
  | LLMStartEvent
  | LLMEndEvent
  | LLMRetryEvent
  | ToolStartEvent
  | ToolEndEvent
  | HistoryTruncatedEvent
  | SubagentStateEvent;

export type RuntimeEventCallback = (event: RuntimeEvent) => void;

/**
 * Distributive Omit so that object literals keep their discriminant narrowing.
 */
export type RuntimeEventInput = RuntimeEvent extends infer E
  ? E extends RuntimeEvent
    ? Omit<E, 'timestamp' | 'agentName' | 'taskId'>
    : never
  : never;

/**
 * Error taxonomy of the runtime.
 *
 * Errors raised to callers (manager operations, providers) extend AgentError.
 * Tool failures are never raised: they travel as failed ToolResult values.
 */

export type AgentErrorCode =
  | 'NAME_CONFLICT'
  | 'CAPACITY_EXCEEDED'
  | 'UNKNOWN_SUBAGENT'
  | 'INVALID_RUN_STATE'
  | 'INVALID_CONFIG'
  | 'INVALID_MEMORY_ENTRY'
  | 'PROVIDER_ERROR'
  | 'TIMEOUT'
  | 'CANCELLED';

export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AgentErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AgentError';
    this.code = code;
    this.details = details;
  }
}

export class NameConflictError extends AgentError {
  constructor(readonly agentName: string) {
    super('NAME_CONFLICT', `Subagent '${agentName}' already exists`, { name: agentName });
    this.name = 'NameConflictError';
  }
}

export class CapacityExceededError extends AgentError {
  constructor(
    readonly requested: number,
    readonly running: number,
    readonly limit: number,
  ) {
    super(
      'CAPACITY_EXCEEDED',
      `Cannot start ${requested} run(s): ${running}/${limit} subagents already running`,
      { requested, running, limit },
    );
    this.name = 'CapacityExceededError';
  }
}

export class UnknownSubagentError extends AgentError {
  constructor(readonly agentName: string) {
    super('UNKNOWN_SUBAGENT', `Subagent '${agentName}' not found`, { name: agentName });
    this.name = 'UnknownSubagentError';
  }
}

export class InvalidRunStateError extends AgentError {
  constructor(
    readonly agentName: string,
    readonly state: string,
    action: string,
  ) {
    super('INVALID_RUN_STATE', `Cannot ${action} subagent '${agentName}' in state '${state}'`, {
      name: agentName,
      state,
    });
    this.name = 'InvalidRunStateError';
  }
}

export class InvalidConfigError extends AgentError {
  constructor(message: string, readonly issues: string[] = []) {
    super('INVALID_CONFIG', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { issues });
    this.name = 'InvalidConfigError';
  }
}

export class InvalidMemoryEntryError extends AgentError {
  constructor(message: string) {
    super('INVALID_MEMORY_ENTRY', message);
    this.name = 'InvalidMemoryEntryError';
  }
}

/**
 * Model provider failure. `retryable` marks rate limits, timeouts and 5xx.
 */
export class ProviderError extends AgentError {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, options: { retryable: boolean; status?: number; cause?: unknown }) {
    super('PROVIDER_ERROR', message, { retryable: options.retryable, status: options.status });
    this.name = 'ProviderError';
    this.retryable = options.retryable;
    this.status = options.status;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class TimeoutError extends AgentError {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends AgentError {
  constructor(message = 'Run cancelled') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

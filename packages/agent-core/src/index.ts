/**
 * @conclave/agent-core
 *
 * Agent runtime, subagent manager and shared memory store
 */

export * from './constants.js';

// Logging
export { createLogger, useLogger, silentLogger } from './logger.js';
export type { Logger, CreateLoggerOptions } from './logger.js';

// Message history
export * from './history/index.js';

// Execution: stop conditions, run states, retry/timeout
export * from './execution/index.js';

// Agent runtime
export * from './core/index.js';

// Shared memory
export * from './memory/index.js';

// Subagents and coordinator
export * from './agents/index.js';

// Model providers
export * from './llm/index.js';

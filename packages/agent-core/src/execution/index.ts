export { evaluateStopConditions } from './stop-conditions.js';
export type { StopEvalContext, StopEvalResponse } from './stop-conditions.js';
export { RunStateMachine, canTransition } from './state-machine.js';
export { withRetry, withTimeout, backoffDelay, isTransientError, sleep } from './retry.js';
export type { RetryOptions, RetryAttemptInfo, TimeoutOptions } from './retry.js';

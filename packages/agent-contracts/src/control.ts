/**
 * Control flow types for the execution loop.
 *
 * StopPriority defines deterministic ordering when several stop conditions fire
 * in the same turn. The loop evaluates ALL of them and keeps the lowest value.
 */

import type { RunOutcomeState, TerminationReason } from './agent-config.js';

// ═══════════════════════════════════════════════════════════════════════
// Stop Conditions
// ═══════════════════════════════════════════════════════════════════════

/**
 * Stop condition priorities (lower number = higher priority).
 *
 * Example collision: termination tool called on the last permitted round
 * → TERMINATION_TOOL (1) wins over MAX_ITERATIONS (3).
 */
export enum StopPriority {
  /** Run cancelled through its AbortSignal */
  CANCELLED = 0,
  /** Agent called one of its termination tools */
  TERMINATION_TOOL = 1,
  /** maxTotalTokens reached */
  TOKEN_BUDGET = 2,
  /** Iteration bound reached */
  MAX_ITERATIONS = 3,
  /** Agent produced no tool calls */
  NO_TOOL_CALLS = 5,
}

/**
 * A fired stop condition with the terminal state it leads to.
 */
export interface StopConditionResult {
  priority: StopPriority;
  state: RunOutcomeState;
  reasonCode: TerminationReason;
  /** Human-readable reason */
  reason: string;
  metadata?: Record<string, unknown>;
}

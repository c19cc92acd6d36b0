/**
 * Run lifecycle types owned by the subagent manager.
 */

import type { AgentConfig } from './agent-schemas.js';

/**
 * Lifecycle of a named subagent configuration.
 *
 * created → running → completed | terminated | failed → (running again | deleted)
 */
export type RunState = 'created' | 'running' | 'completed' | 'terminated' | 'failed' | 'deleted';

/**
 * Terminal states a single run can end in.
 */
export type RunOutcomeState = Extract<RunState, 'completed' | 'terminated' | 'failed'>;

export type TerminationReason =
  | 'natural_completion'
  | 'termination_tool'
  | 'termination_tool_required'
  | 'max_iterations'
  | 'token_budget'
  | 'provider_error'
  | 'cancelled';

export interface RunError {
  code: string;
  message: string;
}

/**
 * Result of one agent run.
 */
export interface RunResult {
  agentName: string;
  state: RunOutcomeState;
  reason: TerminationReason;
  /** Final text, or the termination tool's output */
  answer: string;
  /** Completed tool rounds */
  iterations: number;
  tokensUsed: number;
  durationMs: number;
  /** Last tool or provider error seen during the run */
  error?: RunError;
}

/**
 * Read-only view of a catalogue entry.
 */
export interface SubagentInfo {
  name: string;
  state: RunState;
  config: AgentConfig;
  createdAt: string;
  runCount: number;
  lastResult?: RunResult;
}

export interface SubagentTask {
  name: string;
  input: string;
}

export type BatchOutcome =
  | { outcome: 'finished'; name: string; result: RunResult }
  | { outcome: 'rejected'; name: string; error: RunError }
  | { outcome: 'skipped'; name: string };

export interface SubagentStats {
  running: number;
  limit: number;
  available: number;
  total: number;
}

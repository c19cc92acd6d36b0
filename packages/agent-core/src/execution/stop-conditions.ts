/**
 * Stop conditions, evaluated deterministically after every model turn.
 *
 * Runs after every model turn (after that turn's tools have executed).
 * Checks ALL conditions in a single pass and returns the highest-priority match.
 * Priority order: cancelled > termination tool > token budget > max iterations > no tool calls.
 *
 * A termination tool called on the last permitted round therefore ends the run
 * TERMINATED rather than FAILED.
 */

import { StopPriority } from '@conclave/agent-contracts';
import type { StopConditionResult } from '@conclave/agent-contracts';

/**
 * Minimal view of a model response for the evaluator.
 */
export interface StopEvalResponse {
  toolCalls: ReadonlyArray<{ name: string }>;
}

/**
 * Context needed to evaluate stop conditions.
 */
export interface StopEvalContext {
  /** Completed tool rounds, including the one just executed */
  iteration: number;
  maxIterations: number;
  abortSignal?: AbortSignal;
  /** Prompt + completion tokens consumed so far */
  totalTokens: number;
  /** 0 = no limit */
  tokenBudget: number;
  terminationTools: readonly string[];
  requireTerminationTool: boolean;
}

/**
 * Individual stop condition checker.
 */
interface StopCondition {
  priority: StopPriority;
  check(ctx: StopEvalContext, response: StopEvalResponse): StopConditionResult | null;
}

// ═══════════════════════════════════════════════════════════════════════
// Individual Conditions
// ═══════════════════════════════════════════════════════════════════════

const cancelledCondition: StopCondition = {
  priority: StopPriority.CANCELLED,
  check(ctx) {
    if (ctx.abortSignal?.aborted) {
      return {
        priority: StopPriority.CANCELLED,
        state: 'failed',
        reasonCode: 'cancelled',
        reason: 'Run cancelled',
      };
    }
    return null;
  },
};

const terminationToolCondition: StopCondition = {
  priority: StopPriority.TERMINATION_TOOL,
  check(ctx, response) {
    const call = response.toolCalls.find((tc) => ctx.terminationTools.includes(tc.name));
    if (call) {
      return {
        priority: StopPriority.TERMINATION_TOOL,
        state: 'terminated',
        reasonCode: 'termination_tool',
        reason: `Termination tool called (${call.name})`,
        metadata: { toolName: call.name },
      };
    }
    return null;
  },
};

const tokenBudgetCondition: StopCondition = {
  priority: StopPriority.TOKEN_BUDGET,
  check(ctx) {
    if (ctx.tokenBudget > 0 && ctx.totalTokens >= ctx.tokenBudget) {
      return {
        priority: StopPriority.TOKEN_BUDGET,
        state: 'failed',
        reasonCode: 'token_budget',
        reason: `Token budget exhausted (${ctx.totalTokens}/${ctx.tokenBudget})`,
        metadata: { totalTokens: ctx.totalTokens, tokenBudget: ctx.tokenBudget },
      };
    }
    return null;
  },
};

const maxIterationsCondition: StopCondition = {
  priority: StopPriority.MAX_ITERATIONS,
  check(ctx, response) {
    if (response.toolCalls.length > 0 && ctx.iteration >= ctx.maxIterations) {
      return {
        priority: StopPriority.MAX_ITERATIONS,
        state: 'failed',
        reasonCode: 'max_iterations',
        reason: `Maximum iterations reached (${ctx.maxIterations})`,
        metadata: { iteration: ctx.iteration, maxIterations: ctx.maxIterations },
      };
    }
    return null;
  },
};

const noToolCallsCondition: StopCondition = {
  priority: StopPriority.NO_TOOL_CALLS,
  check(ctx, response) {
    if (response.toolCalls.length > 0) {
      return null;
    }
    if (ctx.requireTerminationTool) {
      return {
        priority: StopPriority.NO_TOOL_CALLS,
        state: 'failed',
        reasonCode: 'termination_tool_required',
        reason: `Final answer given without calling a termination tool (${ctx.terminationTools.join(', ')})`,
      };
    }
    return {
      priority: StopPriority.NO_TOOL_CALLS,
      state: 'completed',
      reasonCode: 'natural_completion',
      reason: 'Agent produced no tool calls (final answer)',
    };
  },
};

// ═══════════════════════════════════════════════════════════════════════
// Evaluator
// ═══════════════════════════════════════════════════════════════════════

/**
 * All conditions in registration order (order doesn't matter; priority is numeric).
 */
const ALL_CONDITIONS: StopCondition[] = [
  cancelledCondition,
  terminationToolCondition,
  tokenBudgetCondition,
  maxIterationsCondition,
  noToolCallsCondition,
];

/**
 * Evaluate all stop conditions and return the highest-priority match (if any).
 *
 * Returns null if no stop condition fires (execution should continue).
 */
export function evaluateStopConditions(
  ctx: StopEvalContext,
  response: StopEvalResponse,
): StopConditionResult | null {
  let best: StopConditionResult | null = null;

  for (const condition of ALL_CONDITIONS) {
    const result = condition.check(ctx, response);
    if (result && (best === null || result.priority < best.priority)) {
      best = result;
    }
  }

  return best;
}

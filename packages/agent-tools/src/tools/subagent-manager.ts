/**
 * Subagent manager tool: lets a coordinator create, launch and retire named subagents.
 *
 * Manager errors (name conflict, capacity, unknown name) come back as failed
 * tool results with the error code, so the coordinator can adapt and continue.
 */

import { z } from 'zod';
import { isAgentError } from '@conclave/agent-contracts';
import type { BatchOutcome, RunResult, SubagentInfo, ToolResult } from '@conclave/agent-contracts';
import type { Tool, ToolContext } from '../types.js';
import { SUBAGENT_TOOL_CONFIG, TOOL_NAMES } from '../config.js';
import { parseToolInput } from '../utils.js';
import { toolError, toolErrorFromException } from './tool-error.js';

const TaskSchema = z.object({
  name: z.string().min(1),
  input: z.string().min(1),
});

const SubagentInputSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('create'),
    name: z.string().min(1),
    system_prompt: z.string().min(1),
    description: z.string().optional(),
    model: z.string().optional(),
    tools: z.array(z.string()).optional(),
    max_iterations: z.number().int().positive().optional(),
    max_total_tokens: z.number().int().nonnegative().optional(),
    termination_tools: z.array(z.string()).optional(),
    require_termination_tool: z.boolean().optional(),
  }),
  z.object({ action: z.literal('run'), name: z.string().min(1), input: z.string().min(1) }),
  z.object({ action: z.literal('run_parallel'), tasks: z.array(TaskSchema).min(1) }),
  z.object({
    action: z.literal('run_batch'),
    tasks: z.array(TaskSchema).min(1),
    stop_on_failure: z.boolean().optional(),
  }),
  z.object({ action: z.literal('delete'), name: z.string().min(1) }),
  z.object({ action: z.literal('status'), name: z.string().min(1) }),
  z.object({ action: z.literal('list') }),
]);

// ─── Formatting ────────────────────────────────────────────────────────────────

function preview(text: string): string {
  const max = SUBAGENT_TOOL_CONFIG.answerPreviewChars;
  return text.length > max ? `${text.slice(0, max)}... [truncated]` : text;
}

export function formatRunResult(result: RunResult): string {
  const header = `Subagent '${result.agentName}' ${result.state} (${result.reason}) after ${result.iterations} iterations, ${result.tokensUsed} tokens`;
  const error = result.error ? `\nLast error: ${result.error.code}: ${result.error.message}` : '';
  const answer = result.answer ? `\nAnswer:\n${preview(result.answer)}` : '';
  return `${header}${error}${answer}`;
}

function formatInfo(info: SubagentInfo): string {
  const tools = info.config.tools.length > 0 ? info.config.tools.join(', ') : '(memory only)';
  const last = info.lastResult ? `, last: ${info.lastResult.state} (${info.lastResult.reason})` : '';
  return `${info.name} [${info.state}] model=${info.config.model} tools=${tools} runs=${info.runCount}${last}`;
}

function formatBatchOutcome(outcome: BatchOutcome): string {
  switch (outcome.outcome) {
    case 'finished':
      return formatRunResult(outcome.result);
    case 'rejected':
      return `Subagent '${outcome.name}' not started: ${outcome.error.code}: ${outcome.error.message}`;
    case 'skipped':
      return `Subagent '${outcome.name}' skipped after an earlier failure`;
  }
}

function managerError(error: unknown): ToolResult {
  if (isAgentError(error)) {
    return toolError({
      code: error.code,
      message: error.message,
      retryable: error.code === 'CAPACITY_EXCEEDED',
      hint: error.code === 'CAPACITY_EXCEEDED' ? 'Wait for running subagents to finish or delete finished ones.' : undefined,
      details: error.details,
    });
  }
  return toolErrorFromException('SUBAGENT_ERROR', error);
}

// ─── Tool ──────────────────────────────────────────────────────────────────────

export function createSubagentManagerTool(context: ToolContext): Tool {
  return {
    // run, run_parallel and run_batch settle when their subagents reach a terminal state
    timeoutMs: null,
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.subagentManager,
        description: `Create and run named subagents. Each subagent runs its own tool loop and reports through shared memory.
Actions:
- create: register a subagent (name, system_prompt, optional model, tools, max_iterations, max_total_tokens, termination_tools, require_termination_tool).
- run: run one subagent with an input and wait for it.
- run_parallel: run several subagents at once (all or none are started if capacity is short).
- run_batch: run subagents one after another (stop_on_failure to stop at the first failure).
- delete: remove a subagent, cancelling it first if it is running.
- status: state and last result of one subagent.
- list: all subagents.`,
        parameters: {
          type: 'object',
          properties: {
            action: {
              type: 'string',
              enum: ['create', 'run', 'run_parallel', 'run_batch', 'delete', 'status', 'list'],
            },
            name: { type: 'string', description: 'Subagent name (create, run, delete, status)' },
            system_prompt: { type: 'string', description: 'Instructions for the subagent (create)' },
            description: { type: 'string', description: 'What the subagent is for (create)' },
            model: { type: 'string', description: 'Model id (create, default: coordinator default)' },
            tools: { type: 'array', items: { type: 'string' }, description: 'Tool names (create)' },
            max_iterations: { type: 'integer', description: 'Iteration bound (create, default 10)' },
            max_total_tokens: {
              type: 'integer',
              description: 'Token budget of each run (create, default 50000, 0 = unlimited)',
            },
            termination_tools: {
              type: 'array',
              items: { type: 'string' },
              description: 'Tools that end the run successfully (create)',
            },
            require_termination_tool: {
              type: 'boolean',
              description: 'Fail the run unless it ends through a termination tool (create)',
            },
            input: { type: 'string', description: 'Task given to the subagent (run)' },
            tasks: {
              type: 'array',
              items: {
                type: 'object',
                properties: { name: { type: 'string' }, input: { type: 'string' } },
                required: ['name', 'input'],
              },
              description: 'Subagents and their inputs (run_parallel, run_batch)',
            },
            stop_on_failure: { type: 'boolean', description: 'Stop the batch at the first failure (run_batch)' },
          },
          required: ['action'],
        },
      },
    },
    executor: async (input) => {
      const manager = context.subagents;
      if (!manager) {
        return toolError({
          code: 'SUBAGENTS_UNAVAILABLE',
          message: 'Subagent management is not available to this agent.',
        });
      }

      const parsed = parseToolInput(TOOL_NAMES.subagentManager, SubagentInputSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const args = parsed.data;

      try {
        switch (args.action) {
          case 'create': {
            const info = manager.create({
              name: args.name,
              description: args.description,
              systemPrompt: args.system_prompt,
              model: args.model,
              tools: args.tools,
              maxIterations: args.max_iterations,
              maxTotalTokens: args.max_total_tokens,
              terminationTools: args.termination_tools,
              requireTerminationTool: args.require_termination_tool,
            });
            return {
              success: true,
              output: `Successfully created subagent '${info.name}' (model ${info.config.model}, tools: ${info.config.tools.join(', ') || 'none'})`,
            };
          }

          case 'run': {
            const result = await manager.run(args.name, args.input);
            return { success: true, output: formatRunResult(result), metadata: { state: result.state } };
          }

          case 'run_parallel': {
            const results = await manager.runParallel(args.tasks);
            return {
              success: true,
              output: results.map(formatRunResult).join('\n\n'),
              metadata: { states: results.map((r) => r.state) },
            };
          }

          case 'run_batch': {
            const outcomes = await manager.runBatch(args.tasks, { stopOnFailure: args.stop_on_failure });
            return {
              success: true,
              output: outcomes.map(formatBatchOutcome).join('\n\n'),
              metadata: { outcomes: outcomes.map((o) => o.outcome) },
            };
          }

          case 'delete': {
            await manager.delete(args.name);
            return { success: true, output: `Deleted subagent '${args.name}'` };
          }

          case 'status': {
            const info = manager.status(args.name);
            const last = info.lastResult ? `\n${formatRunResult(info.lastResult)}` : '';
            return { success: true, output: `${formatInfo(info)}${last}` };
          }

          case 'list': {
            const all = manager.list();
            const stats = manager.stats();
            const header = `${stats.running}/${stats.limit} running, ${all.length} registered`;
            return {
              success: true,
              output: all.length === 0 ? `${header}\nNo subagents.` : `${header}\n${all.map(formatInfo).join('\n')}`,
            };
          }
        }
      } catch (error) {
        return managerError(error);
      }
    },
  };
}

/**
 * Runs one turn's tool calls concurrently.
 *
 * Execution order per tool call:
 *   1. Look the tool up       (unknown name: TOOL_NOT_FOUND result)
 *   2. Run it with a timeout  (expiry: TOOL_TIMEOUT result; a tool may set its own or none)
 *   3. Catch anything thrown  (TOOL_EXECUTION_ERROR result)
 *
 * Outcomes come back in the order the model emitted the calls, whatever
 * order they finish in. Nothing here throws: every failure is a ToolResult.
 */

import { TimeoutError, errorMessage } from '@conclave/agent-contracts';
import type { LLMToolCall, RuntimeEventInput, ToolCallOutcome, ToolResult } from '@conclave/agent-contracts';
import { toolError, type ToolRegistry } from '@conclave/agent-tools';
import type { Logger } from '../logger.js';
import { withTimeout } from '../execution/retry.js';

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  timeoutMs: number;
  logger: Logger;
  signal?: AbortSignal;
  emit?: (event: RuntimeEventInput) => void;
}

export class ToolExecutor {
  constructor(private readonly options: ToolExecutorOptions) {}

  async execute(calls: readonly LLMToolCall[]): Promise<ToolCallOutcome[]> {
    return Promise.all(calls.map((call) => this.executeSingle(call)));
  }

  private async executeSingle(call: LLMToolCall): Promise<ToolCallOutcome> {
    const { registry, timeoutMs, logger, signal, emit } = this.options;
    const startedAt = Date.now();

    emit?.({
      type: 'tool:start',
      data: { toolCallId: call.id, toolName: call.name, input: call.input },
    });

    const result = await this.invoke(call, registry, timeoutMs, signal);
    const durationMs = Date.now() - startedAt;

    if (result.success) {
      logger.debug({ tool: call.name, toolCallId: call.id, durationMs }, 'Tool call succeeded');
    } else {
      logger.warn(
        { tool: call.name, toolCallId: call.id, durationMs, code: result.errorDetails?.code },
        `Tool call failed: ${result.error ?? 'unknown error'}`,
      );
    }

    emit?.({
      type: 'tool:end',
      data: {
        toolCallId: call.id,
        toolName: call.name,
        success: result.success,
        output: result.success ? (result.output ?? '') : (result.error ?? ''),
        durationMs,
      },
    });

    return { toolCallId: call.id, toolName: call.name, result, durationMs };
  }

  private async invoke(
    call: LLMToolCall,
    registry: ToolRegistry,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<ToolResult> {
    const tool = registry.get(call.name);
    if (!tool) {
      return toolError({
        code: 'TOOL_NOT_FOUND',
        message: `Tool '${call.name}' not found`,
        retryable: false,
        hint: `Available tools: ${registry.getToolNames().join(', ') || 'none'}`,
      });
    }

    const limit = tool.timeoutMs === undefined ? timeoutMs : tool.timeoutMs;
    try {
      if (limit === null) {
        return await tool.executor(call.input);
      }
      return await withTimeout(async () => tool.executor(call.input), {
        timeoutMs: limit,
        label: `Tool '${call.name}'`,
        signal,
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        return toolError({
          code: 'TOOL_TIMEOUT',
          message: error.message,
          retryable: true,
          details: { timeoutMs: limit },
        });
      }
      return toolError({
        code: 'TOOL_EXECUTION_ERROR',
        message: `Tool execution error: ${errorMessage(error)}`,
        retryable: false,
      });
    }
  }
}

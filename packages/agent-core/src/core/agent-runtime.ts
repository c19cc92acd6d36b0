/**
 * The model/tool loop of one agent run.
 *
 * Per turn:
 *   1. Stop if the run was cancelled
 *   2. Call the model with the history payload (timeout + bounded retry)
 *   3. Append the assistant message
 *   4. Execute the turn's tool calls concurrently, append one result per call
 *   5. Evaluate every stop condition; the highest-priority match ends the run
 *
 * A failing tool never ends the run: its error goes back to the model as the
 * tool message. Provider failures that survive retry end the run FAILED.
 */

import {
  CancelledError,
  RuntimeSettingsSchema,
  errorMessage,
  isAgentError,
} from '@conclave/agent-contracts';
import type {
  AgentConfig,
  ILLM,
  LLMMessage,
  LLMResponse,
  RunError,
  RunOutcomeState,
  RunResult,
  RuntimeEventCallback,
  RuntimeEventInput,
  RuntimeSettings,
  RuntimeSettingsInput,
  TerminationReason,
  ToolCallOutcome,
  ToolResult,
} from '@conclave/agent-contracts';
import type { ToolRegistry } from '@conclave/agent-tools';
import { MessageHistory, estimateMessageTokens } from '../history/message-history.js';
import { evaluateStopConditions } from '../execution/stop-conditions.js';
import { isTransientError, withRetry, withTimeout } from '../execution/retry.js';
import { useLogger, type Logger } from '../logger.js';
import { ToolExecutor } from './tool-executor.js';

export interface AgentRuntimeOptions {
  config: AgentConfig;
  llm: ILLM;
  /** Tools already bound to this run's context */
  tools: ToolRegistry;
  logger?: Logger;
  /** Cancels the run at its next suspension point */
  signal?: AbortSignal;
  settings?: RuntimeSettingsInput;
  onEvent?: RuntimeEventCallback;
  taskId?: string;
}

/**
 * Text of the tool message answering one call.
 */
export function toolMessageContent(result: ToolResult): string {
  if (result.success) {
    return result.output ?? '';
  }
  return `Error: ${result.error ?? 'tool failed without a message'}`;
}

export class AgentRuntime {
  private readonly config: AgentConfig;
  private readonly llm: ILLM;
  private readonly tools: ToolRegistry;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;
  private readonly settings: RuntimeSettings;
  private readonly onEvent?: RuntimeEventCallback;
  private readonly taskId?: string;

  constructor(options: AgentRuntimeOptions) {
    this.config = options.config;
    this.llm = options.llm;
    this.tools = options.tools;
    this.signal = options.signal;
    this.settings = RuntimeSettingsSchema.parse(options.settings ?? {});
    this.onEvent = options.onEvent;
    this.taskId = options.taskId;
    this.logger = (options.logger ?? useLogger()).child({ agent: options.config.name, taskId: options.taskId });
  }

  async run(input: string): Promise<RunResult> {
    const { config } = this;
    const startedAt = Date.now();

    let iterations = 0;
    let tokensUsed = 0;
    let lastContent = '';
    let lastError: RunError | undefined;

    const finish = (state: RunOutcomeState, reason: TerminationReason, answer: string): RunResult => {
      const result: RunResult = {
        agentName: config.name,
        state,
        reason,
        answer,
        iterations,
        tokensUsed,
        durationMs: Date.now() - startedAt,
        ...(lastError ? { error: lastError } : {}),
      };
      this.logger.info(
        { state, reason, iterations, tokensUsed, durationMs: result.durationMs },
        `Run ${state} (${reason})`,
      );
      this.emit({
        type: 'run:end',
        data: { state, reason, iterations, tokensUsed, durationMs: result.durationMs },
      });
      return result;
    };

    const history = new MessageHistory({
      systemPrompt: config.systemPrompt,
      maxTokens: config.contextWindowTokens,
      onTruncate: (info) => {
        this.logger.debug({ ...info }, 'History truncated');
        this.emit({ type: 'history:truncated', data: info });
      },
    });

    const executor = new ToolExecutor({
      registry: this.tools,
      timeoutMs: this.settings.toolTimeoutMs,
      logger: this.logger,
      signal: this.signal,
      emit: (event) => this.emit(event),
    });

    this.logger.info({ model: config.model, maxIterations: config.maxIterations }, 'Run started');
    this.emit({
      type: 'run:start',
      data: {
        input,
        model: config.model,
        maxIterations: config.maxIterations,
        toolCount: this.tools.getToolNames().length,
      },
    });

    history.append({ role: 'user', content: input });

    for (let turn = 1; ; turn++) {
      if (this.signal?.aborted) {
        return finish('failed', 'cancelled', lastContent);
      }

      // ── Model call ───────────────────────────────────────────────────────────
      const payload = history.toRequestPayload();
      const llmStartedAt = Date.now();
      this.emit({ type: 'llm:start', data: { iteration: turn, messageCount: payload.length } });

      let response: LLMResponse;
      try {
        response = await this.callModel(payload);
      } catch (error) {
        if (error instanceof CancelledError || this.signal?.aborted) {
          return finish('failed', 'cancelled', lastContent);
        }
        lastError = { code: isAgentError(error) ? error.code : 'PROVIDER_ERROR', message: errorMessage(error) };
        this.logger.error({ err: error, turn }, 'Model call failed');
        return finish('failed', 'provider_error', lastContent);
      }

      const assistant: LLMMessage = {
        role: 'assistant',
        content: response.content,
        ...(response.toolCalls.length > 0 ? { toolCalls: response.toolCalls } : {}),
      };
      const turnTokens = response.usage
        ? response.usage.promptTokens + response.usage.completionTokens
        : history.estimatedTokens + estimateMessageTokens(assistant);
      tokensUsed += turnTokens;
      lastContent = response.content;
      history.append(assistant);

      this.emit({
        type: 'llm:end',
        data: {
          iteration: turn,
          durationMs: Date.now() - llmStartedAt,
          tokensUsed: turnTokens,
          toolCallCount: response.toolCalls.length,
          content: response.content,
        },
      });

      // ── Tool round ───────────────────────────────────────────────────────────
      let outcomes: ToolCallOutcome[] = [];
      if (response.toolCalls.length > 0) {
        outcomes = await executor.execute(response.toolCalls);
        for (const outcome of outcomes) {
          history.append({
            role: 'tool',
            content: toolMessageContent(outcome.result),
            toolCallId: outcome.toolCallId,
            name: outcome.toolName,
          });
          if (!outcome.result.success) {
            lastError = {
              code: outcome.result.errorDetails?.code ?? 'TOOL_ERROR',
              message: outcome.result.errorDetails?.message ?? outcome.result.error ?? 'tool failed',
            };
          }
        }
        iterations++;
      }

      // ── Stop conditions ──────────────────────────────────────────────────────
      const stop = evaluateStopConditions(
        {
          iteration: iterations,
          maxIterations: config.maxIterations,
          abortSignal: this.signal,
          totalTokens: tokensUsed,
          tokenBudget: config.maxTotalTokens,
          terminationTools: config.terminationTools,
          requireTerminationTool: config.requireTerminationTool,
        },
        response,
      );

      if (stop) {
        this.logger.debug({ priority: stop.priority, ...stop.metadata }, stop.reason);
        const answer =
          stop.reasonCode === 'termination_tool' ? this.terminationAnswer(outcomes, response.content) : response.content;
        return finish(stop.state, stop.reasonCode, answer);
      }
    }
  }

  private async callModel(messages: LLMMessage[]): Promise<LLMResponse> {
    const { config, settings } = this;
    const tools = this.tools.getDefinitions();

    return withRetry(
      () =>
        withTimeout(
          (signal) =>
            this.llm.chat({
              model: config.model,
              messages,
              tools,
              maxTokens: config.maxOutputTokens,
              temperature: config.temperature,
              signal,
            }),
          { timeoutMs: settings.modelTimeoutMs, label: `Model call (${config.model})`, signal: this.signal },
        ),
      {
        ...settings.retry,
        signal: this.signal,
        shouldRetry: isTransientError,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn({ attempt, delayMs, err: error }, 'Model call failed, retrying');
          this.emit({ type: 'llm:retry', data: { attempt, delayMs, error: errorMessage(error) } });
        },
      },
    );
  }

  /**
   * The termination tool's own output is the run's answer.
   */
  private terminationAnswer(outcomes: ToolCallOutcome[], fallback: string): string {
    const outcome = outcomes.find((o) => this.config.terminationTools.includes(o.toolName));
    if (!outcome) {
      return fallback;
    }
    return outcome.result.success ? (outcome.result.output ?? fallback) : (outcome.result.error ?? fallback);
  }

  private emit(event: RuntimeEventInput): void {
    this.onEvent?.({
      ...event,
      timestamp: new Date().toISOString(),
      agentName: this.config.name,
      taskId: this.taskId,
    });
  }
}

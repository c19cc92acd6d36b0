/**
 * ILLM over any OpenAI-compatible chat completions endpoint (OpenRouter by default).
 *
 * The SDK's own retries are off: the runtime retries with its own policy,
 * so every failure is classified here into a ProviderError (retryable or
 * not) or a CancelledError.
 */

import OpenAI from 'openai';
import { CancelledError, ProviderError, errorMessage } from '@conclave/agent-contracts';
import type { ILLM, LLMMessage, LLMRequest, LLMResponse, LLMToolCall, ToolDefinition } from '@conclave/agent-contracts';
import { AGENT_DEFAULTS } from '../constants.js';

/**
 * The part of the OpenAI client this provider calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<OpenAI.ChatCompletion>;
    };
  };
}

export interface OpenAILLMOptions {
  apiKey?: string;
  /** Default: OpenRouter */
  baseURL?: string;
  /** Pre-built client (tests inject a fake) */
  client?: ChatCompletionsClient;
}

const RETRYABLE_STATUSES = new Set([408, 409, 429]);

export function isRetryableStatus(status: number | undefined): boolean {
  return status !== undefined && (RETRYABLE_STATUSES.has(status) || status >= 500);
}

/**
 * Map SDK errors onto the runtime's taxonomy.
 */
export function classifyProviderError(error: unknown): ProviderError | CancelledError {
  if (error instanceof OpenAI.APIUserAbortError) {
    return new CancelledError('Model call aborted');
  }
  if (error instanceof OpenAI.APIConnectionError) {
    // Includes APIConnectionTimeoutError
    return new ProviderError(`Connection to model provider failed: ${error.message}`, { retryable: true, cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderError(`Model provider error: ${error.message}`, {
      retryable: isRetryableStatus(error.status),
      status: error.status,
      cause: error,
    });
  }
  if (error instanceof ProviderError) {
    return error;
  }
  return new ProviderError(errorMessage(error), { retryable: false, cause: error });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Arguments the model sent as malformed JSON are passed through under
 * `_raw` so the tool's input validation reports them.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim().length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : { _raw: raw };
  } catch {
    return { _raw: raw };
  }
}

export function toOpenAIMessage(message: LLMMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content.length > 0 ? message.content : null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: JSON.stringify(call.input) },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      if (!message.toolCallId) {
        throw new ProviderError('Tool message without a toolCallId', { retryable: false });
      }
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

export function toOpenAITool(tool: ToolDefinition): OpenAI.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: tool.function.parameters,
    },
  };
}

export function fromOpenAICompletion(completion: OpenAI.ChatCompletion): LLMResponse {
  const choice = completion.choices[0];
  if (!choice) {
    throw new ProviderError('Model provider returned no choices', { retryable: true });
  }

  const toolCalls: LLMToolCall[] = (choice.message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    input: parseToolArguments(call.function.arguments),
  }));

  return {
    content: choice.message.content ?? '',
    toolCalls,
    model: completion.model,
    ...(completion.usage
      ? {
          usage: {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
          },
        }
      : {}),
  };
}

export class OpenAILLM implements ILLM {
  private readonly client: ChatCompletionsClient;

  constructor(options: OpenAILLMOptions = {}) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL ?? AGENT_DEFAULTS.baseURL,
        maxRetries: 0,
      });
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const body: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      ...(request.tools.length > 0 ? { tools: request.tools.map(toOpenAITool) } : {}),
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    };

    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(body, { signal: request.signal });
    } catch (error) {
      throw classifyProviderError(error);
    }
    return fromOpenAICompletion(completion);
  }
}

/**
 * Model provider contract consumed by the agent runtime.
 */

import type { LLMMessage, LLMToolCall, ToolDefinition } from './types.js';

export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  tools: ToolDefinition[];
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface LLMResponse {
  content: string;
  toolCalls: LLMToolCall[];
  usage?: LLMUsage;
  model?: string;
}

/**
 * A chat model with function calling.
 *
 * Implementations throw ProviderError (retryable or not) on failure and
 * honour `request.signal`.
 */
export interface ILLM {
  chat(request: LLMRequest): Promise<LLMResponse>;
}

/**
 * Web search tool backed by a search-augmented, OpenAI-compatible chat API.
 */

import { z } from 'zod';
import type OpenAI from 'openai';
import type { ToolFactory } from '../types.js';
import { SEARCH_CONFIG, TOOL_NAMES } from '../config.js';
import { parseToolInput } from '../utils.js';
import { toolError, toolErrorFromException } from './tool-error.js';

/**
 * The part of the OpenAI client the search tool calls.
 */
export interface SearchCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number; signal?: AbortSignal },
      ): Promise<OpenAI.ChatCompletion>;
    };
  };
}

export interface QuerySearchOptions {
  model?: string;
  maxTokens?: number;
}

const QuerySchema = z.object({ query_text: z.string().min(1) });

export function createQuerySearchTool(
  client: SearchCompletionsClient,
  options: QuerySearchOptions = {},
): ToolFactory {
  return (context) => ({
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.querySearch,
        description: 'Search the web for up-to-date information and news on a topic. Returns a sourced summary.',
        parameters: {
          type: 'object',
          properties: {
            query_text: { type: 'string', description: 'What to search for' },
          },
          required: ['query_text'],
        },
      },
    },
    executor: async (input) => {
      const parsed = parseToolInput(TOOL_NAMES.querySearch, QuerySchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      try {
        const completion = await client.chat.completions.create(
          {
            model: options.model ?? SEARCH_CONFIG.model,
            max_tokens: options.maxTokens ?? SEARCH_CONFIG.maxTokens,
            messages: [
              { role: 'system', content: SEARCH_CONFIG.systemPrompt },
              { role: 'user', content: parsed.data.query_text },
            ],
          },
          { timeout: SEARCH_CONFIG.timeoutMs, signal: context.signal },
        );
        const content = completion.choices[0]?.message.content;
        if (!content) {
          return toolError({ code: 'SEARCH_EMPTY', message: 'Search returned no content', retryable: true });
        }
        return { success: true, output: content };
      } catch (error) {
        return toolErrorFromException('SEARCH_FAILED', error);
      }
    },
  });
}

export {
  OpenAILLM,
  classifyProviderError,
  isRetryableStatus,
  parseToolArguments,
  toOpenAIMessage,
  toOpenAITool,
  fromOpenAICompletion,
} from './openai-llm.js';
export type { ChatCompletionsClient, OpenAILLMOptions } from './openai-llm.js';

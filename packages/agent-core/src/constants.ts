/**
 * Agent core constants
 */

export const AGENT_DEFAULTS = {
  /** Model used when neither the config nor the CLI names one */
  model: 'openai/gpt-5',
  /** OpenAI-compatible endpoint of the default provider */
  baseURL: 'https://openrouter.ai/api/v1',
} as const;

export const AGENT_HISTORY = {
  /**
   * Rough chars-per-token ratio used for budget estimates.
   * Matches provider tokenizers closely enough for English prose and JSON.
   */
  charsPerToken: 4,

  /** Fixed per-message overhead (role, separators) in estimated tokens */
  messageOverheadTokens: 4,

  /** Text of the synthetic message that replaces dropped history */
  truncationMarker: (omitted: number) =>
    `[Earlier conversation history truncated: ${omitted} messages omitted]`,
} as const;

export const SUBAGENT_LIMITS = {
  /** Maximum subagents in the running state at any instant */
  maxConcurrent: 5,
  /** Token budget of a subagent run whose config sets none */
  maxTotalTokens: 50_000,
} as const;

export const SUBAGENT_PROMPTS = {
  /** Appended to every subagent's system prompt */
  memoryInstructions:
    'You share a memory with the coordinator and other agents working on the same task. ' +
    'Record what you find with the shared_memory tool before you finish.',
} as const;

export const COORDINATOR_DEFAULTS = {
  name: 'coordinator',
  maxIterations: 30,
  /** Input used when the CLI is given no task */
  task: 'Work through the open forecasts and submit your best estimates.',
  systemPrompt: (currentDate: string) =>
    [
      `You are the coordinator of a team of agents. Today is ${currentDate}.`,
      'Break the task into independent pieces of work and give each one to a subagent you create with the subagent_manager tool.',
      'At most five subagents can run at the same time. Prefer run_parallel for independent work.',
      'Subagents report through shared memory: read their entries with shared_memory before deciding.',
      'Give subagents the request_guidance tool when they may need your direction; their requests are coordination entries tagged guidance_request.',
      'When the task is done, call report_results with your findings.',
    ].join('\n'),
} as const;

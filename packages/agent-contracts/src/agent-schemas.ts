/**
 * Zod Schemas for Agent Configuration Validation
 *
 * Validates configs coming from the coordinator's tool calls, preset YAML
 * files and the CLI before anything is registered or run.
 */

import { z } from 'zod';
import { MEMORY_CATEGORIES } from './types.js';

/**
 * Subagent names double as memory authors and catalogue keys.
 */
export const AgentNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'name must be 1-64 characters of letters, digits, "_" or "-"');

/**
 * Agent configuration schema
 */
export const AgentConfigSchema = z.object({
  name: AgentNameSchema,
  description: z.string().default(''),
  systemPrompt: z.string().min(1),
  model: z.string().min(1),
  /** Tool names resolved from the shared catalog */
  tools: z.array(z.string().min(1)).default([]),
  maxIterations: z.number().int().positive().default(10),
  /** Tools whose invocation ends the run successfully */
  terminationTools: z.array(z.string().min(1)).default([]),
  requireTerminationTool: z.boolean().default(false),
  /** Token budget of the history sent to the model */
  contextWindowTokens: z.number().int().positive().default(80_000),
  maxOutputTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(1),
  /** Total prompt + completion tokens per run (0 = unlimited) */
  maxTotalTokens: z.number().int().nonnegative().default(0),
});

export type AgentConfig = z.output<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

/**
 * Config as written by a coordinator: the model falls back to the manager's default.
 */
export type AgentConfigDraft = Omit<AgentConfigInput, 'model'> & { model?: string };

/**
 * Retry policy for model calls
 */
export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(30_000),
});

export type RetryPolicy = z.output<typeof RetryPolicySchema>;

/**
 * Process-wide runtime settings shared by every agent run
 */
export const RuntimeSettingsSchema = z.object({
  modelTimeoutMs: z.number().int().positive().default(120_000),
  toolTimeoutMs: z.number().int().positive().default(60_000),
  retry: RetryPolicySchema.default({}),
});

export type RuntimeSettings = z.output<typeof RuntimeSettingsSchema>;
export type RuntimeSettingsInput = z.input<typeof RuntimeSettingsSchema>;

export const MemoryCategorySchema = z.enum(MEMORY_CATEGORIES);

/**
 * Validate an agent config, returning either the parsed value or readable issues.
 */
export function validateAgentConfig(
  input: unknown,
): { success: true; data: AgentConfig } | { success: false; errors: string[] } {
  const result = AgentConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}

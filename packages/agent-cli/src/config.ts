/**
 * CLI configuration: environment (dotenv, validated with zod) and model aliases.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { InvalidConfigError } from '@conclave/agent-contracts';
import { AGENT_DEFAULTS } from '@conclave/agent-core';

// ═══════════════════════════════════════════════════════════════════════════
// Model aliases
// ═══════════════════════════════════════════════════════════════════════════

export const MODEL_ALIASES = {
  gemini: 'google/gemini-2.5-pro',
  'gpt-5': 'openai/gpt-5',
  grok: 'x-ai/grok-4',
  opus: 'anthropic/claude-opus-4.1',
  multi: 'x-ai/grok-4-fast:free',
} as const;

const aliases = new Map<string, string>(Object.entries(MODEL_ALIASES));

/**
 * Expand a short alias; anything else is taken as a provider model id.
 */
export function resolveModel(value: string): string {
  return aliases.get(value) ?? value;
}

// ═══════════════════════════════════════════════════════════════════════════
// Environment
// ═══════════════════════════════════════════════════════════════════════════

/** Empty values in .env files count as unset */
const optionalString = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

export const EnvSchema = z
  .object({
    OPENROUTER_API_KEY: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.string({ required_error: 'OPENROUTER_API_KEY is required' }),
    ),
    OPENROUTER_BASE_URL: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.string().url().default(AGENT_DEFAULTS.baseURL),
    ),
    API_URL: z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional()),
    BOT_USERNAME: optionalString,
    BOT_PASSWORD: optionalString,
    BOT_USER_ID: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.coerce.number().int().positive().optional(),
    ),
    PERPLEXITY_API_KEY: optionalString,
    LOG_LEVEL: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),
  })
  .superRefine((env, ctx) => {
    if (env.API_URL && env.BOT_USER_ID === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BOT_USER_ID'],
        message: 'BOT_USER_ID is required when API_URL is set',
      });
    }
  });

export type CliEnv = z.output<typeof EnvSchema>;

/**
 * Validate the process environment. Throws InvalidConfigError listing every problem.
 */
export function parseEnv(env: Record<string, string | undefined>): CliEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(
      'Invalid environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * `.env` files from `startDir` up to the filesystem root, nearest first.
 */
export function findEnvFiles(startDir: string): string[] {
  const files: string[] = [];
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, '.env');
    if (fs.existsSync(candidate)) {
      files.push(candidate);
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return files;
    }
    dir = parent;
  }
}

/**
 * Load every `.env` up the tree into process.env. Nearer files and real
 * environment variables win.
 */
export function loadEnvFiles(startDir = process.cwd()): string[] {
  const files = findEnvFiles(startDir);
  for (const file of files) {
    loadDotenv({ path: file });
  }
  return files;
}

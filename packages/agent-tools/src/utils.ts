/**
 * Shared utilities for agent tool implementations.
 */

import type { z } from 'zod';
import type { SharedMemoryEntry, ToolResult } from '@conclave/agent-contracts';
import { toolError } from './tools/tool-error.js';

/**
 * Validate raw model arguments against a zod schema.
 *
 * Invalid input becomes an INVALID_INPUT tool result listing every issue,
 * so the model can correct its call on the next turn.
 */
export function parseToolInput<S extends z.ZodTypeAny>(
  toolName: string,
  schema: S,
  input: Record<string, unknown>,
): { ok: true; data: z.output<S> } | { ok: false; result: ToolResult } {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  const issues = parsed.error.issues.map(
    (issue) => `${issue.path.join('.') || '(input)'}: ${issue.message}`,
  );
  return {
    ok: false,
    result: toolError({
      code: 'INVALID_INPUT',
      message: `Invalid arguments for ${toolName}: ${issues.join('; ')}`,
      retryable: true,
      details: { issues },
    }),
  };
}

/**
 * Clamp a requested result count to [1, maxLimit], falling back to the default.
 */
export function normalizeLimit(
  value: number | undefined,
  config: { defaultLimit: number; maxLimit: number },
): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return config.defaultLimit;
  }
  return Math.min(config.maxLimit, Math.floor(value));
}

/** Fields shared by task and persistent memory entries */
export type FormattableEntry = Pick<SharedMemoryEntry, 'title' | 'content' | 'tags' | 'author' | 'timestamp'> & {
  readonly id: number | string;
  readonly category: string;
};

/**
 * Render a memory entry the way agents read it back.
 */
export function formatEntry(entry: FormattableEntry, options: { maxContentChars?: number } = {}): string {
  const max = options.maxContentChars;
  const content =
    max !== undefined && entry.content.length > max
      ? `${entry.content.slice(0, max)}... [${entry.content.length - max} more chars]`
      : entry.content;
  const tags = entry.tags.length > 0 ? ` tags=[${entry.tags.join(', ')}]` : '';
  return `#${entry.id} [${entry.category}] ${entry.title} (by ${entry.author} at ${entry.timestamp})${tags}\n${content}`;
}

export function formatEntries(
  entries: readonly FormattableEntry[],
  options: { maxContentChars?: number; empty?: string } = {},
): string {
  if (entries.length === 0) {
    return options.empty ?? 'No entries found.';
  }
  return entries.map((entry) => formatEntry(entry, options)).join('\n\n');
}

/**
 * Shared memory tool, the coordination medium between agent runs.
 *
 * Every entry is appended to the task's log with the calling agent as author.
 * Reads never mutate. Entries written by runs that already finished stay readable.
 */

import { z } from 'zod';
import { MEMORY_CATEGORIES, MemoryCategorySchema } from '@conclave/agent-contracts';
import type { Tool, ToolContext } from '../types.js';
import { MEMORY_TOOL_CONFIG, TOOL_NAMES } from '../config.js';
import { formatEntries, formatEntry, normalizeLimit, parseToolInput } from '../utils.js';
import { toolError } from './tool-error.js';

const TagsSchema = z.array(z.string().min(1)).max(20);

const SharedMemoryInputSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('store'),
    category: MemoryCategorySchema,
    title: z.string().min(1).max(MEMORY_TOOL_CONFIG.maxTitleChars),
    content: z.string().min(1).max(MEMORY_TOOL_CONFIG.maxContentChars),
    tags: TagsSchema.optional(),
  }),
  z.object({
    action: z.literal('search'),
    category: MemoryCategorySchema.optional(),
    tags: TagsSchema.optional(),
    text: z.string().optional(),
    author: z.string().optional(),
    limit: z.number().int().optional(),
  }),
  z.object({
    action: z.literal('get'),
    id: z.number().int().positive(),
  }),
  z.object({
    action: z.literal('get_recent'),
    count: z.number().int().optional(),
  }),
  z.object({ action: z.literal('get_task_history') }),
  z.object({ action: z.literal('browse_categories') }),
  z.object({ action: z.literal('list_by_agent') }),
]);

export function createSharedMemoryTool(context: ToolContext): Tool {
  return {
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.sharedMemory,
        description: `Read and write the shared memory of the current task. Other agents working on the same task see what you store, and you see theirs.
Actions:
- store: save a finding (category, title, content, optional tags). Entries are permanent.
- search: filter by category, tags (any match), text and author. Newest first.
- get: full entry by id.
- get_recent: newest entries across all categories.
- get_task_history: every entry in the order it was written.
- browse_categories: entry count and latest entry per category.
- list_by_agent: entries grouped by the agent that wrote them.
Use "coordination" to tell other agents what you are working on, "errors" for failures others should avoid.`,
        parameters: {
          type: 'object',
          properties: {
            action: {
              type: 'string',
              enum: ['store', 'search', 'get', 'get_recent', 'get_task_history', 'browse_categories', 'list_by_agent'],
              description: 'Operation to perform',
            },
            category: {
              type: 'string',
              enum: MEMORY_CATEGORIES,
              description: 'Entry category (store: required, search: optional filter)',
            },
            title: { type: 'string', description: 'Short title (store)' },
            content: { type: 'string', description: 'Full content (store)' },
            tags: {
              type: 'array',
              items: { type: 'string' },
              description: 'Tags (store) or tags to match (search)',
            },
            text: { type: 'string', description: 'Text to look for in title or content (search)' },
            author: { type: 'string', description: 'Only entries written by this agent (search)' },
            id: { type: 'integer', description: 'Entry id (get)' },
            limit: { type: 'integer', description: `Max results (search, default ${MEMORY_TOOL_CONFIG.defaultLimit})` },
            count: { type: 'integer', description: `Number of entries (get_recent, default ${MEMORY_TOOL_CONFIG.defaultLimit})` },
          },
          required: ['action'],
        },
      },
    },
    executor: async (input) => {
      const memory = context.memory;
      if (!memory) {
        return toolError({
          code: 'MEMORY_UNAVAILABLE',
          message: 'Shared memory is not available to this agent.',
        });
      }

      const parsed = parseToolInput(TOOL_NAMES.sharedMemory, SharedMemoryInputSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const args = parsed.data;
      const preview = { maxContentChars: MEMORY_TOOL_CONFIG.previewChars };

      switch (args.action) {
        case 'store': {
          const id = memory.store({
            category: args.category,
            title: args.title,
            content: args.content,
            tags: args.tags ?? [],
            author: context.agentName,
          });
          return {
            success: true,
            output: `Stored entry #${id} in ${args.category}`,
            metadata: { entryId: id, category: args.category },
          };
        }

        case 'search': {
          const entries = memory.search({
            category: args.category,
            tags: args.tags,
            text: args.text,
            author: args.author,
            limit: normalizeLimit(args.limit, MEMORY_TOOL_CONFIG),
          });
          return {
            success: true,
            output: entries.length === 0
              ? 'No matching entries.'
              : `Found ${entries.length} entries:\n\n${formatEntries(entries, preview)}`,
            metadata: { count: entries.length },
          };
        }

        case 'get': {
          const entry = memory.get(args.id);
          if (!entry) {
            return toolError({
              code: 'ENTRY_NOT_FOUND',
              message: `No entry #${args.id} in task ${memory.taskId}`,
              hint: 'Use search or get_recent to find entry ids.',
            });
          }
          return { success: true, output: formatEntry(entry) };
        }

        case 'get_recent': {
          const entries = memory.getRecent(normalizeLimit(args.count, MEMORY_TOOL_CONFIG));
          return {
            success: true,
            output: formatEntries(entries, { ...preview, empty: 'Shared memory is empty.' }),
            metadata: { count: entries.length },
          };
        }

        case 'get_task_history': {
          const entries = memory.getHistory();
          return {
            success: true,
            output: formatEntries(entries, { ...preview, empty: 'Shared memory is empty.' }),
            metadata: { count: entries.length },
          };
        }

        case 'browse_categories': {
          const lines = memory.browseCategories().map((summary) =>
            summary.latest
              ? `${summary.category}: ${summary.count} (latest: #${summary.latest.id} "${summary.latest.title}" by ${summary.latest.author})`
              : `${summary.category}: 0`,
          );
          return { success: true, output: lines.join('\n') };
        }

        case 'list_by_agent': {
          const groups = memory.listByAgent();
          if (groups.size === 0) {
            return { success: true, output: 'Shared memory is empty.' };
          }
          const blocks: string[] = [];
          for (const [author, entries] of groups) {
            const items = entries.map((e) => `  - #${e.id} [${e.category}] ${e.title}`);
            blocks.push(`${author} (${entries.length} entries)\n${items.join('\n')}`);
          }
          return { success: true, output: blocks.join('\n\n'), metadata: { authors: groups.size } };
        }
      }
    },
  };
}

/**
 * Persistent memory tool: knowledge kept across tasks.
 *
 * Entries are authored by the calling agent and tagged with the current task.
 */

import { z } from 'zod';
import type { IPersistentMemory, ToolFactory } from '../types.js';
import { PERSISTENT_MEMORY_CONFIG, MEMORY_TOOL_CONFIG, TOOL_NAMES } from '../config.js';
import { formatEntries, formatEntry, normalizeLimit, parseToolInput } from '../utils.js';
import { toolError, toolErrorFromException } from './tool-error.js';

const TagsSchema = z.array(z.string().min(1)).max(20);

const PersistentMemoryInputSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('store'),
    category: z.string().trim().min(1).max(64),
    title: z.string().min(1).max(MEMORY_TOOL_CONFIG.maxTitleChars),
    content: z.string().min(1).max(MEMORY_TOOL_CONFIG.maxContentChars),
    tags: TagsSchema.optional(),
    metadata: z.record(z.unknown()).optional(),
  }),
  z.object({
    action: z.literal('search'),
    category: z.string().optional(),
    tags: TagsSchema.optional(),
    text: z.string().optional(),
    limit: z.number().int().optional(),
  }),
  z.object({
    action: z.literal('get'),
    id: z.string().min(1),
  }),
]);

export function createPersistentMemoryTool(memory: IPersistentMemory): ToolFactory {
  return (context) => ({
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.persistentMemory,
        description: `Long-term memory shared by all tasks. Use it for lessons and reference data worth keeping after this task ends; use shared_memory for this task's work.
Actions:
- store: save an entry (free-form category, title, content, optional tags and metadata).
- search: filter by category, tags (any match) and text. Newest first.
- get: full entry by id.`,
        parameters: {
          type: 'object',
          properties: {
            action: { type: 'string', enum: ['store', 'search', 'get'], description: 'Operation to perform' },
            category: { type: 'string', description: 'Entry category (store: required, search: optional filter)' },
            title: { type: 'string', description: 'Short title (store)' },
            content: { type: 'string', description: 'Full content (store)' },
            tags: {
              type: 'array',
              items: { type: 'string' },
              description: 'Tags (store) or tags to match (search)',
            },
            metadata: { type: 'object', description: 'Structured extras (store)', additionalProperties: true },
            text: { type: 'string', description: 'Text to look for in title or content (search)' },
            id: { type: 'string', description: 'Entry id (get)' },
            limit: {
              type: 'integer',
              description: `Max results (search, default ${PERSISTENT_MEMORY_CONFIG.defaultLimit})`,
            },
          },
          required: ['action'],
        },
      },
    },
    executor: async (input) => {
      const parsed = parseToolInput(TOOL_NAMES.persistentMemory, PersistentMemoryInputSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const args = parsed.data;

      switch (args.action) {
        case 'store': {
          try {
            const id = memory.store({
              category: args.category,
              title: args.title,
              content: args.content,
              tags: args.tags ?? [],
              author: context.agentName,
              taskId: context.taskId,
              metadata: args.metadata,
            });
            return {
              success: true,
              output: `Stored persistent entry ${id} in ${args.category}`,
              metadata: { entryId: id, category: args.category },
            };
          } catch (error) {
            return toolErrorFromException('STORE_FAILED', error);
          }
        }

        case 'search': {
          const entries = memory.search({
            category: args.category,
            tags: args.tags,
            text: args.text,
            limit: normalizeLimit(args.limit, PERSISTENT_MEMORY_CONFIG),
          });
          return {
            success: true,
            output: entries.length === 0
              ? 'No matching entries in persistent memory.'
              : `Found ${entries.length} entries:\n\n${formatEntries(entries, { maxContentChars: PERSISTENT_MEMORY_CONFIG.previewChars })}`,
            metadata: { count: entries.length },
          };
        }

        case 'get': {
          const entry = memory.get(args.id);
          if (!entry) {
            return toolError({
              code: 'ENTRY_NOT_FOUND',
              message: `No persistent entry ${args.id}`,
              hint: 'Use search to find entry ids.',
            });
          }
          return { success: true, output: formatEntry(entry) };
        }
      }
    },
  });
}

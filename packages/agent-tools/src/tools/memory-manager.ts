/**
 * Memory manager tool: task-level maintenance of the shared memory (coordinator only).
 */

import { z } from 'zod';
import { MEMORY_CATEGORIES } from '@conclave/agent-contracts';
import type { Tool, ToolContext } from '../types.js';
import { TOOL_NAMES } from '../config.js';
import { parseToolInput } from '../utils.js';
import { toolError, toolErrorFromException } from './tool-error.js';

const MemoryManagerInputSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('get_task_summary') }),
  z.object({ action: z.literal('export_task'), file_path: z.string().min(1) }),
  z.object({ action: z.literal('purge_task'), confirm: z.literal(true) }),
]);

export function createMemoryManagerTool(context: ToolContext): Tool {
  return {
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.memoryManager,
        description: `Manage the shared memory of the current task.
Actions:
- get_task_summary: entry counts by category and by agent.
- export_task: write all entries of the task to a JSON file.
- purge_task: permanently remove every entry of the task (requires confirm: true).`,
        parameters: {
          type: 'object',
          properties: {
            action: {
              type: 'string',
              enum: ['get_task_summary', 'export_task', 'purge_task'],
            },
            file_path: { type: 'string', description: 'Destination file (export_task)' },
            confirm: { type: 'boolean', description: 'Must be true for purge_task' },
          },
          required: ['action'],
        },
      },
    },
    executor: async (input) => {
      const memory = context.memory;
      if (!memory) {
        return toolError({ code: 'MEMORY_UNAVAILABLE', message: 'Shared memory is not available to this agent.' });
      }

      const parsed = parseToolInput(TOOL_NAMES.memoryManager, MemoryManagerInputSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const args = parsed.data;

      switch (args.action) {
        case 'get_task_summary': {
          const stats = memory.getStats();
          const categories = MEMORY_CATEGORIES.filter((c) => stats.byCategory[c] > 0).map(
            (c) => `  ${c}: ${stats.byCategory[c]}`,
          );
          const authors = Object.entries(stats.byAuthor).map(([author, count]) => `  ${author}: ${count}`);
          const lines = [
            `Task ${memory.taskId}: ${stats.totalEntries} entries`,
            'By category:',
            ...(categories.length > 0 ? categories : ['  (none)']),
            'By agent:',
            ...(authors.length > 0 ? authors : ['  (none)']),
          ];
          return { success: true, output: lines.join('\n'), metadata: { stats } };
        }

        case 'export_task': {
          try {
            const count = await memory.exportTo(args.file_path);
            return { success: true, output: `Exported ${count} entries to ${args.file_path}` };
          } catch (error) {
            return toolErrorFromException('EXPORT_FAILED', error);
          }
        }

        case 'purge_task': {
          const removed = memory.purge();
          return { success: true, output: `Purged ${removed} entries from task ${memory.taskId}` };
        }
      }
    },
  };
}

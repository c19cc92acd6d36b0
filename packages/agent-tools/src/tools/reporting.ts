/**
 * Reporting tools. Subagents hand their results to the coordinator through
 * report_results and ask it for direction through request_guidance.
 *
 * report_results is usually listed in a subagent's termination tools: the run
 * ends right after the report is stored.
 */

import { z } from 'zod';
import type { Tool, ToolContext } from '../types.js';
import { TOOL_NAMES } from '../config.js';
import { parseToolInput } from '../utils.js';
import { toolError } from './tool-error.js';

const ReportInputSchema = z.object({
  task_status: z.enum(['completed', 'partially_completed', 'failed']),
  findings: z.string().min(1),
  recommendations: z.string().optional(),
  confidence: z.number().min(0).max(100).optional(),
});

export function formatReport(report: z.output<typeof ReportInputSchema>): string {
  return [
    `Status: ${report.task_status.toUpperCase()}`,
    `Confidence: ${report.confidence ?? 80}%`,
    '',
    'FINDINGS:',
    report.findings,
    '',
    'RECOMMENDATIONS:',
    report.recommendations || 'None',
  ].join('\n');
}

/**
 * Report findings and exit.
 */
export function createReportResultsTool(context: ToolContext): Tool {
  return {
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.reportResults,
        description:
          'Report your findings to the coordinator when your task is done. The report is saved to shared memory and ends your run.',
        parameters: {
          type: 'object',
          properties: {
            task_status: {
              type: 'string',
              enum: ['completed', 'partially_completed', 'failed'],
              description: 'Status of the assigned task',
            },
            findings: {
              type: 'string',
              description: 'Key findings, results or data discovered during the task',
            },
            recommendations: {
              type: 'string',
              description: 'Recommended next steps for the coordinator',
            },
            confidence: {
              type: 'number',
              minimum: 0,
              maximum: 100,
              description: 'Confidence in the findings (0-100, default 80)',
            },
          },
          required: ['task_status', 'findings'],
        },
      },
    },
    executor: async (input) => {
      const parsed = parseToolInput(TOOL_NAMES.reportResults, ReportInputSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const report = parsed.data;
      const formatted = formatReport(report);

      let entryId: number | undefined;
      if (context.memory) {
        entryId = context.memory.store({
          category: 'coordination',
          title: `Task report from ${context.agentName}: ${report.task_status}`,
          content: formatted,
          tags: ['report', report.task_status],
          author: context.agentName,
          metadata: { confidence: report.confidence ?? 80 },
        });
      }

      return {
        success: true,
        output: `Report submitted${entryId !== undefined ? ` (entry #${entryId})` : ''}.\n${formatted}`,
        metadata: { taskStatus: report.task_status, entryId },
      };
    },
  };
}

const GuidanceInputSchema = z.object({
  question: z.string().min(1),
  context: z.string().min(1),
  urgency: z.enum(['low', 'medium', 'high']).default('medium'),
});

export function formatGuidanceRequest(request: z.output<typeof GuidanceInputSchema>): string {
  return [
    `GUIDANCE REQUEST (${request.urgency.toUpperCase()} PRIORITY)`,
    '',
    'QUESTION:',
    request.question,
    '',
    'CONTEXT:',
    request.context,
  ].join('\n');
}

/**
 * Ask the coordinator for direction without ending the run.
 */
export function createRequestGuidanceTool(context: ToolContext): Tool {
  return {
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.requestGuidance,
        description:
          'Ask the coordinator for guidance when the task is unclear or blocked. The request is saved to shared memory as a coordination entry; keep working on what you can while you wait.',
        parameters: {
          type: 'object',
          properties: {
            question: { type: 'string', description: 'What you need the coordinator to decide or clarify' },
            context: { type: 'string', description: 'What you have done so far and why you are stuck' },
            urgency: {
              type: 'string',
              enum: ['low', 'medium', 'high'],
              description: 'How much the request blocks your task (default medium)',
            },
          },
          required: ['question', 'context'],
        },
      },
    },
    executor: async (input) => {
      if (!context.memory) {
        return toolError({
          code: 'MEMORY_UNAVAILABLE',
          message: 'Guidance requests go through shared memory, which is not available to this agent.',
        });
      }
      const parsed = parseToolInput(TOOL_NAMES.requestGuidance, GuidanceInputSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const request = parsed.data;
      const formatted = formatGuidanceRequest(request);

      const entryId = context.memory.store({
        category: 'coordination',
        title: `Guidance request from ${context.agentName}`,
        content: formatted,
        tags: ['guidance_request', request.urgency],
        author: context.agentName,
        metadata: { urgency: request.urgency, question: request.question },
      });

      return {
        success: true,
        output: `Guidance request submitted (entry #${entryId}).\n${formatted}`,
        metadata: { entryId, urgency: request.urgency },
      };
    },
  };
}

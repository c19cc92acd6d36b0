import { describe, expect, it } from 'vitest';
import type { RuntimeEvent } from '@conclave/agent-contracts';
import { createEventRenderer, formatDuration } from '../event-renderer.js';

const at = '2026-01-01T00:00:00.000Z';

function render(events: RuntimeEvent[], verbose = false): string[] {
  const lines: string[] = [];
  const renderer = createEventRenderer({ verbose, color: false, print: (line) => lines.push(line) });
  events.forEach(renderer);
  return lines;
}

describe('formatDuration', () => {
  it('picks a unit', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});

describe('createEventRenderer', () => {
  it('boxes the coordinator run', () => {
    const lines = render([
      {
        type: 'run:start',
        timestamp: at,
        agentName: 'coordinator',
        data: { input: 'Estimate the open questions', model: 'test-model', maxIterations: 30, toolCount: 4 },
      },
      {
        type: 'run:end',
        timestamp: at,
        agentName: 'coordinator',
        data: { state: 'terminated', reason: 'termination_tool', iterations: 3, tokensUsed: 1200, durationMs: 2500 },
      },
    ]);

    expect(lines).toEqual([
      `┌── COORDINATOR ${'─'.repeat(43)}┐`,
      '│ Task: Estimate the open questions',
      '│ Model: test-model | Tools: 4 | Max iterations: 30',
      '│ ✓ terminated (termination_tool) 2.5s, 3 iterations, 1200 tokens',
      `└${'─'.repeat(58)}┘`,
    ]);
  });

  it('tags subagent lines with their name', () => {
    const lines = render([
      { type: 'subagent:state', timestamp: at, agentName: 'researcher', data: { from: 'created', to: 'running' } },
      {
        type: 'tool:end',
        timestamp: at,
        agentName: 'researcher',
        data: { toolCallId: 'call_1', toolName: 'shared_memory', success: false, output: 'Entry #9 not found', durationMs: 12 },
      },
      {
        type: 'run:end',
        timestamp: at,
        agentName: 'researcher',
        data: { state: 'failed', reason: 'max_iterations', iterations: 10, tokensUsed: 0, durationMs: 40 },
      },
    ]);

    expect(lines).toEqual([
      '│ ◈ researcher: created → running',
      '│   [researcher] ⚙ shared_memory ✗ 12ms',
      '│   [researcher]     └─ Entry #9 not found',
      '│   [researcher] ✗ failed (max_iterations) 40ms, 10 iterations, 0 tokens',
    ]);
  });

  it('shows model turns and tool output only when verbose', () => {
    const events: RuntimeEvent[] = [
      {
        type: 'llm:end',
        timestamp: at,
        agentName: 'coordinator',
        data: { iteration: 1, durationMs: 900, tokensUsed: 300, toolCallCount: 1, content: 'Delegating   the\nresearch' },
      },
      {
        type: 'tool:end',
        timestamp: at,
        agentName: 'coordinator',
        data: { toolCallId: 'call_2', toolName: 'memory_manager', success: true, output: 'Task summary', durationMs: 3 },
      },
      {
        type: 'history:truncated',
        timestamp: at,
        agentName: 'coordinator',
        data: { droppedMessages: 4, totalDropped: 6, estimatedTokens: 70_000 },
      },
    ];

    expect(render(events)).toEqual(['│ ⚙ memory_manager ✓ 3ms']);
    expect(render(events, true)).toEqual([
      '│ ◆ Thought (900ms, 300 tok)',
      '│   "Delegating the research"',
      '│ ⚙ memory_manager ✓ 3ms',
      '│     └─ Task summary',
      '│ History truncated: 4 messages dropped (6 total)',
    ]);
  });

  it('always reports retries', () => {
    const lines = render([
      {
        type: 'llm:retry',
        timestamp: at,
        agentName: 'analyst',
        data: { attempt: 1, delayMs: 1000, error: 'Model provider error: 429 rate limited' },
      },
    ]);

    expect(lines).toEqual([
      '│   [analyst] ⚠ Model call failed (attempt 1), retrying in 1.0s: Model provider error: 429 rate limited',
    ]);
  });
});

import { describe, expect, it, vi } from 'vitest';
import type { RunResult } from '@conclave/agent-contracts';
import { createProgram } from '../program.js';
import type { runTask } from '../commands/run.js';

function makeResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    agentName: 'coordinator',
    state: 'terminated',
    reason: 'termination_tool',
    answer: 'Report submitted (entry #1).',
    iterations: 2,
    tokensUsed: 500,
    durationMs: 10,
    ...overrides,
  };
}

function setup(result: RunResult, env: Record<string, string | undefined> = { OPENROUTER_API_KEY: 'test-secret', LOG_LEVEL: 'silent' }) {
  const out: string[] = [];
  const err: string[] = [];
  const exitCodes: number[] = [];
  const run = vi.fn<typeof runTask>(async () => ({ taskId: 'task-1', result }));
  const program = createProgram({
    env,
    runTask: run,
    print: (line) => out.push(line),
    printError: (line) => err.push(line),
    color: false,
    setExitCode: (code) => exitCodes.push(code),
  });
  return { program, run, out, err, exitCodes };
}

describe('conclave program', () => {
  it('passes flags through and prints the answer', async () => {
    const { program, run, out, exitCodes } = setup(makeResult());

    await program.parseAsync(
      ['Estimate the open questions', '-m', 'opus', '--task-id', 'task-9', '--max-iterations', '12', '--memory-dir', '/tmp/memory', '--persistent-dir', '/tmp/knowledge'],
      { from: 'user' },
    );

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0]?.[0]).toEqual({
      task: 'Estimate the open questions',
      model: 'anthropic/claude-opus-4.1',
      taskId: 'task-9',
      agents: undefined,
      maxIterations: 12,
      memoryDir: '/tmp/memory',
      persistentDir: '/tmp/knowledge',
      mcp: undefined,
    });
    expect(out.slice(-2)).toEqual(['', 'Report submitted (entry #1).']);
    expect(exitCodes).toEqual([]);
  });

  it('uses the default task and model', async () => {
    const { program, run } = setup(makeResult());

    await program.parseAsync([], { from: 'user' });

    expect(run.mock.calls[0]?.[0]).toMatchObject({
      task: 'Work through the open forecasts and submit your best estimates.',
      model: 'openai/gpt-5',
    });
  });

  it('exits 1 when the run fails', async () => {
    const { program, err, exitCodes } = setup(
      makeResult({
        state: 'failed',
        reason: 'provider_error',
        answer: '',
        error: { code: 'PROVIDER_ERROR', message: 'Model provider error: 401 invalid key' },
      }),
    );

    await program.parseAsync(['Estimate'], { from: 'user' });

    expect(err).toEqual(['Task task-1 failed: provider_error (Model provider error: 401 invalid key)']);
    expect(exitCodes).toEqual([1]);
  });

  it('exits 2 on a configuration error before running', async () => {
    const { program, run, err, exitCodes } = setup(makeResult(), {});

    await program.parseAsync(['Estimate'], { from: 'user' });

    expect(run).not.toHaveBeenCalled();
    expect(err).toEqual(['Invalid environment: OPENROUTER_API_KEY: OPENROUTER_API_KEY is required']);
    expect(exitCodes).toEqual([2]);
  });
});

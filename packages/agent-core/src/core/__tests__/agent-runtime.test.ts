import { describe, it, expect, vi } from 'vitest';
import { AgentConfigSchema, ProviderError } from '@conclave/agent-contracts';
import type { AgentConfigInput, RuntimeEvent, RuntimeSettingsInput, ToolResult } from '@conclave/agent-contracts';
import { ToolRegistry, toolError, toolSuccess, type Tool } from '@conclave/agent-tools';
import { createScriptedLLM, makeLLMResponse, makeToolCall, type ScriptRouter, type ScriptStep } from '../../testing.js';
import { AgentRuntime } from '../agent-runtime.js';
import { checkToolPairing } from '../../history/message-history.js';
import { silentLogger } from '../../logger.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeTool(name: string, executor: (input: Record<string, unknown>) => Promise<ToolResult> | ToolResult): Tool {
  return {
    definition: {
      type: 'function',
      function: { name, description: `${name} tool`, parameters: { type: 'object', properties: {} } },
    },
    executor,
  };
}

function makeRegistry(...tools: Tool[]): ToolRegistry {
  const registry = new ToolRegistry();
  tools.forEach((tool) => registry.register(tool));
  return registry;
}

const echo = makeTool('echo', (input) => toolSuccess(`echo: ${String(input['text'])}`));

const fastSettings: RuntimeSettingsInput = { retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 } };

function makeRuntime(
  script: ScriptStep[] | ScriptRouter,
  options: {
    config?: Partial<AgentConfigInput>;
    tools?: ToolRegistry;
    signal?: AbortSignal;
    settings?: RuntimeSettingsInput;
  } = {},
) {
  const llm = createScriptedLLM(script);
  const events: RuntimeEvent[] = [];
  const runtime = new AgentRuntime({
    config: AgentConfigSchema.parse({
      name: 'tester',
      systemPrompt: 'You are a test agent.',
      model: 'test-model',
      ...options.config,
    }),
    llm,
    tools: options.tools ?? makeRegistry(echo),
    logger: silentLogger(),
    signal: options.signal,
    settings: options.settings ?? fastSettings,
    onEvent: (event) => events.push(event),
    taskId: 'task-1',
  });
  return { runtime, llm, events };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('AgentRuntime', () => {
  describe('termination', () => {
    it('completes naturally on a plain answer', async () => {
      const { runtime, llm } = makeRuntime([makeLLMResponse('The answer is 4')]);
      const result = await runtime.run('What is 2 + 2?');

      expect(result).toMatchObject({
        agentName: 'tester',
        state: 'completed',
        reason: 'natural_completion',
        answer: 'The answer is 4',
        iterations: 0,
      });
      expect(result.error).toBeUndefined();
      expect(llm.requests[0]?.messages).toEqual([
        { role: 'system', content: 'You are a test agent.' },
        { role: 'user', content: 'What is 2 + 2?' },
      ]);
    });

    it('feeds tool results back and counts the round', async () => {
      const call = makeToolCall('echo', { text: 'hi' }, 'call_echo');
      const { runtime, llm } = makeRuntime([makeLLMResponse('', [call]), makeLLMResponse('final')]);
      const result = await runtime.run('Say hi');

      expect(result.state).toBe('completed');
      expect(result.iterations).toBe(1);
      expect(result.answer).toBe('final');
      expect(llm.requests[1]?.messages.slice(2)).toEqual([
        { role: 'assistant', content: '', toolCalls: [call] },
        { role: 'tool', content: 'echo: hi', toolCallId: 'call_echo', name: 'echo' },
      ]);
    });

    it('ends TERMINATED with the termination tool output as the answer', async () => {
      const finish = makeTool('finish', () => toolSuccess('Report: all good'));
      const { runtime } = makeRuntime([makeLLMResponse('wrapping up', [makeToolCall('finish')])], {
        config: { terminationTools: ['finish'] },
        tools: makeRegistry(echo, finish),
      });
      const result = await runtime.run('Go');

      expect(result.state).toBe('terminated');
      expect(result.reason).toBe('termination_tool');
      expect(result.answer).toBe('Report: all good');
      expect(result.iterations).toBe(1);
    });

    it('fails a plain answer when a termination tool is required', async () => {
      const { runtime } = makeRuntime([makeLLMResponse('I am done')], {
        config: { terminationTools: ['finish'], requireTerminationTool: true },
      });
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('termination_tool_required');
    });

    it('fails after maxIterations tool rounds', async () => {
      const { runtime, llm } = makeRuntime(() => makeLLMResponse('', [makeToolCall('echo', { text: 'again' })]), {
        config: { maxIterations: 2 },
      });
      const result = await runtime.run('Loop forever');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('max_iterations');
      expect(result.iterations).toBe(2);
      expect(llm.chat).toHaveBeenCalledTimes(2);
    });

    it('ends FAILED, not COMPLETED, when a required termination tool is never called', async () => {
      const { runtime } = makeRuntime(() => makeLLMResponse('', [makeToolCall('echo', { text: 'x' })]), {
        config: { maxIterations: 3, terminationTools: ['finish'], requireTerminationTool: true },
      });
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.iterations).toBe(3);
    });

    it('fails when the token budget is spent', async () => {
      const usage = { promptTokens: 60, completionTokens: 50 };
      const { runtime } = makeRuntime(() => makeLLMResponse('', [makeToolCall('echo', { text: 'x' })], usage), {
        config: { maxTotalTokens: 100 },
      });
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('token_budget');
      expect(result.tokensUsed).toBe(110);
      expect(result.iterations).toBe(1);
    });

    it('estimates tokens when the provider reports no usage', async () => {
      const { runtime } = makeRuntime([makeLLMResponse('short answer')]);
      const result = await runtime.run('Question');
      expect(result.tokensUsed).toBeGreaterThan(0);
    });
  });

  describe('tool failures', () => {
    it('returns a tool error to the model and keeps going', async () => {
      const flaky = makeTool('flaky', () => toolError({ code: 'UPSTREAM_DOWN', message: 'service unavailable' }));
      const { runtime, llm } = makeRuntime(
        [makeLLMResponse('', [makeToolCall('flaky', {}, 'call_flaky')]), makeLLMResponse('worked around it')],
        { tools: makeRegistry(flaky) },
      );
      const result = await runtime.run('Go');

      expect(result.state).toBe('completed');
      expect(result.iterations).toBe(1);
      expect(result.error).toEqual({ code: 'UPSTREAM_DOWN', message: 'service unavailable' });
      expect(llm.requests[1]?.messages[3]).toEqual({
        role: 'tool',
        content: 'Error: UPSTREAM_DOWN: service unavailable',
        toolCallId: 'call_flaky',
        name: 'flaky',
      });
    });

    it('answers an unknown tool with a not-found result', async () => {
      const { runtime, llm } = makeRuntime([
        makeLLMResponse('', [makeToolCall('missing', {}, 'call_missing')]),
        makeLLMResponse('ok'),
      ]);
      await runtime.run('Go');

      const toolMessage = llm.requests[1]?.messages[3];
      expect(toolMessage?.toolCallId).toBe('call_missing');
      expect(toolMessage?.content).toBe("Error: TOOL_NOT_FOUND: Tool 'missing' not found\n\nHint: Available tools: echo");
    });

    it('converts a thrown error into a failed result', async () => {
      const broken = makeTool('broken', () => {
        throw new Error('kaboom');
      });
      const { runtime, llm } = makeRuntime([makeLLMResponse('', [makeToolCall('broken')]), makeLLMResponse('ok')], {
        tools: makeRegistry(broken),
      });
      const result = await runtime.run('Go');

      expect(result.state).toBe('completed');
      expect(llm.requests[1]?.messages[3]?.content).toBe('Error: TOOL_EXECUTION_ERROR: Tool execution error: kaboom');
    });

    it('times out a hanging tool', async () => {
      const hang = makeTool('hang', () => new Promise<ToolResult>(() => undefined));
      const { runtime, llm } = makeRuntime([makeLLMResponse('', [makeToolCall('hang')]), makeLLMResponse('ok')], {
        tools: makeRegistry(hang),
        settings: { ...fastSettings, toolTimeoutMs: 20 },
      });
      await runtime.run('Go');

      expect(llm.requests[1]?.messages[3]?.content).toBe("Error: TOOL_TIMEOUT: Tool 'hang' timed out after 20ms");
    });
  });

  describe('concurrent tool calls', () => {
    it('runs one turn of calls in parallel and appends results in emitted order', async () => {
      let active = 0;
      let maxActive = 0;
      const timed = (delayMs: number) => async (input: Record<string, unknown>) => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        active--;
        return toolSuccess(`done ${String(input['label'])}`);
      };
      const slow = makeTool('slow', timed(30));
      const fast = makeTool('fast', timed(0));

      const { runtime, llm } = makeRuntime(
        [
          makeLLMResponse('', [
            makeToolCall('slow', { label: 'slow' }, 'call_slow'),
            makeToolCall('fast', { label: 'fast' }, 'call_fast'),
          ]),
          makeLLMResponse('ok'),
        ],
        { tools: makeRegistry(slow, fast) },
      );
      await runtime.run('Go');

      expect(maxActive).toBe(2);
      const toolMessages = llm.requests[1]?.messages.filter((m) => m.role === 'tool') ?? [];
      expect(toolMessages.map((m) => [m.toolCallId, m.content])).toEqual([
        ['call_slow', 'done slow'],
        ['call_fast', 'done fast'],
      ]);
    });
  });

  describe('model failures', () => {
    it('retries a transient provider error', async () => {
      const { runtime, llm, events } = makeRuntime([
        new ProviderError('rate limited', { retryable: true, status: 429 }),
        makeLLMResponse('ok'),
      ]);
      const result = await runtime.run('Go');

      expect(result.state).toBe('completed');
      expect(llm.chat).toHaveBeenCalledTimes(2);
      const retry = events.find((e) => e.type === 'llm:retry');
      expect(retry?.data).toEqual({ attempt: 1, delayMs: 1, error: 'rate limited' });
    });

    it('fails with provider_error once retries are exhausted', async () => {
      const error = () => new ProviderError('overloaded', { retryable: true, status: 503 });
      const { runtime, llm } = makeRuntime([error(), error(), error()]);
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('provider_error');
      expect(result.error).toEqual({ code: 'PROVIDER_ERROR', message: 'overloaded' });
      expect(llm.chat).toHaveBeenCalledTimes(3);
    });

    it('does not retry a non-retryable provider error', async () => {
      const { runtime, llm } = makeRuntime([new ProviderError('invalid model', { retryable: false, status: 400 })]);
      const result = await runtime.run('Go');

      expect(result.reason).toBe('provider_error');
      expect(llm.chat).toHaveBeenCalledTimes(1);
    });

    it('bounds a model call with the model timeout', async () => {
      const { runtime } = makeRuntime([() => new Promise<never>(() => undefined)], {
        settings: { modelTimeoutMs: 20, retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1 } },
      });
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('provider_error');
      expect(result.error).toEqual({ code: 'TIMEOUT', message: 'Model call (test-model) timed out after 20ms' });
    });
  });

  describe('cancellation', () => {
    it('does not call the model when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { runtime, llm } = makeRuntime([makeLLMResponse('never')], { signal: controller.signal });
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('cancelled');
      expect(llm.chat).not.toHaveBeenCalled();
    });

    it('stops after the tool round during which it was cancelled', async () => {
      const controller = new AbortController();
      const stopper = makeTool('stopper', () => {
        controller.abort();
        return toolSuccess('stopping');
      });
      const { runtime, llm } = makeRuntime(
        [makeLLMResponse('', [makeToolCall('stopper')]), makeLLMResponse('never reached')],
        { tools: makeRegistry(stopper), signal: controller.signal },
      );
      const result = await runtime.run('Go');

      expect(result.state).toBe('failed');
      expect(result.reason).toBe('cancelled');
      expect(result.iterations).toBe(1);
      expect(llm.chat).toHaveBeenCalledTimes(1);
    });
  });

  describe('history', () => {
    it('keeps every request within pairing rules while truncating', async () => {
      const bulky = makeTool('bulky', () => toolSuccess('x'.repeat(400)));
      const { runtime, llm, events } = makeRuntime(
        (_request, index) =>
          index < 6 ? makeLLMResponse('', [makeToolCall('bulky'), makeToolCall('bulky')]) : makeLLMResponse('done'),
        { tools: makeRegistry(bulky), config: { contextWindowTokens: 400 } },
      );
      const result = await runtime.run('Collect a lot of data');

      expect(result.state).toBe('completed');
      expect(llm.requests).toHaveLength(7);
      for (const request of llm.requests) {
        expect(request.messages[0]?.role).toBe('system');
        expect(checkToolPairing(request.messages).ok).toBe(true);
      }
      expect(events.some((e) => e.type === 'history:truncated')).toBe(true);
    });
  });

  describe('events', () => {
    it('emits run, model and tool events in order', async () => {
      const { runtime, events } = makeRuntime([
        makeLLMResponse('', [makeToolCall('echo', { text: 'a' })]),
        makeLLMResponse('done'),
      ]);
      await runtime.run('Go');

      expect(events.map((e) => e.type)).toEqual([
        'run:start',
        'llm:start',
        'llm:end',
        'tool:start',
        'tool:end',
        'llm:start',
        'llm:end',
        'run:end',
      ]);
      expect(events.every((e) => e.agentName === 'tester' && e.taskId === 'task-1')).toBe(true);
    });

    it('passes config limits to the provider', async () => {
      const { runtime, llm } = makeRuntime([makeLLMResponse('ok')], {
        config: { maxOutputTokens: 1024, temperature: 0.2 },
      });
      await runtime.run('Go');

      expect(llm.chat).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'test-model', maxTokens: 1024, temperature: 0.2 }),
      );
      expect(llm.requests[0]?.tools.map((t) => t.function.name)).toEqual(['echo']);
    });
  });
});

describe('vi helpers', () => {
  it('scripted provider records a call per turn', async () => {
    const llm = createScriptedLLM([makeLLMResponse('one')]);
    await llm.chat({ model: 'm', messages: [], tools: [] });
    const second = await llm.chat({ model: 'm', messages: [], tools: [] });
    expect(second.content).toBe('Done.');
    expect(vi.isMockFunction(llm.chat)).toBe(true);
  });
});

/**
 * Test helpers: a scripted model provider and response builders.
 *
 *   const llm = createScriptedLLM([
 *     makeLLMResponse('', [makeToolCall('shared_memory', { action: 'get_recent' })]),
 *     makeLLMResponse('All done'),
 *   ]);
 */

import { vi, type Mock } from 'vitest';
import type { ILLM, LLMRequest, LLMResponse, LLMToolCall, LLMUsage } from '@conclave/agent-contracts';

/**
 * One scripted turn: a response, an error to throw, or a function of the request.
 */
export type ScriptStep = LLMResponse | Error | ((request: LLMRequest) => LLMResponse | Promise<LLMResponse>);

/**
 * Picks the step for a call from the request and the call index.
 */
export type ScriptRouter = (request: LLMRequest, callIndex: number) => ScriptStep | undefined;

export interface ScriptedLLM extends ILLM {
  chat: Mock<(request: LLMRequest) => Promise<LLMResponse>>;
  /** Every request received, with a snapshot of its messages */
  requests: LLMRequest[];
}

export interface ScriptedLLMOptions {
  /** Returned once the script runs out. Default: a plain 'Done.' answer */
  fallback?: LLMResponse;
}

let toolCallCounter = 0;

export function makeToolCall(name: string, input: Record<string, unknown> = {}, id?: string): LLMToolCall {
  toolCallCounter++;
  return { id: id ?? `call_${toolCallCounter}`, name, input };
}

export function makeLLMResponse(content: string, toolCalls: LLMToolCall[] = [], usage?: LLMUsage): LLMResponse {
  return usage ? { content, toolCalls, usage } : { content, toolCalls };
}

async function resolveStep(step: ScriptStep, request: LLMRequest): Promise<LLMResponse> {
  if (step instanceof Error) {
    throw step;
  }
  if (typeof step === 'function') {
    return step(request);
  }
  return step;
}

export function createScriptedLLM(script: ScriptStep[] | ScriptRouter, options: ScriptedLLMOptions = {}): ScriptedLLM {
  const requests: LLMRequest[] = [];
  const fallback = options.fallback ?? makeLLMResponse('Done.');
  let callIndex = 0;

  const chat = vi.fn(async (request: LLMRequest): Promise<LLMResponse> => {
    requests.push({ ...request, messages: [...request.messages] });
    const index = callIndex++;
    const step = Array.isArray(script) ? script[index] : script(request, index);
    return resolveStep(step ?? fallback, request);
  });

  return { chat, requests };
}

/**
 * Route concurrent runs to their own scripts by their first user message.
 */
export function scriptByInput(scripts: Record<string, ScriptStep[]>): ScriptRouter {
  const positions = new Map<string, number>();
  return (request) => {
    const input = request.messages.find((message) => message.role === 'user')?.content ?? '';
    const steps = scripts[input];
    if (!steps) {
      return new Error(`No script for input '${input}'`);
    }
    const position = positions.get(input) ?? 0;
    positions.set(input, position + 1);
    return steps[position];
  };
}

/**
 * A promise with its resolve function exposed, for holding runs open.
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

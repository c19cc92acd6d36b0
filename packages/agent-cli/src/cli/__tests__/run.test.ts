import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createToolCatalog } from '@conclave/agent-tools';
import { silentLogger } from '@conclave/agent-core';
import { createScriptedLLM, makeLLMResponse, makeToolCall } from '@conclave/agent-core/testing';
import { parseEnv } from '../../config.js';
import { collaboratorOptions, readMCPServers, runTask } from '../commands/run.js';

const env = parseEnv({ OPENROUTER_API_KEY: 'test-secret' });

function reportingLLM(findings: string) {
  return createScriptedLLM([
    makeLLMResponse('', [makeToolCall('report_results', { task_status: 'completed', findings })]),
  ]);
}

describe('collaboratorOptions', () => {
  it('registers only the coordination tools by default', () => {
    expect(createToolCatalog(collaboratorOptions(env)).names()).toEqual([
      'memory_manager',
      'report_results',
      'request_guidance',
      'shared_memory',
      'subagent_manager',
    ]);
  });

  it('adds forecasting and search when configured', () => {
    const configured = parseEnv({
      OPENROUTER_API_KEY: 'test-secret',
      API_URL: 'http://forecasts.test/api',
      BOT_USER_ID: '7',
      PERPLEXITY_API_KEY: 'test-secret',
    });

    expect(createToolCatalog(collaboratorOptions(configured)).names()).toEqual([
      'get_forecast',
      'get_forecast_points',
      'list_forecasts',
      'memory_manager',
      'query_search',
      'report_results',
      'request_guidance',
      'shared_memory',
      'subagent_manager',
      'submit_forecast',
    ]);
  });
});

describe('runTask', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-run-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs the coordinator until it reports', async () => {
    const llm = reportingLLM('Nothing open');

    const { taskId, result } = await runTask(
      { task: 'Check the open forecasts', model: 'test-model', taskId: 'task-cli' },
      { env, logger: silentLogger(), llm },
    );

    expect(taskId).toBe('task-cli');
    expect(result).toMatchObject({ agentName: 'coordinator', state: 'terminated', reason: 'termination_tool' });
    expect(result.answer).toBe(
      'Report submitted (entry #1).\nStatus: COMPLETED\nConfidence: 80%\n\nFINDINGS:\nNothing open\n\nRECOMMENDATIONS:\nNone',
    );
    expect(llm.requests[0]?.model).toBe('test-model');
    expect(llm.requests[0]?.tools.map((tool) => tool.function.name)).toEqual([
      'subagent_manager',
      'memory_manager',
      'shared_memory',
      'report_results',
    ]);
  });

  it('generates a task id when none is given', async () => {
    const { taskId } = await runTask(
      { task: 'Check the open forecasts', model: 'test-model' },
      { env, logger: silentLogger(), llm: reportingLLM('Done') },
    );

    expect(taskId).toMatch(/^task-[0-9a-f-]{36}$/);
  });

  it('persists shared memory in the memory dir', async () => {
    await runTask(
      { task: 'Check the open forecasts', model: 'test-model', taskId: 'task-cli', memoryDir: dir },
      { env, logger: silentLogger(), llm: reportingLLM('Persisted') },
    );

    const lines = fs.readFileSync(path.join(dir, 'task-cli.jsonl'), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ id: 1, taskId: 'task-cli', category: 'coordination', author: 'coordinator' });
  });

  it('pre-registers agent presets', async () => {
    fs.writeFileSync(path.join(dir, 'researcher.yaml'), 'name: researcher\nsystemPrompt: Collect base rates.\n');
    const llm = createScriptedLLM([
      makeLLMResponse('', [makeToolCall('subagent_manager', { action: 'status', name: 'researcher' })]),
      makeLLMResponse('', [makeToolCall('report_results', { task_status: 'completed', findings: 'Ready' })]),
    ]);

    const { result } = await runTask(
      { task: 'Check the open forecasts', model: 'test-model', agents: dir },
      { env, logger: silentLogger(), llm },
    );

    expect(result.state).toBe('terminated');
    const statusOutput = llm.requests[1]?.messages.find((message) => message.role === 'tool');
    expect(statusOutput?.content).toContain('researcher [created] model=test-model tools=shared_memory runs=0');
  });

  it('keeps persistent memory across tasks in the persistent dir', async () => {
    const llm = createScriptedLLM([
      makeLLMResponse('', [
        makeToolCall('persistent_memory', {
          action: 'store',
          category: 'lessons',
          title: 'Base rates first',
          content: 'Start every estimate from a base rate.',
        }),
      ]),
      makeLLMResponse('', [makeToolCall('report_results', { task_status: 'completed', findings: 'Noted' })]),
    ]);

    await runTask(
      { task: 'Check the open forecasts', model: 'test-model', taskId: 'task-a', persistentDir: dir },
      { env, logger: silentLogger(), llm },
    );

    expect(llm.requests[0]?.tools.map((tool) => tool.function.name)).toEqual([
      'subagent_manager',
      'memory_manager',
      'shared_memory',
      'report_results',
      'persistent_memory',
    ]);
    const files = fs.readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(JSON.parse(fs.readFileSync(path.join(dir, files[0] ?? ''), 'utf-8'))).toMatchObject({
      category: 'lessons',
      title: 'Base rates first',
      author: 'coordinator',
      taskId: 'task-a',
    });

    const next = createScriptedLLM([
      makeLLMResponse('', [makeToolCall('persistent_memory', { action: 'search', category: 'lessons' })]),
      makeLLMResponse('', [makeToolCall('report_results', { task_status: 'completed', findings: 'Recalled' })]),
    ]);
    await runTask(
      { task: 'Check the open forecasts', model: 'test-model', taskId: 'task-b', persistentDir: dir },
      { env, logger: silentLogger(), llm: next },
    );

    const searchOutput = next.requests[1]?.messages.find((message) => message.role === 'tool');
    expect(searchOutput?.content).toContain('Found 1 entries:');
    expect(searchOutput?.content).toContain('[lessons] Base rates first (by coordinator at ');
  });

  it('rejects an invalid MCP server list before any model call', async () => {
    const file = path.join(dir, 'mcp.json');
    fs.writeFileSync(file, JSON.stringify([{ name: 'files', transport: 'stdio' }]));
    const llm = reportingLLM('unused');

    await expect(
      runTask({ task: 'Check the open forecasts', model: 'test-model', mcp: file }, { env, logger: silentLogger(), llm }),
    ).rejects.toThrow(`Invalid MCP servers in ${file}: 0.command: stdio transport requires "command"`);
    expect(llm.chat).not.toHaveBeenCalled();
  });
});

describe('readMCPServers', () => {
  it('reports an unreadable file', async () => {
    await expect(readMCPServers('/nonexistent/mcp.json')).rejects.toThrow(/^Cannot read MCP servers from \/nonexistent\/mcp\.json: /);
  });
});

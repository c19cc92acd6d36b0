/**
 * run command: wire the coordinator, its subagents and the tool catalog,
 * then run one task to a terminal state.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import OpenAI from 'openai';
import { z } from 'zod';
import type { ILLM, RunResult, RuntimeEventCallback } from '@conclave/agent-contracts';
import { InvalidConfigError, errorMessage } from '@conclave/agent-contracts';
import {
  OpenAILLM,
  PersistentMemoryStore,
  SharedMemoryStore,
  SubagentManager,
  createCoordinator,
  loadAgentPresets,
  type Logger,
} from '@conclave/agent-core';
import {
  ForecastingClient,
  SEARCH_CONFIG,
  SUBAGENT_ONLY_TOOLS,
  TOOL_NAMES,
  createToolCatalog,
  type ToolCatalogOptions,
} from '@conclave/agent-tools';
import { MCPServerConfigSchema, MCPToolSource } from '@conclave/agent-mcp';
import type { CliEnv } from '../../config.js';

export interface RunTaskOptions {
  task: string;
  /** Provider model id, aliases already resolved */
  model: string;
  /** Default: a fresh `task-<uuid>` */
  taskId?: string;
  /** Directory of YAML agent presets to pre-register as subagents */
  agents?: string;
  maxIterations?: number;
  /** Persist shared memory as JSON lines in this directory */
  memoryDir?: string;
  /** Directory of the cross-task memory; enables persistent_memory */
  persistentDir?: string;
  /** JSON file listing MCP servers */
  mcp?: string;
}

export interface RunTaskDeps {
  env: CliEnv;
  logger: Logger;
  /** Default: OpenAILLM against OPENROUTER_BASE_URL */
  llm?: ILLM;
  /** Forecasting HTTP transport */
  fetch?: typeof fetch;
  onEvent?: RuntimeEventCallback;
  signal?: AbortSignal;
}

export interface RunTaskResult {
  taskId: string;
  result: RunResult;
}

/** Catalog tools the coordinator does not take as extra tools */
const NOT_EXTRA_TOOLS: ReadonlySet<string> = new Set([
  TOOL_NAMES.subagentManager,
  TOOL_NAMES.memoryManager,
  TOOL_NAMES.sharedMemory,
  TOOL_NAMES.reportResults,
  ...SUBAGENT_ONLY_TOOLS,
]);

const MCPServersSchema = z.array(MCPServerConfigSchema);

/**
 * Read and validate the MCP server list.
 */
export async function readMCPServers(file: string): Promise<z.output<typeof MCPServersSchema>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf-8'));
  } catch (error) {
    throw new InvalidConfigError(`Cannot read MCP servers from ${file}`, [errorMessage(error)]);
  }
  const parsed = MCPServersSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      `Invalid MCP servers in ${file}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Collaborators registered only when their environment is configured.
 */
export function collaboratorOptions(env: CliEnv, fetchImpl?: typeof fetch): ToolCatalogOptions {
  const options: ToolCatalogOptions = {};
  if (env.API_URL && env.BOT_USER_ID !== undefined) {
    options.forecasting = new ForecastingClient({
      baseUrl: env.API_URL,
      userId: env.BOT_USER_ID,
      username: env.BOT_USERNAME,
      password: env.BOT_PASSWORD,
      fetch: fetchImpl,
    });
  }
  if (env.PERPLEXITY_API_KEY) {
    options.search = {
      client: new OpenAI({ apiKey: env.PERPLEXITY_API_KEY, baseURL: SEARCH_CONFIG.baseURL, maxRetries: 0 }),
    };
  }
  return options;
}

export async function runTask(options: RunTaskOptions, deps: RunTaskDeps): Promise<RunTaskResult> {
  const { env, logger, signal, onEvent } = deps;
  const taskId = options.taskId ?? `task-${randomUUID()}`;
  const log = logger.child({ taskId });

  const llm = deps.llm ?? new OpenAILLM({ apiKey: env.OPENROUTER_API_KEY, baseURL: env.OPENROUTER_BASE_URL });
  const store = options.memoryDir
    ? await SharedMemoryStore.open({ persistDir: options.memoryDir, logger })
    : new SharedMemoryStore({ logger });
  const memory = store.forTask(taskId);
  const catalog = createToolCatalog({
    ...collaboratorOptions(env, deps.fetch),
    ...(options.persistentDir
      ? { persistentMemory: await PersistentMemoryStore.open({ dir: options.persistentDir, logger }) }
      : {}),
  });

  const sources: MCPToolSource[] = [];
  try {
    if (options.mcp) {
      for (const server of await readMCPServers(options.mcp)) {
        const source = new MCPToolSource(server, {
          onConnected: (name, toolCount) => log.info({ server: name, toolCount }, 'MCP server connected'),
          onAudit: (name, tool, input, agentName) => log.info({ server: name, tool, input, agent: agentName }, 'MCP tool call'),
          onDenied: (name, tool, reason) => log.warn({ server: name, tool, reason }, 'MCP tool denied'),
        });
        sources.push(source);
        await source.connect();
        source.registerInto(catalog);
      }
    }

    const subagents = new SubagentManager({
      llm,
      catalog,
      memory,
      defaultModel: options.model,
      logger,
      parentSignal: signal,
      onEvent,
    });
    if (options.agents) {
      for (const draft of await loadAgentPresets(options.agents)) {
        subagents.create(draft);
      }
    }

    const coordinator = createCoordinator({
      llm,
      catalog,
      memory,
      subagents,
      model: options.model,
      maxIterations: options.maxIterations,
      extraTools: catalog.names().filter((name) => !NOT_EXTRA_TOOLS.has(name)),
      logger,
      signal,
      onEvent,
    });

    log.info({ model: options.model, tools: catalog.names() }, 'Starting task');
    try {
      const result = await coordinator.run(options.task);
      return { taskId, result };
    } finally {
      const cancelled = await subagents.cancelAll();
      if (cancelled > 0) {
        log.warn({ cancelled }, 'Cancelled subagents still running after the coordinator finished');
      }
    }
  } finally {
    await Promise.all(sources.map((source) => source.dispose()));
  }
}

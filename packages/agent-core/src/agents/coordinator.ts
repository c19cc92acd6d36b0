/**
 * Coordinator: the top-level agent that plans, delegates and reports.
 *
 * It is an ordinary AgentRuntime whose tool context carries the subagent
 * manager, and which must finish through `report_results`.
 */

import type { AgentConfig, ILLM, RuntimeEventCallback, RuntimeSettingsInput } from '@conclave/agent-contracts';
import { AgentConfigSchema } from '@conclave/agent-contracts';
import { TOOL_NAMES } from '@conclave/agent-tools';
import type { ISubagentManager, ITaskMemory, ToolCatalog } from '@conclave/agent-tools';
import { AgentRuntime } from '../core/agent-runtime.js';
import { COORDINATOR_DEFAULTS } from '../constants.js';
import type { Logger } from '../logger.js';

export interface CoordinatorOptions {
  llm: ILLM;
  catalog: ToolCatalog;
  memory: ITaskMemory;
  subagents: ISubagentManager;
  model: string;
  maxIterations?: number;
  /** Replaces the default coordinator prompt */
  systemPrompt?: string;
  /** Extra catalog tools besides the coordination set */
  extraTools?: readonly string[];
  logger?: Logger;
  signal?: AbortSignal;
  settings?: RuntimeSettingsInput;
  onEvent?: RuntimeEventCallback;
}

const COORDINATION_TOOLS = [
  TOOL_NAMES.subagentManager,
  TOOL_NAMES.memoryManager,
  TOOL_NAMES.sharedMemory,
  TOOL_NAMES.reportResults,
];

export function createCoordinatorConfig(
  options: Pick<CoordinatorOptions, 'model' | 'maxIterations' | 'systemPrompt' | 'extraTools'>,
): AgentConfig {
  return AgentConfigSchema.parse({
    name: COORDINATOR_DEFAULTS.name,
    description: 'Plans the task, delegates to subagents and reports the outcome',
    systemPrompt: options.systemPrompt ?? COORDINATOR_DEFAULTS.systemPrompt(new Date().toISOString().slice(0, 10)),
    model: options.model,
    tools: [...new Set([...COORDINATION_TOOLS, ...(options.extraTools ?? [])])],
    maxIterations: options.maxIterations ?? COORDINATOR_DEFAULTS.maxIterations,
    terminationTools: [TOOL_NAMES.reportResults],
    requireTerminationTool: true,
  });
}

export function createCoordinator(options: CoordinatorOptions): AgentRuntime {
  const config = createCoordinatorConfig(options);
  const tools = options.catalog.resolve(config.tools, {
    agentName: config.name,
    taskId: options.memory.taskId,
    memory: options.memory,
    subagents: options.subagents,
    signal: options.signal,
  });

  return new AgentRuntime({
    config,
    llm: options.llm,
    tools,
    logger: options.logger,
    signal: options.signal,
    settings: options.settings,
    onEvent: options.onEvent,
    taskId: options.memory.taskId,
  });
}

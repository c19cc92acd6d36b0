/**
 * Catalogue of named agent configs and their runs.
 *
 * Features:
 * - Concurrency ceiling: at most `maxConcurrent` subagents in the running state
 * - Atomic admission: a parallel launch is admitted whole or rejected whole,
 *   decided synchronously before the first run starts
 * - Sequential batches that keep going after a failure unless told to stop
 * - Cooperative cancellation: delete/cancel abort the run's signal and wait
 *   for the loop to observe it
 * - Cancel tree: aborting the parent signal cancels every running subagent
 * - Failed runs are written to the task's shared memory under `errors`
 */

import {
  AgentConfigSchema,
  CapacityExceededError,
  InvalidConfigError,
  InvalidRunStateError,
  NameConflictError,
  UnknownSubagentError,
  errorMessage,
  isAgentError,
} from '@conclave/agent-contracts';
import type {
  AgentConfig,
  AgentConfigDraft,
  BatchOutcome,
  ILLM,
  RunResult,
  RuntimeEventCallback,
  RuntimeSettingsInput,
  SubagentInfo,
  SubagentStats,
  SubagentTask,
} from '@conclave/agent-contracts';
import { COORDINATOR_ONLY_TOOLS, TOOL_NAMES } from '@conclave/agent-tools';
import type { ISubagentManager, ITaskMemory, ToolCatalog, ToolContext } from '@conclave/agent-tools';
import { AgentRuntime } from '../core/agent-runtime.js';
import { RunStateMachine } from '../execution/state-machine.js';
import { AGENT_DEFAULTS, SUBAGENT_LIMITS, SUBAGENT_PROMPTS } from '../constants.js';
import { useLogger, type Logger } from '../logger.js';

// ═══════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════

export interface SubagentManagerConfig {
  llm: ILLM;
  /** Tools subagents may name in their config */
  catalog: ToolCatalog;
  /** Shared memory partition of the task the subagents work on */
  memory: ITaskMemory;
  /** Default: SUBAGENT_LIMITS.maxConcurrent */
  maxConcurrent?: number;
  /** Model for configs that name none */
  defaultModel?: string;
  logger?: Logger;
  /** Aborting it cancels every running subagent */
  parentSignal?: AbortSignal;
  settings?: RuntimeSettingsInput;
  onEvent?: RuntimeEventCallback;
}

export interface RunBatchOptions {
  /** Skip the remaining tasks after a failed or rejected one */
  stopOnFailure?: boolean;
}

interface SubagentRecord {
  readonly config: AgentConfig;
  readonly machine: RunStateMachine;
  readonly createdAt: string;
  runCount: number;
  lastResult?: RunResult;
  /** Set while a run is in progress */
  controller?: AbortController;
  current?: Promise<RunResult>;
  deleting: boolean;
}

// ═══════════════════════════════════════════════════════════════════════
// SubagentManager
// ═══════════════════════════════════════════════════════════════════════

export class SubagentManager implements ISubagentManager {
  private readonly records = new Map<string, SubagentRecord>();
  private readonly llm: ILLM;
  private readonly catalog: ToolCatalog;
  private readonly memory: ITaskMemory;
  private readonly limit: number;
  private readonly defaultModel: string;
  private readonly logger: Logger;
  private readonly parentSignal?: AbortSignal;
  private readonly settings?: RuntimeSettingsInput;
  private readonly onEvent?: RuntimeEventCallback;

  constructor(config: SubagentManagerConfig) {
    this.llm = config.llm;
    this.catalog = config.catalog;
    this.memory = config.memory;
    this.limit = config.maxConcurrent ?? SUBAGENT_LIMITS.maxConcurrent;
    this.defaultModel = config.defaultModel ?? AGENT_DEFAULTS.model;
    this.parentSignal = config.parentSignal;
    this.settings = config.settings;
    this.onEvent = config.onEvent;
    this.logger = (config.logger ?? useLogger()).child({ component: 'subagents', taskId: config.memory.taskId });
  }

  /**
   * Register a named config. Subagents always get `shared_memory` when the catalog has it
   * and a token budget of SUBAGENT_LIMITS.maxTotalTokens unless they set one.
   */
  create(draft: AgentConfigDraft): SubagentInfo {
    const parsed = AgentConfigSchema.safeParse({
      ...draft,
      model: draft.model ?? this.defaultModel,
      maxTotalTokens: draft.maxTotalTokens ?? SUBAGENT_LIMITS.maxTotalTokens,
    });
    if (!parsed.success) {
      throw new InvalidConfigError(
        'Invalid subagent config',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      );
    }

    const requested = parsed.data.tools;
    const reserved = requested.filter((tool) => COORDINATOR_ONLY_TOOLS.includes(tool));
    if (reserved.length > 0) {
      throw new InvalidConfigError('Coordinator-only tools', reserved);
    }
    const tools = this.catalog.has(TOOL_NAMES.sharedMemory)
      ? [...new Set([TOOL_NAMES.sharedMemory, ...requested])]
      : [...new Set(requested)];
    const missing = this.catalog.missing(tools);
    if (missing.length > 0) {
      throw new InvalidConfigError('Unknown tools', missing);
    }

    const config: AgentConfig = { ...parsed.data, tools };
    if (this.records.has(config.name)) {
      throw new NameConflictError(config.name);
    }

    const record: SubagentRecord = {
      config,
      machine: new RunStateMachine(config.name, (from, to) => this.onStateChange(config.name, from, to)),
      createdAt: new Date().toISOString(),
      runCount: 0,
      deleting: false,
    };
    this.records.set(config.name, record);
    this.logger.info({ agent: config.name, model: config.model, tools }, 'Subagent created');
    return this.toInfo(record);
  }

  /**
   * Run one subagent to a terminal state.
   */
  async run(name: string, input: string): Promise<RunResult> {
    const [record] = this.admit([name]);
    if (!record) {
      throw new UnknownSubagentError(name);
    }
    return this.launch(record, input);
  }

  /**
   * Launch every task concurrently, or none of them.
   */
  async runParallel(tasks: SubagentTask[]): Promise<RunResult[]> {
    const records = this.admit(tasks.map((task) => task.name));
    return Promise.all(records.map((record, index) => this.launch(record, tasks[index]?.input ?? '')));
  }

  /**
   * Run tasks one after another, one slot at a time.
   */
  async runBatch(tasks: SubagentTask[], options: RunBatchOptions = {}): Promise<BatchOutcome[]> {
    const outcomes: BatchOutcome[] = [];
    let stopped = false;

    for (const task of tasks) {
      if (stopped) {
        outcomes.push({ outcome: 'skipped', name: task.name });
        continue;
      }
      try {
        const result = await this.run(task.name, task.input);
        outcomes.push({ outcome: 'finished', name: task.name, result });
        stopped = options.stopOnFailure === true && result.state === 'failed';
      } catch (error) {
        outcomes.push({
          outcome: 'rejected',
          name: task.name,
          error: { code: isAgentError(error) ? error.code : 'RUN_ERROR', message: errorMessage(error) },
        });
        stopped = options.stopOnFailure === true;
      }
    }

    return outcomes;
  }

  /**
   * Remove a subagent. A running one is cancelled first; this resolves once it has stopped.
   */
  async delete(name: string): Promise<void> {
    const record = this.require(name);
    record.deleting = true;

    if (record.current) {
      record.controller?.abort();
      this.logger.info({ agent: name }, 'Cancelling subagent before delete');
      await record.current;
    }

    if (this.records.get(name) !== record) {
      return;
    }
    record.machine.transition('deleted');
    this.records.delete(name);
    this.logger.info({ agent: name }, 'Subagent deleted');
  }

  /**
   * Request cooperative cancellation of a running subagent.
   * Returns false when it is not running.
   */
  cancel(name: string): boolean {
    const record = this.require(name);
    if (!record.controller) {
      return false;
    }
    record.controller.abort();
    this.logger.info({ agent: name }, 'Subagent cancellation requested');
    return true;
  }

  /**
   * Cancel every running subagent and wait until all of them have stopped.
   * Returns how many were cancelled.
   */
  async cancelAll(): Promise<number> {
    const pending: Promise<RunResult>[] = [];
    for (const [name, record] of this.records) {
      if (record.controller && record.current) {
        record.controller.abort();
        this.logger.info({ agent: name }, 'Subagent cancellation requested');
        pending.push(record.current);
      }
    }
    await Promise.all(pending);
    return pending.length;
  }

  status(name: string): SubagentInfo {
    return this.toInfo(this.require(name));
  }

  list(): SubagentInfo[] {
    return Array.from(this.records.values()).map((record) => this.toInfo(record));
  }

  stats(): SubagentStats {
    const running = this.runningCount();
    return {
      running,
      limit: this.limit,
      available: Math.max(0, this.limit - running),
      total: this.records.size,
    };
  }

  // ── Private helpers ─────────────────────────────────────────────────

  /**
   * Check every name, then move all of them to running. Throws before any
   * state change when one check fails.
   */
  private admit(names: string[]): SubagentRecord[] {
    const seen = new Set<string>();
    const records = names.map((name) => {
      const record = this.require(name);
      if (seen.has(name)) {
        throw new InvalidRunStateError(name, 'running', 'launch twice in one batch');
      }
      seen.add(name);
      if (record.deleting) {
        throw new InvalidRunStateError(name, 'deleted', 'run');
      }
      record.machine.assertCanTransition('running');
      return record;
    });

    const running = this.runningCount();
    if (running + records.length > this.limit) {
      this.logger.warn({ requested: records.length, running, limit: this.limit }, 'Subagent launch rejected');
      throw new CapacityExceededError(records.length, running, this.limit);
    }

    for (const record of records) {
      record.machine.transition('running');
      record.controller = new AbortController();
    }
    this.logger.info({ agents: names, running: running + records.length, limit: this.limit }, 'Subagents admitted');
    return records;
  }

  private launch(record: SubagentRecord, input: string): Promise<RunResult> {
    const promise = this.execute(record, input);
    record.current = promise;
    return promise;
  }

  /**
   * Drive one admitted run to its terminal state. Never rejects.
   */
  private async execute(record: SubagentRecord, input: string): Promise<RunResult> {
    const { config } = record;
    const controller = record.controller ?? new AbortController();
    const onParentAbort = () => controller.abort();
    if (this.parentSignal?.aborted) {
      controller.abort();
    } else {
      this.parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    const startedAt = Date.now();
    let result: RunResult;
    try {
      const context: ToolContext = {
        agentName: config.name,
        taskId: this.memory.taskId,
        memory: this.memory,
        signal: controller.signal,
      };
      const runtime = new AgentRuntime({
        config: config.tools.includes(TOOL_NAMES.sharedMemory)
          ? { ...config, systemPrompt: `${config.systemPrompt}\n\n${SUBAGENT_PROMPTS.memoryInstructions}` }
          : config,
        llm: this.llm,
        tools: this.catalog.resolve(config.tools, context),
        logger: this.logger,
        signal: controller.signal,
        settings: this.settings,
        onEvent: this.onEvent,
        taskId: this.memory.taskId,
      });
      result = await runtime.run(input);
    } catch (error) {
      this.logger.error({ agent: config.name, err: error }, 'Subagent run crashed');
      result = {
        agentName: config.name,
        state: 'failed',
        reason: controller.signal.aborted ? 'cancelled' : 'provider_error',
        answer: '',
        iterations: 0,
        tokensUsed: 0,
        durationMs: Date.now() - startedAt,
        error: { code: isAgentError(error) ? error.code : 'RUN_ERROR', message: errorMessage(error) },
      };
    } finally {
      this.parentSignal?.removeEventListener('abort', onParentAbort);
    }

    record.runCount++;
    record.lastResult = result;
    record.controller = undefined;
    record.current = undefined;
    record.machine.transition(result.state, result.reason);

    if (result.state === 'failed') {
      this.recordFailure(result);
    }
    return result;
  }

  private recordFailure(result: RunResult): void {
    const lines = [
      `State: ${result.state}`,
      `Reason: ${result.reason}`,
      `Iterations: ${result.iterations}`,
      `Tokens used: ${result.tokensUsed}`,
    ];
    if (result.error) {
      lines.push(`Last error: ${result.error.code}: ${result.error.message}`);
    }
    if (result.answer) {
      lines.push(`Last output: ${result.answer}`);
    }

    try {
      this.memory.store({
        category: 'errors',
        title: `Run of ${result.agentName} failed (${result.reason})`,
        content: lines.join('\n'),
        tags: ['run-failure', result.reason],
        author: result.agentName,
        metadata: { reason: result.reason, errorCode: result.error?.code },
      });
    } catch (error) {
      this.logger.error({ agent: result.agentName, err: error }, 'Could not record failed run');
    }
  }

  private onStateChange(name: string, from: string, to: string): void {
    this.logger.debug({ agent: name, from, to }, 'Subagent state changed');
    this.onEvent?.({
      type: 'subagent:state',
      timestamp: new Date().toISOString(),
      agentName: name,
      taskId: this.memory.taskId,
      data: { from, to },
    });
  }

  private require(name: string): SubagentRecord {
    const record = this.records.get(name);
    if (!record) {
      throw new UnknownSubagentError(name);
    }
    return record;
  }

  private runningCount(): number {
    let running = 0;
    for (const record of this.records.values()) {
      if (record.machine.getCurrent() === 'running') running++;
    }
    return running;
  }

  private toInfo(record: SubagentRecord): SubagentInfo {
    return {
      name: record.config.name,
      state: record.machine.getCurrent(),
      config: record.config,
      createdAt: record.createdAt,
      runCount: record.runCount,
      ...(record.lastResult ? { lastResult: record.lastResult } : {}),
    };
  }
}

/**
 * `conclave` command line.
 */

import { Command, InvalidArgumentError } from 'commander';
import { errorMessage, isAgentError } from '@conclave/agent-contracts';
import { AGENT_DEFAULTS, COORDINATOR_DEFAULTS, createLogger } from '@conclave/agent-core';
import { loadEnvFiles, parseEnv, resolveModel, type CliEnv } from '../config.js';
import { createEventRenderer } from './ui/event-renderer.js';
import { runTask as defaultRunTask } from './commands/run.js';

interface RunFlags {
  model?: string;
  verbose?: boolean;
  taskId?: string;
  agents?: string;
  maxIterations?: number;
  memoryDir?: string;
  persistentDir?: string;
  mcp?: string;
}

export interface ProgramIO {
  /** Default: process.env after loading `.env` files */
  env?: Record<string, string | undefined>;
  runTask?: typeof defaultRunTask;
  /** stdout */
  print?: (line: string) => void;
  /** stderr */
  printError?: (line: string) => void;
  color?: boolean;
  setExitCode?: (code: number) => void;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

export function createProgram(io: ProgramIO = {}): Command {
  const print = io.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  const printError = io.printError ?? ((line: string) => process.stderr.write(`${line}\n`));
  const setExitCode = io.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const runTask = io.runTask ?? defaultRunTask;

  const program = new Command();

  program
    .name('conclave')
    .description('Run a coordinator agent that delegates a task to subagents sharing one memory')
    .argument('[task]', 'task for the coordinator', COORDINATOR_DEFAULTS.task)
    .option('-m, --model <id>', 'model id or alias (gemini, gpt-5, grok, opus, multi)')
    .option('-v, --verbose', 'show model turns and tool output')
    .option('--task-id <id>', 'shared memory task id (default: a new one)')
    .option('--agents <dir>', 'directory of YAML agent presets to pre-register')
    .option('--max-iterations <n>', 'coordinator iteration limit', parsePositiveInt)
    .option('--memory-dir <dir>', 'persist shared memory in this directory')
    .option('--persistent-dir <dir>', 'enable cross-task persistent memory stored in this directory')
    .option('--mcp <file>', 'JSON file listing MCP servers whose tools are offered')
    .action(async (task: string, flags: RunFlags) => {
      let env: CliEnv;
      try {
        if (!io.env) {
          loadEnvFiles();
        }
        env = parseEnv(io.env ?? process.env);
      } catch (error) {
        printError(errorMessage(error));
        setExitCode(2);
        return;
      }

      const logger = createLogger({ name: 'conclave', level: env.LOG_LEVEL, destination: 'stderr' });
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const { taskId, result } = await runTask(
          {
            task,
            model: resolveModel(flags.model ?? AGENT_DEFAULTS.model),
            taskId: flags.taskId,
            agents: flags.agents,
            maxIterations: flags.maxIterations,
            memoryDir: flags.memoryDir,
            persistentDir: flags.persistentDir,
            mcp: flags.mcp,
          },
          {
            env,
            logger,
            signal: controller.signal,
            onEvent: createEventRenderer({ verbose: flags.verbose, color: io.color ?? process.stdout.isTTY === true, print }),
          },
        );

        print('');
        print(result.answer);
        if (result.state === 'failed') {
          printError(`Task ${taskId} failed: ${result.reason}${result.error ? ` (${result.error.message})` : ''}`);
          setExitCode(1);
        }
      } catch (error) {
        if (isAgentError(error)) {
          printError(`${error.code}: ${error.message}`);
        } else {
          printError(errorMessage(error));
        }
        setExitCode(isAgentError(error) && error.code === 'INVALID_CONFIG' ? 2 : 1);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });

  return program;
}

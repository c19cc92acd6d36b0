/**
 * @conclave/agent-cli
 */

export { createProgram } from './cli/program.js';
export type { ProgramIO } from './cli/program.js';
export { runTask, readMCPServers, collaboratorOptions } from './cli/commands/run.js';
export type { RunTaskOptions, RunTaskDeps, RunTaskResult } from './cli/commands/run.js';
export { createEventRenderer, formatDuration } from './cli/ui/event-renderer.js';
export type { EventRendererOptions } from './cli/ui/event-renderer.js';
export { EnvSchema, MODEL_ALIASES, parseEnv, resolveModel, findEnvFiles, loadEnvFiles } from './config.js';
export type { CliEnv } from './config.js';

export { AgentRuntime, toolMessageContent } from './agent-runtime.js';
export type { AgentRuntimeOptions } from './agent-runtime.js';
export { ToolExecutor } from './tool-executor.js';
export type { ToolExecutorOptions } from './tool-executor.js';

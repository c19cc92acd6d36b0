export { SubagentManager } from './subagent-manager.js';
export type { SubagentManagerConfig, RunBatchOptions } from './subagent-manager.js';
export { createCoordinator, createCoordinatorConfig } from './coordinator.js';
export type { CoordinatorOptions } from './coordinator.js';
export { loadAgentPresets, parseAgentPreset } from './agent-presets.js';
export type { AgentPreset } from './agent-presets.js';

// Orchestrator Module - Main exports

export { ToolCallingOrchestrator, DEFAULT_MAX_ROUNDS } from './orchestrator.js';
export { extractText, getToolUseBlocks, formatToolError } from './extract.js';
export type {
  OrchestrationPhase,
  OrchestrationResult,
  OrchestrationSeed,
  OrchestrationState,
  OrchestratorOptions,
  ToolDispatcher,
} from './types.js';

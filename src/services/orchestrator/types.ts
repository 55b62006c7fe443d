// Orchestrator Types

import type { ConversationTurn, ModelResponse, ProviderTool } from '../../providers/types.js';
import type { ToolOutput } from '../tools/types.js';

export type OrchestrationPhase = 'AwaitingModel' | 'ExecutingTools' | 'Done';

/** Anything that can execute tools by name and describe them to the model. */
export interface ToolDispatcher {
  dispatch(name: string, args: Record<string, unknown>): Promise<ToolOutput>;
  toProviderTools(): ProviderTool[];
}

export interface OrchestratorOptions {
  model: string;
  maxRounds?: number;
  maxTokens?: number;
  temperature?: number;
}

export interface OrchestrationSeed {
  system: string;
  messages: readonly ConversationTurn[];
  initialResponse: ModelResponse; // Already requested tool use
}

// Owned by a single run, never shared between queries
export interface OrchestrationState {
  phase: OrchestrationPhase;
  history: ConversationTurn[];
  round: number;
  maxRounds: number;
  lastResponse: ModelResponse;
}

export interface OrchestrationResult {
  answer: string;
  rounds: number;
  modelCalls: number; // Calls made by the run itself; the seeding call is not counted
  toolCalls: number;
  aborted: boolean;
  history: readonly ConversationTurn[];
}

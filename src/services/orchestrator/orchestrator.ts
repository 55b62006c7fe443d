// Tool-Calling Orchestrator
// Drives the bounded request/execute/respond loop between the model and the tool registry

import type { ModelClient, ModelResponse, ToolResultBlock } from '../../providers/types.js';
import { extractText, formatToolError, getToolUseBlocks } from './extract.js';
import type {
  OrchestrationResult,
  OrchestrationSeed,
  OrchestrationState,
  OrchestratorOptions,
  ToolDispatcher,
} from './types.js';

export const DEFAULT_MAX_ROUNDS = 2;

interface RunCounters {
  modelCalls: number;
  toolCalls: number;
}

export class ToolCallingOrchestrator {
  private model: string;
  private maxRounds: number;
  private maxTokens: number;
  private temperature: number;

  constructor(
    private client: ModelClient,
    private tools: ToolDispatcher,
    options: OrchestratorOptions
  ) {
    const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new Error(`maxRounds must be a positive integer, got ${maxRounds}`);
    }

    this.model = options.model;
    this.maxRounds = maxRounds;
    this.maxTokens = options.maxTokens ?? 800;
    this.temperature = options.temperature ?? 0;
  }

  /**
   * Runs the loop from a first response that already asked for tools.
   *
   * Each round executes every requested tool in order and appends the
   * assistant turn plus one user turn of results. Once `maxRounds` rounds have
   * run, one last call is made without tools so the model has to answer.
   * A tool that throws ends the run with a fixed error answer.
   */
  async run(seed: OrchestrationSeed): Promise<OrchestrationResult> {
    const state: OrchestrationState = {
      phase: 'AwaitingModel',
      history: [...seed.messages],
      round: 0,
      maxRounds: this.maxRounds,
      lastResponse: seed.initialResponse,
    };
    const counters: RunCounters = { modelCalls: 0, toolCalls: 0 };

    while (true) {
      const toolUses = getToolUseBlocks(state.lastResponse);
      if (toolUses.length === 0) {
        return this.finish(state, counters, extractText(state.lastResponse), false);
      }

      state.phase = 'ExecutingTools';
      state.history.push({ role: 'assistant', content: state.lastResponse.content });

      const results: ToolResultBlock[] = [];
      for (const toolUse of toolUses) {
        try {
          const output = await this.tools.dispatch(toolUse.name, toolUse.input);
          counters.toolCalls++;
          results.push({ type: 'tool_result', tool_use_id: toolUse.id, content: output.content });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[Orchestrator] Tool "${toolUse.name}" failed in round ${state.round + 1}:`, message);
          return this.finish(state, counters, formatToolError(message), true);
        }
      }

      state.history.push({ role: 'user', content: results });
      state.round++;
      state.phase = 'AwaitingModel';

      if (state.round >= state.maxRounds) {
        // Round budget spent: tools are withheld so this response is terminal
        const finalResponse = await this.callModel(state, seed.system, counters, false);
        return this.finish(state, counters, extractText(finalResponse), false);
      }

      state.lastResponse = await this.callModel(state, seed.system, counters, true);
    }
  }

  private async callModel(
    state: OrchestrationState,
    system: string,
    counters: RunCounters,
    offerTools: boolean
  ): Promise<ModelResponse> {
    counters.modelCalls++;
    console.log(
      `[Orchestrator] Model call ${counters.modelCalls} after round ${state.round}/${state.maxRounds}` +
        (offerTools ? '' : ' (tools withheld)')
    );

    return this.client.createMessage({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system,
      messages: [...state.history],
      ...(offerTools ? { tools: this.tools.toProviderTools(), tool_choice: { type: 'auto' as const } } : {}),
    });
  }

  private finish(
    state: OrchestrationState,
    counters: RunCounters,
    answer: string,
    aborted: boolean
  ): OrchestrationResult {
    state.phase = 'Done';
    return {
      answer,
      rounds: state.round,
      modelCalls: counters.modelCalls,
      toolCalls: counters.toolCalls,
      aborted,
      history: state.history,
    };
  }
}

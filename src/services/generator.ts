/**
 * Response Generator
 * Front door to the language model: composes the system prompt, makes the
 * first call and hands tool-using responses to the orchestrator.
 */

import type { ModelClient, ModelRequest, ProviderTool } from '../providers/types.js';
import { DEFAULT_MAX_ROUNDS, ToolCallingOrchestrator, extractText, type ToolDispatcher } from './orchestrator/index.js';

export const SYSTEM_PROMPT = `You are an assistant for questions about course materials and educational content. You can search course content and look up course outlines.

Course content search:
- Use it for questions about specific course content or detailed material
- You may search more than once per question when the first results are not enough
- Base answers on what the search returns
- If the search finds nothing, say so plainly

Course outline lookup:
- Use it for questions about course structure, topics, lesson lists or the syllabus
- You may combine tools: look up the outline first, then search a specific lesson

How to respond:
- General knowledge questions: answer from your own knowledge without searching
- Course-specific questions: search first, then answer
- Give the answer only; do not describe your reasoning, the search, or the question type
- Do not write "based on the search results"

Every answer should be brief, educational, clear, and use an example where it helps understanding.`;

export interface GenerateResponseParams {
  query: string;
  conversationHistory?: string | null;
  tools?: ProviderTool[];
  toolRegistry?: ToolDispatcher;
}

export interface ResponseGeneratorOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  maxToolRounds?: number;
}

export interface GenerationResult {
  answer: string;
  usedTools: boolean;
  aborted: boolean;
}

export interface ConnectionCheck {
  success: boolean;
  message: string;
}

export class ResponseGenerator {
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private maxToolRounds: number;

  constructor(private client: ModelClient, options: ResponseGeneratorOptions) {
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 800;
    this.temperature = options.temperature ?? 0;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_ROUNDS;
  }

  buildSystemContent(conversationHistory?: string | null): string {
    return conversationHistory
      ? `${SYSTEM_PROMPT}\n\nPrevious conversation:\n${conversationHistory}`
      : SYSTEM_PROMPT;
  }

  async generateResponse(params: GenerateResponseParams): Promise<string> {
    const result = await this.generate(params);
    return result.answer;
  }

  /**
   * Like `generateResponse`, but also reports whether a failed tool ended
   * the run early.
   */
  async generate({ query, conversationHistory, tools, toolRegistry }: GenerateResponseParams): Promise<GenerationResult> {
    const system = this.buildSystemContent(conversationHistory);

    const request: ModelRequest = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system,
      messages: [{ role: 'user', content: query }],
      ...(tools && tools.length > 0 ? { tools, tool_choice: { type: 'auto' as const } } : {}),
    };

    const response = await this.client.createMessage(request);

    if (response.stop_reason === 'tool_use' && toolRegistry) {
      const orchestrator = new ToolCallingOrchestrator(this.client, toolRegistry, {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        maxRounds: this.maxToolRounds,
      });

      const result = await orchestrator.run({
        system,
        messages: request.messages,
        initialResponse: response,
      });

      console.log(
        `[Generator] Tool loop finished: ${result.rounds} round(s), ${result.toolCalls} tool call(s), ` +
          `${result.modelCalls + 1} model call(s)${result.aborted ? ', aborted' : ''}`
      );
      return { answer: result.answer, usedTools: true, aborted: result.aborted };
    }

    return { answer: extractText(response), usedTools: false, aborted: false };
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      await this.client.createMessage({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return { success: true, message: 'Connection successful' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, message: `Connection failed: ${message}` };
    }
  }
}

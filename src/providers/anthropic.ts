// Anthropic Provider
// Uses @anthropic-ai/sdk Messages API with native tool use

import Anthropic from '@anthropic-ai/sdk';
import { env } from '../env.js';
import {
  isRecord,
  normalizeStopReason,
  type ConversationTurn,
  type ModelClient,
  type ModelRequest,
  type ModelResponse,
  type ResponseBlock,
} from './types.js';

function toAnthropicMessages(turns: readonly ConversationTurn[]): Anthropic.Messages.MessageParam[] {
  return turns.map(turn => {
    if (typeof turn.content === 'string') {
      return { role: turn.role, content: turn.content };
    }

    const content = turn.content.map(block => {
      switch (block.type) {
        case 'text':
          return { type: 'text' as const, text: block.text };
        case 'tool_use':
          return { type: 'tool_use' as const, id: block.id, name: block.name, input: block.input };
        case 'tool_result':
          return { type: 'tool_result' as const, tool_use_id: block.tool_use_id, content: block.content };
      }
    });

    return { role: turn.role, content };
  });
}

function fromAnthropicContent(content: Anthropic.Messages.Message['content']): ResponseBlock[] {
  const blocks: ResponseBlock[] = [];

  for (const block of content) {
    if (block.type === 'text') {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      blocks.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }

  return blocks;
}

export class AnthropicProvider implements ModelClient {
  name = 'anthropic';
  private client: Anthropic;

  constructor(apiKey: string = env.ANTHROPIC_API_KEY) {
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    this.client = new Anthropic({ apiKey });
  }

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.max_tokens,
      messages: toAnthropicMessages(request.messages),
      ...(request.system ? { system: request.system } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.tools && request.tools.length > 0 ? { tools: request.tools } : {}),
      ...(request.tools && request.tools.length > 0 && request.tool_choice
        ? { tool_choice: request.tool_choice }
        : {}),
    };

    const message = await this.client.messages.create(params);

    return {
      stop_reason: normalizeStopReason(message.stop_reason),
      content: fromAnthropicContent(message.content),
      usage: {
        promptTokens: message.usage.input_tokens,
        completionTokens: message.usage.output_tokens,
        totalTokens: message.usage.input_tokens + message.usage.output_tokens,
      },
    };
  }
}

// AWS Bedrock Provider
// Uses @aws-sdk/client-bedrock-runtime to reach Claude models with the Anthropic messages body

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { env } from '../env.js';
import {
  normalizeStopReason,
  type ModelClient,
  type ModelRequest,
  type ModelResponse,
  type ResponseBlock,
} from './types.js';

const BedrockClaudeResponseSchema = z.object({
  stop_reason: z.string().nullable().optional(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      id: z.string().optional(),
      name: z.string().optional(),
      input: z.record(z.unknown()).optional(),
    }),
  ),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

type BedrockClaudeResponse = z.infer<typeof BedrockClaudeResponseSchema>;

function toResponseBlocks(content: BedrockClaudeResponse['content']): ResponseBlock[] {
  const blocks: ResponseBlock[] = [];
  for (const block of content) {
    if (block.type === 'text' && block.text !== undefined) {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use' && block.id && block.name) {
      blocks.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input ?? {} });
    }
  }
  return blocks;
}

export class BedrockProvider implements ModelClient {
  name = 'bedrock';
  private client: BedrockRuntimeClient;

  constructor() {
    if (!env.AWS_ACCESS_KEY_ID || !env.AWS_SECRET_ACCESS_KEY || !env.BEDROCK_REGION) {
      throw new Error('AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, and BEDROCK_REGION are required');
    }

    this.client = new BedrockRuntimeClient({
      region: env.BEDROCK_REGION,
      credentials: {
        accessKeyId: env.AWS_ACCESS_KEY_ID,
        secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      },
    });
  }

  private formatRequest(request: ModelRequest) {
    const hasTools = !!request.tools && request.tools.length > 0;
    return {
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: request.max_tokens,
      temperature: request.temperature ?? 0,
      messages: request.messages,
      ...(request.system ? { system: request.system } : {}),
      ...(hasTools ? { tools: request.tools } : {}),
      ...(hasTools && request.tool_choice ? { tool_choice: request.tool_choice } : {}),
    };
  }

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    if (!request.model.includes('anthropic.claude')) {
      throw new Error(`Bedrock model does not support tool use: ${request.model}`);
    }

    const command = new InvokeModelCommand({
      modelId: request.model,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(this.formatRequest(request)),
    });

    const response = await this.client.send(command);
    const parsed = BedrockClaudeResponseSchema.safeParse(
      JSON.parse(new TextDecoder().decode(response.body)),
    );

    if (!parsed.success) {
      throw new Error(`Unexpected Bedrock response: ${parsed.error.message}`);
    }

    const promptTokens = parsed.data.usage?.input_tokens ?? 0;
    const completionTokens = parsed.data.usage?.output_tokens ?? 0;

    return {
      stop_reason: normalizeStopReason(parsed.data.stop_reason),
      content: toResponseBlocks(parsed.data.content),
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
    };
  }
}

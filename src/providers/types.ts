// Provider Interface for the course RAG API
// Messages-style contract shared by every language-model provider

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
}

// Blocks a model can emit
export type ResponseBlock = TextBlock | ToolUseBlock;

// Blocks that may appear in conversation history
export type ContentBlock = ResponseBlock | ToolResultBlock;

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string | readonly ContentBlock[];
}

export interface JsonSchemaProperty {
  type: string;
  description: string;
  enum?: string[];
  default?: unknown;
}

export interface ProviderTool {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export type ToolChoice = { type: 'auto' } | { type: 'any' } | { type: 'tool'; name: string };

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

export interface ModelRequest {
  model: string;
  messages: readonly ConversationTurn[];
  system?: string;
  max_tokens: number;
  temperature?: number;
  tools?: ProviderTool[];
  tool_choice?: ToolChoice;
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResponse {
  stop_reason: StopReason;
  content: ResponseBlock[];
  usage?: ProviderUsage;
}

export interface ModelClient {
  name: string;
  createMessage(request: ModelRequest): Promise<ModelResponse>;
}

export function normalizeStopReason(value: string | null | undefined): StopReason {
  switch (value) {
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
      return value;
    default:
      return 'end_turn';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

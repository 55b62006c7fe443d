// Provider Registry
// Central registry for the language-model providers

import type { ModelClient } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { BedrockProvider } from './bedrock.js';
import { env, isProviderConfigured } from '../env.js';

// Provider instances (lazy initialization)
const providers: Map<string, ModelClient> = new Map();

function getOrCreateProvider(name: string): ModelClient | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let provider: ModelClient | null = null;

  switch (name) {
    case 'anthropic':
      provider = new AnthropicProvider();
      break;
    case 'bedrock':
      provider = new BedrockProvider();
      break;
    default:
      return null;
  }

  providers.set(name, provider);
  return provider;
}

export function getProvider(name: string): ModelClient {
  const provider = getOrCreateProvider(name);

  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  return provider;
}

// Model identifier to send with each request for the given provider
export function getModelForProvider(name: string): string {
  return name === 'bedrock' ? env.BEDROCK_MODEL_ID : env.ANTHROPIC_MODEL;
}

export type {
  ModelClient,
  ModelRequest,
  ModelResponse,
  ConversationTurn,
  ContentBlock,
  ResponseBlock,
  ProviderTool,
} from './types.js';

// Environment configuration for the course RAG API
// Load provider credentials, retrieval tuning and server settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

export function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export type LlmProviderName = 'anthropic' | 'bedrock';

function parseProvider(value: string | undefined): LlmProviderName {
  const name = strEnv(value, 'anthropic').toLowerCase();
  if (name === 'anthropic' || name === 'bedrock') return name;
  console.error(`Invalid LLM_PROVIDER "${value}", using default anthropic`);
  return 'anthropic';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Language model
  LLM_PROVIDER: parseProvider(process.env.LLM_PROVIDER),
  ANTHROPIC_API_KEY: strEnv(process.env.ANTHROPIC_API_KEY),
  ANTHROPIC_MODEL: strEnv(process.env.ANTHROPIC_MODEL, 'claude-sonnet-4-20250514'),
  MAX_TOKENS: parsePositiveInt(process.env.MAX_TOKENS, 800, 'MAX_TOKENS'),

  // AWS Bedrock (Claude models only)
  AWS_ACCESS_KEY_ID: strEnv(process.env.AWS_ACCESS_KEY_ID),
  AWS_SECRET_ACCESS_KEY: strEnv(process.env.AWS_SECRET_ACCESS_KEY),
  BEDROCK_REGION: strEnv(process.env.BEDROCK_REGION || process.env.AWS_REGION, 'us-east-1'),
  BEDROCK_MODEL_ID: strEnv(process.env.BEDROCK_MODEL_ID, 'anthropic.claude-3-5-sonnet-20240620-v1:0'),

  // Embeddings
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  EMBEDDING_MODEL: strEnv(process.env.EMBEDDING_MODEL, 'text-embedding-3-small'),

  // Document processing and retrieval
  CHUNK_SIZE: parsePositiveInt(process.env.CHUNK_SIZE, 800, 'CHUNK_SIZE'),
  CHUNK_OVERLAP: parsePositiveInt(process.env.CHUNK_OVERLAP, 100, 'CHUNK_OVERLAP'),
  MAX_RESULTS: parsePositiveInt(process.env.MAX_RESULTS, 5, 'MAX_RESULTS'),
  MAX_HISTORY: parsePositiveInt(process.env.MAX_HISTORY, 2, 'MAX_HISTORY'),
  MAX_TOOL_ROUNDS: parsePositiveInt(process.env.MAX_TOOL_ROUNDS, 2, 'MAX_TOOL_ROUNDS'),
  DOCS_PATH: strEnv(process.env.DOCS_PATH, './docs'),

  // Sessions
  SESSION_TTL_MS: parsePositiveInt(process.env.SESSION_TTL_MS, 60 * 60 * 1000, 'SESSION_TTL_MS'),

  // Rate limiting
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_QUERY_PER_WINDOW: parsePositiveInt(
    process.env.RATE_LIMIT_QUERY_PER_WINDOW,
    20,
    'RATE_LIMIT_QUERY_PER_WINDOW',
  ),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'anthropic':
      return !!env.ANTHROPIC_API_KEY;
    case 'bedrock':
      return !!env.AWS_ACCESS_KEY_ID && !!env.AWS_SECRET_ACCESS_KEY;
    default:
      return false;
  }
}

export function areEmbeddingsConfigured(): boolean {
  return !!env.OPENAI_API_KEY;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Course RAG API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  LLM provider: ${env.LLM_PROVIDER} (configured: ${isProviderConfigured(env.LLM_PROVIDER)})`);
  console.log(`  Model: ${env.LLM_PROVIDER === 'bedrock' ? env.BEDROCK_MODEL_ID : env.ANTHROPIC_MODEL}`);
  console.log(`  Embedding model: ${env.EMBEDDING_MODEL} (configured: ${areEmbeddingsConfigured()})`);
  console.log(`  Chunk size / overlap: ${env.CHUNK_SIZE} / ${env.CHUNK_OVERLAP}`);
  console.log(`  Max results: ${env.MAX_RESULTS}`);
  console.log(`  Max history exchanges: ${env.MAX_HISTORY}`);
  console.log(`  Max tool rounds: ${env.MAX_TOOL_ROUNDS}`);
  console.log(`  Documents path: ${env.DOCS_PATH}`);
  console.log(`  Rate limiting enabled: ${env.RATE_LIMITING_ENABLED}`);
  if (env.RATE_LIMITING_ENABLED) {
    console.log(`  Rate limit window ms: ${env.RATE_LIMIT_WINDOW_MS}`);
    console.log(`  /api/query max per window: ${env.RATE_LIMIT_QUERY_PER_WINDOW}`);
  }
}

/**
 * Embedding Service
 * Generates embeddings using the OpenAI embeddings API
 */

import OpenAI from 'openai';
import { env } from '../env.js';

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI | null = null;

  constructor(
    private apiKey: string = env.OPENAI_API_KEY,
    private model: string = env.EMBEDDING_MODEL,
    private batchSize = 100
  ) {}

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY not set - embeddings are unavailable');
    }

    this.client = new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  /**
   * Embeds texts in batches. OpenAI accepts up to 2048 inputs per request,
   * smaller batches keep us clear of rate limits.
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const client = this.getClient();
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);

      const response = await client.embeddings.create({
        model: this.model,
        input: batch,
        encoding_format: 'float',
      });

      embeddings.push(...response.data.map((d) => d.embedding));

      // Small delay to avoid rate limits
      if (i + this.batchSize < texts.length) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
    }

    return embeddings;
  }
}

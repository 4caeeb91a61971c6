import OpenAI from 'openai';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';

export interface OpenAIEmbedderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  readonly dimensions: number;
  private readonly cache = new Map<string, number[]>();

  constructor(config: OpenAIEmbedderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 1 });
    this.model = config.model ?? 'text-embedding-3-small';
    this.dimensions = config.dimensions ?? 256;
  }

  async embed(text: string): Promise<number[]> {
    const key = text.trim().toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    const res = await this.client.embeddings.create({
      model: this.model,
      input: key || ' ',
      dimensions: this.dimensions,
    });
    const vector = res.data[0]?.embedding;
    if (!vector) throw new Error('Embedding response had no data');
    if (this.cache.size > 500) this.cache.clear();
    this.cache.set(key, vector);
    return vector;
  }
}

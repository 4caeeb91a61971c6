// Remote shard: POST {semantic_text, filters, top_n} → ordered hits
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ShardError } from '@/errors/pipelineErrors';
import type { ShardHit, ShardSearchRequest, ShardSearcher } from './shard-provider';

const responseSchema = z.object({
  results: z.array(
    z.object({
      item_id: z.string().min(1),
      similarity_score: z.number().finite(),
      metadata: z.record(z.unknown()).default({}),
    }),
  ),
});

export class HttpShard implements ShardSearcher {
  private readonly http: AxiosInstance;

  constructor(
    readonly id: string,
    private readonly url: string,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ headers: { 'Content-Type': 'application/json' } });
  }

  async search(request: ShardSearchRequest, signal: AbortSignal): Promise<ShardHit[]> {
    const res = await this.http.post<unknown>(
      this.url,
      { semantic_text: request.semanticText, filters: request.filters, top_n: request.topN },
      { signal },
    );

    const parsed = responseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new ShardError(this.id, 'error', `Malformed shard response: ${parsed.error.errors[0]?.message ?? 'invalid'}`);
    }
    return parsed.data.results.slice(0, request.topN).map((r) => ({
      itemId: r.item_id,
      similarityScore: r.similarity_score,
      metadata: r.metadata,
    }));
  }
}

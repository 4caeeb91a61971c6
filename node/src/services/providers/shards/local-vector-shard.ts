// In-process shard over a JSON vector snapshot
import fs from 'fs';
import { z } from 'zod';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { cosineSimilarity } from '@/services/providers/retrieval-vector-utils';
import { ShardError } from '@/errors/pipelineErrors';
import { matchesFilters, type ShardHit, type ShardSearchRequest, type ShardSearcher } from './shard-provider';

export const shardSnapshotSchema = z.object({
  items: z.array(
    z.object({
      itemId: z.string().min(1),
      text: z.string(),
      vector: z.array(z.number()).optional(),
      metadata: z.record(z.unknown()).default({}),
    }),
  ),
});

export type ShardSnapshot = z.infer<typeof shardSnapshotSchema>;

interface IndexedItem {
  itemId: string;
  vector: number[];
  metadata: Record<string, unknown>;
}

export class LocalVectorShard implements ShardSearcher {
  private index: Promise<IndexedItem[]> | null = null;

  constructor(
    readonly id: string,
    private readonly source: ShardSnapshot | (() => ShardSnapshot),
    private readonly embedder: Embedder,
  ) {}

  static fromFile(id: string, filePath: string, embedder: Embedder): LocalVectorShard {
    return new LocalVectorShard(
      id,
      () => shardSnapshotSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8'))),
      embedder,
    );
  }

  async search(request: ShardSearchRequest, signal: AbortSignal): Promise<ShardHit[]> {
    const items = await this.load();
    const queryVector = await this.embedder.embed(request.semanticText);
    if (signal.aborted) throw new ShardError(this.id, 'aborted', 'Search abandoned');

    return items
      .filter((item) => matchesFilters(item.metadata, request.filters))
      .map((item) => ({
        itemId: item.itemId,
        similarityScore: Math.max(0, Math.min(1, cosineSimilarity(queryVector, item.vector))),
        metadata: item.metadata,
      }))
      .sort((a, b) => b.similarityScore - a.similarityScore || a.itemId.localeCompare(b.itemId))
      .slice(0, request.topN);
  }

  /** Embeds items lacking a usable vector once, on first search. A failed load is retried next time. */
  private async load(): Promise<IndexedItem[]> {
    if (!this.index) this.index = this.buildIndex();
    try {
      return await this.index;
    } catch (err) {
      this.index = null;
      throw err;
    }
  }

  private async buildIndex(): Promise<IndexedItem[]> {
    const snapshot = typeof this.source === 'function' ? this.source() : this.source;
    return Promise.all(
      snapshot.items.map(async (item) => ({
        itemId: item.itemId,
        metadata: item.metadata,
        vector:
          item.vector && item.vector.length === this.embedder.dimensions
            ? item.vector
            : await this.embedder.embed(item.text),
      })),
    );
  }
}

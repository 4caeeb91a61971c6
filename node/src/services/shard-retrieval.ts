// src/services/shard-retrieval.ts: parallel fan-out over shards, then one pure merge
import type { CandidateItem, Query, ShardFailure } from '@/types/core';
import { ShardError, TotalRetrievalFailure, errorMessage } from '@/errors/pipelineErrors';
import { withTimeout } from '@/utils/withTimeout';
import type { ShardHit, ShardSearcher } from './providers/shards/shard-provider';
import { logger } from './logger';

export interface RetrieveOptions {
  topNPerShard: number;
  /** Size bound on the merged list handed to reranking. */
  cap: number;
  /** Aborts every in-flight shard search; set when the whole turn times out. */
  signal?: AbortSignal;
}

export interface RetrievalResult {
  candidates: CandidateItem[];
  failedShards: ShardFailure[];
  /** True when at least one shard contributed nothing because it failed. */
  degraded: boolean;
}

type ShardOutcome = { ok: true; candidates: CandidateItem[] } | { ok: false; failure: ShardFailure };

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toCandidates(shardId: string, hits: ShardHit[]): CandidateItem[] {
  return hits
    .filter((h) => Number.isFinite(h.similarityScore))
    .map((h) =>
      Object.freeze({
        itemId: h.itemId,
        similarityScore: h.similarityScore,
        shardId,
        rawMetadata: Object.freeze({ ...h.metadata }),
      }),
    );
}

/**
 * Union → dedupe by itemId keeping the highest score → sort by score desc,
 * itemId asc → cap. Shard arrival order has no effect on the result.
 */
export function mergeCandidates(perShard: readonly (readonly CandidateItem[])[], cap: number): CandidateItem[] {
  const best = perShard.flat().reduce((acc, candidate) => {
    const current = acc.get(candidate.itemId);
    if (
      !current ||
      candidate.similarityScore > current.similarityScore ||
      (candidate.similarityScore === current.similarityScore && compareIds(candidate.shardId, current.shardId) < 0)
    ) {
      acc.set(candidate.itemId, candidate);
    }
    return acc;
  }, new Map<string, CandidateItem>());

  return Array.from(best.values())
    .sort((a, b) => b.similarityScore - a.similarityScore || compareIds(a.itemId, b.itemId))
    .slice(0, Math.max(0, cap));
}

export class ShardRetrievalCoordinator {
  constructor(
    private readonly shards: readonly ShardSearcher[],
    private readonly options: { shardTimeoutMs: number },
  ) {}

  get shardCount(): number {
    return this.shards.length;
  }

  async retrieve(query: Query, options: RetrieveOptions): Promise<RetrievalResult> {
    const startedAt = Date.now();
    const request = { semanticText: query.semanticText, filters: query.filters, topN: options.topNPerShard };

    const outcomes = await Promise.all(
      this.shards.map((shard) => this.searchOne(shard, request, options.signal)),
    );

    const failedShards: ShardFailure[] = [];
    const perShard: CandidateItem[][] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) perShard.push(outcome.candidates);
      else failedShards.push(outcome.failure);
    }

    if (perShard.length === 0) {
      logger.error('retrieval:all_shards_failed', { failures: failedShards });
      throw new TotalRetrievalFailure(failedShards);
    }

    const candidates = mergeCandidates(perShard, options.cap);
    logger.info('retrieval:done', {
      shards: this.shards.length,
      failed: failedShards.length,
      candidates: candidates.length,
      ms: Date.now() - startedAt,
    });

    return { candidates, failedShards, degraded: failedShards.length > 0 };
  }

  /** Never rejects: a failure becomes a recorded outcome so siblings are unaffected. */
  private async searchOne(
    shard: ShardSearcher,
    request: { semanticText: string; filters: Query['filters']; topN: number },
    signal?: AbortSignal,
  ): Promise<ShardOutcome> {
    const timeoutMs = this.options.shardTimeoutMs;
    try {
      const hits = await withTimeout((shardSignal) => shard.search(request, shardSignal), {
        timeoutMs,
        onTimeout: () => new ShardError(shard.id, 'timeout', `No answer within ${timeoutMs}ms`),
        onAbort: () => new ShardError(shard.id, 'aborted', 'Turn cancelled'),
        signal,
      });
      return { ok: true, candidates: toCandidates(shard.id, hits) };
    } catch (err) {
      const failure =
        err instanceof ShardError ? err.toFailure() : new ShardError(shard.id, 'error', errorMessage(err), err).toFailure();
      logger.warn('retrieval:shard_failed', failure);
      return { ok: false, failure };
    }
  }
}

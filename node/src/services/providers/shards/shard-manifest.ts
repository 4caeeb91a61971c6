// Builds shard searchers from the manifest file
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { logger } from '@/services/logger';
import { LocalVectorShard } from './local-vector-shard';
import { HttpShard } from './http-shard';
import type { ShardSearcher } from './shard-provider';

const shardEntrySchema = z.discriminatedUnion('type', [
  z.object({ id: z.string().min(1), type: z.literal('local'), path: z.string().min(1), enabled: z.boolean().default(true) }),
  z.object({ id: z.string().min(1), type: z.literal('http'), url: z.string().url(), enabled: z.boolean().default(true) }),
]);

export const shardManifestSchema = z.object({
  shards: z.array(shardEntrySchema),
});

export function loadShards(manifestPath: string, embedder: Embedder): ShardSearcher[] {
  const manifest = shardManifestSchema.parse(JSON.parse(fs.readFileSync(manifestPath, 'utf8')));
  const baseDir = path.dirname(manifestPath);

  const shards = manifest.shards
    .filter((entry) => entry.enabled)
    .map((entry): ShardSearcher =>
      entry.type === 'local'
        ? LocalVectorShard.fromFile(entry.id, path.resolve(baseDir, entry.path), embedder)
        : new HttpShard(entry.id, entry.url),
    );

  const ids = new Set(shards.map((s) => s.id));
  if (ids.size !== shards.length) {
    throw new Error(`Duplicate shard ids in ${manifestPath}`);
  }
  logger.info('retrieval:shards_loaded', { count: shards.length, ids: Array.from(ids) });
  return shards;
}

import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { tokenize } from '@/services/providers/retrieval-vector-utils';

/** FNV-1a, 32 bit. */
function hashToken(token: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/**
 * Deterministic hashing-trick embedder: no model, no network. Texts sharing
 * words land close together, which is enough for local shards and tests.
 */
export class SimpleEmbedder implements Embedder {
  constructor(readonly dimensions: number = 64) {}

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vec = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vec[hashToken(token) % this.dimensions] += 1;
    }
    const norm = Math.sqrt(vec.reduce((s, v) => s + v * v, 0));
    return norm === 0 ? vec : vec.map((v) => v / norm);
  }
}

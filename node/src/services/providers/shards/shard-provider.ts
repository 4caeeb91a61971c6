// Contract every shard implements, local or remote
import type { FilterConstraint } from '@/types/core';

export interface ShardSearchRequest {
  semanticText: string;
  filters: Record<string, FilterConstraint>;
  topN: number;
}

export interface ShardHit {
  itemId: string;
  similarityScore: number;
  metadata: Record<string, unknown>;
}

export interface ShardSearcher {
  readonly id: string;
  /** Hits ordered by similarity, highest first. Must stop work when `signal` aborts. */
  search(request: ShardSearchRequest, signal: AbortSignal): Promise<ShardHit[]>;
}

function readField(metadata: Record<string, unknown>, key: string): unknown {
  return metadata[key];
}

/** True when the item satisfies every hard filter. Items missing a filtered field are excluded. */
export function matchesFilters(metadata: Record<string, unknown>, filters: Record<string, FilterConstraint>): boolean {
  return Object.entries(filters).every(([key, constraint]) => {
    const value = readField(metadata, key);
    switch (constraint.op) {
      case 'eq':
        return typeof value === 'string' && typeof constraint.value === 'string'
          ? value.toLowerCase() === constraint.value.toLowerCase()
          : value === constraint.value;
      case 'range':
        return (
          typeof value === 'number' &&
          (constraint.min === undefined || value >= constraint.min) &&
          (constraint.max === undefined || value <= constraint.max)
        );
      case 'in':
        return typeof value === 'string' && constraint.values.includes(value.toLowerCase());
    }
  });
}

// src/services/providers/catalog/catalog-provider.ts
// Item metadata keyed by item id. Static for the life of the process.
import fs from 'fs';
import { z } from 'zod';
import type { CandidateItem, ItemMetadata } from '@/types/core';

const lowerList = z.array(z.string()).transform((xs) => xs.map((x) => x.trim().toLowerCase()));

/** Lenient: unknown fields are ignored and bad fields are dropped, never fatal. */
const metadataSchema = z.object({
  name: z.string().optional().catch(undefined),
  restaurant: z.string().optional().catch(undefined),
  price: z.coerce.number().finite().nonnegative().optional().catch(undefined),
  dietary: z.string().toLowerCase().optional().catch(undefined),
  cuisines: lowerList.optional().catch(undefined),
  labels: lowerList.optional().catch(undefined),
  rating: z.coerce.number().min(0).max(5).optional().catch(undefined),
  location: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
});

type PartialMetadata = z.infer<typeof metadataSchema>;

export interface CatalogProvider {
  /** Shard metadata overlaid by the catalog entry when one exists. */
  describe(candidate: CandidateItem): ItemMetadata;
}

function parsePartial(raw: unknown): PartialMetadata {
  const parsed = metadataSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

function overlay(base: PartialMetadata, top: PartialMetadata): PartialMetadata {
  return {
    name: top.name ?? base.name,
    restaurant: top.restaurant ?? base.restaurant,
    price: top.price ?? base.price,
    dietary: top.dietary ?? base.dietary,
    cuisines: top.cuisines ?? base.cuisines,
    labels: top.labels ?? base.labels,
    rating: top.rating ?? base.rating,
    location: top.location ?? base.location,
    description: top.description ?? base.description,
  };
}

function complete(itemId: string, m: PartialMetadata): ItemMetadata {
  return {
    ...m,
    name: m.name ?? itemId,
    cuisines: m.cuisines ?? [],
    labels: m.labels ?? [],
  };
}

export class JsonCatalogProvider implements CatalogProvider {
  private readonly items: Map<string, PartialMetadata>;

  constructor(entries: Record<string, unknown>) {
    this.items = new Map(Object.entries(entries).map(([id, raw]): [string, PartialMetadata] => [id, parsePartial(raw)]));
  }

  static fromFile(filePath: string): JsonCatalogProvider {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return new JsonCatalogProvider(z.record(z.unknown()).parse(raw));
  }

  describe(candidate: CandidateItem): ItemMetadata {
    const fromShard = parsePartial(candidate.rawMetadata);
    const fromCatalog = this.items.get(candidate.itemId);
    return complete(candidate.itemId, fromCatalog ? overlay(fromShard, fromCatalog) : fromShard);
  }
}

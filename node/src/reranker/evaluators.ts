// src/reranker/evaluators.ts: the closed set of scoring rules; every score is in [0,1]
import type { CandidateItem, EvaluatorKind, EvaluatorSpec, ItemMetadata, SlotSet } from '@/types/core';
import { BUDGET_TIERS } from '@/slots/slotSchema';

export interface EvaluationContext {
  slots: SlotSet;
  recentCuisines: ReadonlySet<string>;
  recentItemIds: ReadonlySet<string>;
}

export interface ScoredCandidate {
  candidate: CandidateItem;
  metadata: ItemMetadata;
}

const NEUTRAL = 0.5;
const clamp01 = (n: number) => (Number.isFinite(n) ? Math.max(0, Math.min(1, n)) : 0);

function budgetBounds(slots: SlotSet): { min?: number; max?: number } | null {
  if (slots.priceMax !== undefined || slots.priceMin !== undefined) {
    return { min: slots.priceMin, max: slots.priceMax };
  }
  if (slots.budgetTier) return BUDGET_TIERS[slots.budgetTier];
  return null;
}

function priceFit(metadata: ItemMetadata, slots: SlotSet): number {
  const bounds = budgetBounds(slots);
  if (!bounds) return 1;
  if (metadata.price === undefined) return NEUTRAL;
  const { price } = metadata;
  if (bounds.max !== undefined && price > bounds.max) return clamp01(1 - (price - bounds.max) / bounds.max);
  if (bounds.min !== undefined && price < bounds.min && bounds.min > 0) return clamp01(price / bounds.min);
  return 1;
}

function dietaryMatch(metadata: ItemMetadata, slots: SlotSet): number {
  if (!slots.dietary) return 1;
  const item = metadata.dietary;
  if (item === undefined) return NEUTRAL;
  if (item === slots.dietary) return 1;
  // vegan dishes suit vegetarians; veg dishes suit anyone without restrictions
  if (slots.dietary === 'veg' && item === 'vegan') return 1;
  if (slots.dietary === 'nonveg') return NEUTRAL;
  return 0;
}

function itemText(metadata: ItemMetadata): string {
  return [metadata.name, metadata.description ?? '', ...metadata.labels, ...metadata.cuisines].join(' ').toLowerCase();
}

function fractionPresent(needles: readonly string[], haystack: (needle: string) => boolean): number {
  if (needles.length === 0) return 0;
  return needles.filter((n) => haystack(n.toLowerCase())).length / needles.length;
}

/** Rating ÷ max(price/100, 1), scaled into [0,1] by the 5-star ceiling. */
export function valueForMoney(metadata: ItemMetadata): number {
  const rating = metadata.rating ?? 2.5;
  const divisor = Math.max((metadata.price ?? 100) / 100, 1);
  return clamp01(rating / divisor / 5);
}

export function evaluate(spec: EvaluatorSpec, item: ScoredCandidate, ctx: EvaluationContext): number {
  const { metadata, candidate } = item;
  switch (spec.kind) {
    case 'similarity':
      return clamp01(candidate.similarityScore);
    case 'price_fit':
      return priceFit(metadata, ctx.slots);
    case 'dietary_match':
      return dietaryMatch(metadata, ctx.slots);
    case 'rating':
      return metadata.rating === undefined ? NEUTRAL : clamp01(metadata.rating / 5);
    case 'value_for_money':
      return valueForMoney(metadata);
    case 'cuisine_diversity':
      return metadata.cuisines.some((c) => ctx.recentCuisines.has(c)) ? 0 : 1;
    case 'repeat_penalty':
      return ctx.recentItemIds.has(candidate.itemId) ? 0 : 1;
    case 'keyword_match': {
      const text = itemText(metadata);
      return fractionPresent(spec.terms, (t) => text.includes(t));
    }
    case 'label_match': {
      const labels = new Set(metadata.labels);
      return fractionPresent(spec.labels, (l) => labels.has(l));
    }
  }
}

export const EVALUATOR_GUIDE: Record<EvaluatorKind, string> = {
  similarity: 'similarity: closeness of the dish to the request text',
  price_fit: "price_fit: 1 inside the user's budget, falling off above it",
  dietary_match: "dietary_match: agreement with the user's dietary preference",
  rating: 'rating: customer rating out of 5',
  value_for_money: 'value_for_money: rating relative to price',
  cuisine_diversity: 'cuisine_diversity: 1 when the dish avoids cuisines shown in recent recommendations',
  repeat_penalty: 'repeat_penalty: 1 when the dish was not recommended recently',
  keyword_match: 'keyword_match {"terms": string[]}: share of the terms found in name, description, labels or cuisines',
  label_match: 'label_match {"labels": string[]}: share of the labels carried by the dish',
};

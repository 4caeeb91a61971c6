// src/refinement/buildQuery.ts
import type { FilterConstraint, Query, SlotSet } from '@/types/core';
import { BUDGET_TIERS } from '@/slots/slotSchema';

const SPICE_WORDS = { mild: 'mild', medium: 'medium spicy', high: 'spicy' } as const;
const DEFAULT_SEMANTIC_TEXT = 'popular food';

/**
 * Slots → semantic text + hard filters. Pure: the same SlotSet always yields
 * the same Query, and a filter only appears when a slot maps to it.
 */
export function buildQuery(slots: SlotSet): Query {
  const tokens: string[] = [];
  if (slots.spice) tokens.push(SPICE_WORDS[slots.spice]);
  if (slots.labels) tokens.push(...[...slots.labels].sort());
  if (slots.dish) tokens.push(slots.dish);
  if (slots.cuisine) tokens.push(...[...slots.cuisine].sort());
  if (slots.mealType) tokens.push(slots.mealType);

  const seen = new Set<string>();
  const semanticText =
    tokens
      .map((t) => t.trim().toLowerCase())
      .filter((t) => t.length > 0 && !seen.has(t) && seen.add(t))
      .join(' ') || DEFAULT_SEMANTIC_TEXT;

  const filters: Record<string, FilterConstraint> = {};

  if (slots.dietary) {
    filters.dietary = { op: 'eq', value: slots.dietary };
  }

  const price = priceRange(slots);
  if (price) filters.price = price;

  if (slots.location) {
    filters.location = { op: 'eq', value: slots.location };
  }

  return { semanticText, filters };
}

function priceRange(slots: SlotSet): FilterConstraint | null {
  if (slots.noPriceLimit) return null;

  if (slots.priceMax !== undefined || slots.priceMin !== undefined) {
    return {
      op: 'range',
      ...(slots.priceMin !== undefined && { min: slots.priceMin }),
      ...(slots.priceMax !== undefined && { max: slots.priceMax }),
    };
  }

  if (slots.budgetTier) {
    const tier = BUDGET_TIERS[slots.budgetTier];
    return { op: 'range', min: tier.min, max: tier.max };
  }
  return null;
}

// src/reranker/conditions.ts: working set of ranking conditions for one recommendation cycle
import { z } from 'zod';
import type { EvaluatorSpec, RankingCondition, SlotSet } from '@/types/core';
import type { PersonaProfile, RecommenderConfig } from '@/config/recommender.config';
import { isWeightedKind, type WeightedKind } from '@/config/recommender.config';
import { logger } from '@/services/logger';

const term = z.string().trim().toLowerCase().pipe(z.string().min(1).max(40));

const evaluatorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('similarity') }),
  z.object({ kind: z.literal('price_fit') }),
  z.object({ kind: z.literal('dietary_match') }),
  z.object({ kind: z.literal('rating') }),
  z.object({ kind: z.literal('value_for_money') }),
  z.object({ kind: z.literal('cuisine_diversity') }),
  z.object({ kind: z.literal('repeat_penalty') }),
  z.object({ kind: z.literal('keyword_match'), terms: z.array(term).min(1).max(10) }),
  z.object({ kind: z.literal('label_match'), labels: z.array(term).min(1).max(10) }),
]);

export const conditionSchema = z.object({
  name: z.string().trim().min(1).max(40),
  weight: z.number().gt(0).max(1),
  description: z.string().trim().min(1).max(160),
  evaluator: evaluatorSchema,
});

const DESCRIPTIONS: Record<WeightedKind, string> = {
  similarity: 'closeness to what you asked for',
  price_fit: 'fit with your budget',
  dietary_match: 'match with your dietary preference',
  rating: 'strong customer ratings',
  value_for_money: 'good rating for the price',
  cuisine_diversity: 'variety beyond cuisines shown recently',
  repeat_penalty: 'something you have not been shown recently',
  keyword_match: 'the flavours and labels you mentioned',
};

export interface ConditionContext {
  slots: SlotSet;
  hasHistory: boolean;
  persona: PersonaProfile | undefined;
}

function simpleSpec(kind: Exclude<WeightedKind, 'keyword_match'>): EvaluatorSpec {
  return { kind };
}

function weighted(
  kind: WeightedKind,
  weight: number,
  source: RankingCondition['source'],
  terms: string[],
): RankingCondition {
  return {
    name: kind,
    weight,
    description: DESCRIPTIONS[kind],
    evaluator: kind === 'keyword_match' ? { kind, terms } : simpleSpec(kind),
    source,
  };
}

/** Words from the slots that a matching dish should mention. */
export function keywordTerms(slots: SlotSet): string[] {
  const terms = new Set<string>();
  if (slots.spice === 'high') terms.add('spicy');
  if (slots.spice === 'mild') terms.add('mild');
  for (const label of slots.labels ?? []) terms.add(label);
  if (slots.dish) terms.add(slots.dish);
  return Array.from(terms).sort();
}

/**
 * Deterministic part of the working set: baseline, then contextual rules
 * from the journey, then persona weighting.
 */
export function baseConditions(config: RecommenderConfig, ctx: ConditionContext): RankingCondition[] {
  const terms = keywordTerms(ctx.slots);
  const conditions: RankingCondition[] = [
    weighted('similarity', config.baselineWeights.similarity, 'baseline', terms),
    weighted('price_fit', config.baselineWeights.price_fit, 'baseline', terms),
    weighted('dietary_match', config.baselineWeights.dietary_match, 'baseline', terms),
  ];

  if (terms.length > 0) {
    conditions.push(weighted('keyword_match', config.contextualWeights.keyword_match, 'contextual', terms));
  }
  if (ctx.hasHistory) {
    conditions.push(weighted('cuisine_diversity', config.contextualWeights.cuisine_diversity, 'contextual', terms));
    conditions.push(weighted('repeat_penalty', config.contextualWeights.repeat_penalty, 'contextual', terms));
  }

  const persona = ctx.persona;
  if (!persona) return conditions;

  const scaled = conditions.map((c) => {
    const factor = isWeightedKind(c.evaluator.kind) ? persona.scale[c.evaluator.kind] : undefined;
    return factor === undefined ? c : { ...c, weight: c.weight * factor };
  });

  for (const [kind, weight] of Object.entries(persona.add)) {
    if (!isWeightedKind(kind) || weight === undefined) continue;
    if (kind === 'keyword_match' && terms.length === 0) continue;
    if (scaled.some((c) => c.evaluator.kind === kind)) continue;
    scaled.push(weighted(kind, weight, 'persona', terms));
  }
  return scaled;
}

/**
 * Adds model-proposed conditions that pass the schema. Invalid entries and
 * names already taken are dropped; the existing set is never reduced.
 */
export function mergeGenerated(existing: RankingCondition[], proposed: unknown[], limit: number): RankingCondition[] {
  const names = new Set(existing.map((c) => c.name));
  const merged = [...existing];
  let added = 0;

  for (const raw of proposed) {
    if (added >= limit) break;
    const parsed = conditionSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('rerank:condition_rejected', { error: parsed.error.errors[0]?.message ?? 'invalid', raw });
      continue;
    }
    if (names.has(parsed.data.name)) {
      logger.warn('rerank:condition_duplicate', { name: parsed.data.name });
      continue;
    }
    names.add(parsed.data.name);
    merged.push({ ...parsed.data, source: 'generated' });
    added++;
  }
  return merged;
}

/** Weights rescaled to sum to 1, sorted by name so aggregation order is fixed. */
export function normalizeConditions(conditions: RankingCondition[]): RankingCondition[] {
  const total = conditions.reduce((s, c) => s + c.weight, 0);
  const sorted = [...conditions].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  if (total <= 0) return sorted.map((c) => ({ ...c, weight: 1 / sorted.length }));
  return sorted.map((c) => ({ ...c, weight: c.weight / total }));
}

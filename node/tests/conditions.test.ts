import type { RankingCondition } from '@/types/core';
import { baseConditions, keywordTerms, mergeGenerated, normalizeConditions } from '@/reranker/conditions';
import { evaluate, valueForMoney, type EvaluationContext } from '@/reranker/evaluators';
import { testConfig } from './helpers/fakes';

const config = testConfig();

describe('baseConditions', () => {
  it('starts from the three baseline conditions', () => {
    const conditions = baseConditions(config, { slots: {}, hasHistory: false, persona: config.personas['default'] });
    expect(conditions.map((c) => [c.name, c.weight, c.source])).toEqual([
      ['similarity', 0.4, 'baseline'],
      ['price_fit', 0.2, 'baseline'],
      ['dietary_match', 0.2, 'baseline'],
    ]);
  });

  it('adds keyword and history conditions from the journey', () => {
    const slots = { spice: 'high' as const, dish: 'biryani', labels: ['bestseller'] };
    const conditions = baseConditions(config, { slots, hasHistory: true, persona: undefined });

    expect(conditions.map((c) => c.name)).toEqual([
      'similarity',
      'price_fit',
      'dietary_match',
      'keyword_match',
      'cuisine_diversity',
      'repeat_penalty',
    ]);
    expect(conditions[3]?.evaluator).toEqual({ kind: 'keyword_match', terms: ['bestseller', 'biryani', 'spicy'] });
  });

  it('applies the persona weighting', () => {
    const conditions = baseConditions(config, {
      slots: {},
      hasHistory: false,
      persona: config.personas['value_seeker'],
    });
    const byName = new Map(conditions.map((c) => [c.name, c]));

    expect(byName.get('price_fit')?.weight).toBeCloseTo(0.3, 10);
    expect(byName.get('value_for_money')).toMatchObject({ weight: 0.1, source: 'persona' });
  });

  it('scales history conditions for explorers', () => {
    const conditions = baseConditions(config, { slots: {}, hasHistory: true, persona: config.personas['explorer'] });
    expect(conditions.find((c) => c.name === 'cuisine_diversity')?.weight).toBeCloseTo(0.1, 10);
  });
});

describe('keywordTerms', () => {
  it('maps mild spice and ignores medium', () => {
    expect(keywordTerms({ spice: 'mild' })).toEqual(['mild']);
    expect(keywordTerms({ spice: 'medium' })).toEqual([]);
  });
});

describe('mergeGenerated', () => {
  const existing: RankingCondition[] = [
    { name: 'similarity', weight: 0.4, description: 'x', evaluator: { kind: 'similarity' }, source: 'baseline' },
  ];
  const proposal = (name: string) => ({ name, weight: 0.1, description: 'extra', evaluator: { kind: 'rating' } });

  it('stops at the limit', () => {
    const merged = mergeGenerated(existing, [proposal('one'), proposal('two'), proposal('three')], 2);
    expect(merged.map((c) => c.name)).toEqual(['similarity', 'one', 'two']);
  });

  it('never lets a proposal replace an existing condition', () => {
    const merged = mergeGenerated(existing, [proposal('similarity')], 3);
    expect(merged).toEqual(existing);
  });

  it('drops proposals that do not match the schema', () => {
    const merged = mergeGenerated(existing, [{ name: 'bad' }, 'text', { ...proposal('empty_terms'), evaluator: { kind: 'keyword_match', terms: [] } }], 3);
    expect(merged).toEqual(existing);
  });
});

describe('normalizeConditions', () => {
  it('rescales weights to one and orders by name', () => {
    const normalized = normalizeConditions([
      { name: 'b', weight: 3, description: 'b', evaluator: { kind: 'rating' }, source: 'baseline' },
      { name: 'a', weight: 1, description: 'a', evaluator: { kind: 'similarity' }, source: 'baseline' },
    ]);
    expect(normalized.map((c) => [c.name, c.weight])).toEqual([
      ['a', 0.25],
      ['b', 0.75],
    ]);
  });
});

describe('evaluate', () => {
  const ctx = (overrides: Partial<EvaluationContext> = {}): EvaluationContext => ({
    slots: {},
    recentCuisines: new Set(),
    recentItemIds: new Set(),
    ...overrides,
  });
  const item = (metadata: Partial<{ price: number; dietary: string; rating: number; cuisines: string[] }> = {}) => ({
    candidate: { itemId: 'i1', similarityScore: 0.6, shardId: 's', rawMetadata: {} },
    metadata: { name: 'Item', cuisines: [], labels: [], ...metadata },
  });

  it('scores price fit against the ceiling', () => {
    const slots = { priceMax: 200 };
    expect(evaluate({ kind: 'price_fit' }, item({ price: 150 }), ctx({ slots }))).toBe(1);
    expect(evaluate({ kind: 'price_fit' }, item({ price: 300 }), ctx({ slots }))).toBe(0.5);
    expect(evaluate({ kind: 'price_fit' }, item({ price: 500 }), ctx({ slots }))).toBe(0);
    expect(evaluate({ kind: 'price_fit' }, item(), ctx({ slots }))).toBe(0.5);
  });

  it('uses the budget tier when no number was given', () => {
    const slots = { budgetTier: 'premium' as const };
    expect(evaluate({ kind: 'price_fit' }, item({ price: 250 }), ctx({ slots }))).toBe(0.5);
  });

  it('lets vegan dishes satisfy vegetarians', () => {
    expect(evaluate({ kind: 'dietary_match' }, item({ dietary: 'vegan' }), ctx({ slots: { dietary: 'veg' } }))).toBe(1);
    expect(evaluate({ kind: 'dietary_match' }, item({ dietary: 'nonveg' }), ctx({ slots: { dietary: 'veg' } }))).toBe(0);
    expect(evaluate({ kind: 'dietary_match' }, item({ dietary: 'veg' }), ctx({ slots: { dietary: 'nonveg' } }))).toBe(0.5);
  });

  it('penalizes recent cuisines and repeats', () => {
    const recent = ctx({ recentCuisines: new Set(['thai']), recentItemIds: new Set(['i1']) });
    expect(evaluate({ kind: 'cuisine_diversity' }, item({ cuisines: ['thai'] }), recent)).toBe(0);
    expect(evaluate({ kind: 'cuisine_diversity' }, item({ cuisines: ['korean'] }), recent)).toBe(1);
    expect(evaluate({ kind: 'repeat_penalty' }, item(), recent)).toBe(0);
  });

  it('counts the share of keywords found', () => {
    const spec = { kind: 'keyword_match' as const, terms: ['spicy', 'biryani'] };
    expect(evaluate(spec, { ...item(), metadata: { name: 'Spicy Pulao', cuisines: [], labels: [] } }, ctx())).toBe(0.5);
  });

  it('values cheap, well-rated dishes', () => {
    expect(valueForMoney({ name: 'x', cuisines: [], labels: [], rating: 4, price: 200 })).toBe(0.4);
    expect(valueForMoney({ name: 'x', cuisines: [], labels: [], price: 50 })).toBe(0.5);
  });
});

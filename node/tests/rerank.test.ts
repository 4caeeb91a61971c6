import type { CandidateItem } from '@/types/core';
import { SessionMemory } from '@/memory/sessionMemory';
import { JsonCatalogProvider } from '@/services/providers/catalog/catalog-provider';
import { MAX_RESULTS, RerankEngine } from '@/services/rerank';
import { FakeGateway, offlineGateway, testConfig } from './helpers/fakes';

function candidate(itemId: string, similarityScore: number, rawMetadata: Record<string, unknown> = {}): CandidateItem {
  return { itemId, similarityScore, shardId: 'north', rawMetadata };
}

const catalog = new JsonCatalogProvider({
  a: { name: 'Alpha Biryani', price: 350, dietary: 'veg', cuisines: ['biryani'], labels: ['bestseller'] },
  b: { name: 'Beta Pulao', price: 250, dietary: 'veg', cuisines: ['north indian'] },
  c: { name: 'Chicken Roll', price: 200, dietary: 'nonveg', cuisines: ['street food'] },
});

const templateConfig = testConfig({ explanationMode: 'template', generativeConditions: false });

function sessionWith(personaId = 'default'): SessionMemory {
  const memory = new SessionMemory('s1', personaId);
  memory.applySlotUpdates({ priceMax: 300, dietary: 'veg' });
  return memory;
}

describe('RerankEngine', () => {
  it('scores candidates by the weighted conditions', async () => {
    const engine = new RerankEngine(offlineGateway(), catalog, templateConfig);

    const { results, conditions } = await engine.rerank(
      [candidate('c', 0.8), candidate('b', 0.7), candidate('a', 0.9)],
      sessionWith(),
    );

    expect(conditions.map((c) => c.name)).toEqual(['dietary_match', 'price_fit', 'similarity']);
    expect(conditions[0]?.weight).toBeCloseTo(0.25, 10);
    expect(conditions[1]?.weight).toBeCloseTo(0.25, 10);
    expect(conditions[2]?.weight).toBeCloseTo(0.5, 10);
    expect(results.map((r) => [r.itemId, r.rank, r.finalScore])).toEqual([
      ['a', 1, 0.9083],
      ['b', 2, 0.85],
      ['c', 3, 0.65],
    ]);
    expect(results[0]?.contributions).toEqual([
      { condition: 'dietary_match', score: 1, contribution: 0.25 },
      { condition: 'price_fit', score: 0.8333, contribution: 0.2083 },
      { condition: 'similarity', score: 0.9, contribution: 0.45 },
    ]);
  });

  it('explains each result from its strongest conditions', async () => {
    const engine = new RerankEngine(offlineGateway(), catalog, templateConfig);
    const { results } = await engine.rerank([candidate('a', 0.9)], sessionWith());

    expect(results[0]?.explanation).toBe(
      'Alpha Biryani: recommended for closeness to what you asked for and match with your dietary preference.',
    );
  });

  it('returns at most ten contiguous, non-increasing results', async () => {
    const engine = new RerankEngine(offlineGateway(), catalog, templateConfig);
    const many = Array.from({ length: 14 }, (_, i) =>
      candidate(`x${String(i).padStart(2, '0')}`, (i % 5) / 5, { price: 100 + i * 20, dietary: 'veg' }),
    );

    const { results } = await engine.rerank(many, sessionWith());

    expect(results).toHaveLength(MAX_RESULTS);
    expect(results.map((r) => r.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1]?.finalScore).toBeGreaterThanOrEqual(results[i]?.finalScore ?? Infinity);
    }
  });

  it('breaks score ties by similarity, then item id', async () => {
    const engine = new RerankEngine(offlineGateway(), new JsonCatalogProvider({}), templateConfig);
    const { results } = await engine.rerank([candidate('z', 0.5), candidate('y', 0.5)], new SessionMemory('s', 'default'));
    expect(results.map((r) => r.itemId)).toEqual(['y', 'z']);
  });

  it('records the cycle for later diversity checks', async () => {
    const engine = new RerankEngine(offlineGateway(), catalog, templateConfig);
    const memory = sessionWith();

    await engine.rerank([candidate('a', 0.9), candidate('b', 0.7)], memory, {
      query: { semanticText: 'biryani', filters: { dietary: { op: 'eq', value: 'veg' } } },
    });
    const second = await engine.rerank([candidate('a', 0.9), candidate('b', 0.7)], memory);

    expect(memory.recentRecommendations(5)[0]?.itemIds).toEqual(['a', 'b']);
    expect(memory.recentRecommendations(5)[0]?.cuisines).toEqual(['biryani', 'north indian']);
    expect(memory.recentRecommendations(5)[0]?.query?.semanticText).toBe('biryani');
    expect(memory.recentRecommendations(5)[0]?.results.map((r) => [r.rank, r.name])).toEqual([
      [1, 'Alpha Biryani'],
      [2, 'Beta Pulao'],
    ]);
    expect(memory.recentRecommendations(5)[1]?.query).toBeNull();
    expect(second.conditions.map((c) => c.name)).toEqual([
      'cuisine_diversity',
      'dietary_match',
      'price_fit',
      'repeat_penalty',
      'similarity',
    ]);
  });

  it('records nothing when there is nothing to rank', async () => {
    const engine = new RerankEngine(offlineGateway(), catalog, templateConfig);
    const memory = sessionWith();
    const { results } = await engine.rerank([], memory);
    expect(results).toEqual([]);
    expect(memory.recentRecommendations(5)).toEqual([]);
  });

  it('adds valid generated conditions and drops the rest', async () => {
    const gateway = new FakeGateway({
      conditions: () => ({
        conditions: [
          {
            name: 'bestseller_pick',
            weight: 0.3,
            description: 'popular with other diners',
            evaluator: { kind: 'label_match', labels: ['Bestseller'] },
          },
          { name: 'similarity', weight: 0.5, description: 'duplicate', evaluator: { kind: 'similarity' } },
          { name: 'too_heavy', weight: 2, description: 'out of range', evaluator: { kind: 'rating' } },
          { name: 'mystery', weight: 0.2, description: 'unknown rule', evaluator: { kind: 'horoscope' } },
        ],
      }),
    });
    const engine = new RerankEngine(gateway, catalog, testConfig({ explanationMode: 'template' }));

    const { conditions, results } = await engine.rerank([candidate('a', 0.9), candidate('b', 0.7)], sessionWith());

    expect(conditions.map((c) => [c.name, c.source])).toEqual([
      ['bestseller_pick', 'generated'],
      ['dietary_match', 'baseline'],
      ['price_fit', 'baseline'],
      ['similarity', 'baseline'],
    ]);
    expect(conditions.reduce((s, c) => s + c.weight, 0)).toBeCloseTo(1, 10);
    expect(conditions[0]?.evaluator).toEqual({ kind: 'label_match', labels: ['bestseller'] });
    expect(results[0]?.contributions.find((c) => c.condition === 'bestseller_pick')?.score).toBe(1);
  });

  it('uses generated explanations that are short enough and templates otherwise', async () => {
    const gateway = new FakeGateway({
      explain: (request) => ({
        explanations: request.items.map((item) => ({
          itemId: item.itemId,
          text: item.itemId === 'a' ? '  A fragrant veg biryani within budget.  ' : 'x'.repeat(301),
        })),
      }),
    });
    const engine = new RerankEngine(gateway, catalog, testConfig({ generativeConditions: false }));

    const { results } = await engine.rerank([candidate('a', 0.9), candidate('b', 0.7)], sessionWith());

    expect(results[0]?.explanation).toBe('A fragrant veg biryani within budget.');
    expect(results[1]?.explanation).toBe(
      'Beta Pulao: recommended for closeness to what you asked for and match with your dietary preference.',
    );
    expect(gateway.calls).toEqual(['explain']);
  });

  it('keeps the deterministic set when condition generation fails', async () => {
    const gateway = new FakeGateway({});
    const engine = new RerankEngine(gateway, catalog, testConfig());

    const { conditions, results } = await engine.rerank([candidate('a', 0.9)], sessionWith());

    expect(conditions.map((c) => c.name)).toEqual(['dietary_match', 'price_fit', 'similarity']);
    expect(results).toHaveLength(1);
    expect(gateway.calls).toEqual(['conditions', 'explain']);
  });
});

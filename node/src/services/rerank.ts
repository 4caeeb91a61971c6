// node/src/services/rerank.ts: conditions → weighted scores → top results with explanations
import type {
  CandidateItem,
  ConditionContribution,
  Query,
  RankedResult,
  RankingCondition,
} from '@/types/core';
import type { RecommenderConfig } from '@/config/recommender.config';
import { errorMessage } from '@/errors/pipelineErrors';
import type { SessionMemory } from '@/memory/sessionMemory';
import { baseConditions, mergeGenerated, normalizeConditions } from '@/reranker/conditions';
import { EVALUATOR_GUIDE, evaluate, type EvaluationContext, type ScoredCandidate } from '@/reranker/evaluators';
import type { LanguageModelGateway } from './llm-gateway';
import type { CatalogProvider } from './providers/catalog/catalog-provider';
import { compareIds } from './shard-retrieval';
import { logger } from './logger';

export const MAX_RESULTS = 10;
const MAX_EXPLANATION_LENGTH = 300;

export interface RerankOutcome {
  results: RankedResult[];
  conditions: RankingCondition[];
}

export interface RerankOptions {
  /** Recorded with the cycle so the search can be listed later. */
  query?: Query;
  signal?: AbortSignal;
}

interface Scored extends ScoredCandidate {
  finalScore: number;
  contributions: ConditionContribution[];
}

const round = (n: number) => Math.round(n * 10000) / 10000;

function topContributions(contributions: ConditionContribution[], n: number): ConditionContribution[] {
  return [...contributions]
    .sort((a, b) => b.contribution - a.contribution || compareIds(a.condition, b.condition))
    .slice(0, n);
}

export function templateExplanation(item: Scored, conditions: readonly RankingCondition[]): string {
  const byName = new Map(conditions.map((c) => [c.name, c.description]));
  const reasons = topContributions(item.contributions, 2).map((c) => byName.get(c.condition) ?? c.condition);
  if (reasons.length === 0) return `${item.metadata.name} is a close match for your request.`;
  return `${item.metadata.name}: recommended for ${reasons.join(' and ')}.`;
}

export class RerankEngine {
  constructor(
    private readonly gateway: LanguageModelGateway,
    private readonly catalog: CatalogProvider,
    private readonly config: RecommenderConfig,
  ) {}

  async rerank(
    candidates: readonly CandidateItem[],
    memory: SessionMemory,
    { query, signal }: RerankOptions = {},
  ): Promise<RerankOutcome> {
    const slots = memory.getSlots();
    const recent = memory.recentRecommendations(this.config.diversityWindow);
    const ctx: EvaluationContext = {
      slots,
      recentCuisines: new Set(recent.flatMap((c) => c.cuisines)),
      recentItemIds: new Set(recent.flatMap((c) => c.itemIds)),
    };
    const items: ScoredCandidate[] = candidates.map((candidate) => ({
      candidate,
      metadata: this.catalog.describe(candidate),
    }));

    const conditions = normalizeConditions(await this.buildConditions(items, memory, recent.length > 0, signal));

    const limit = Math.min(MAX_RESULTS, this.config.resultSize);
    const selected = items
      .map((item) => this.score(item, conditions, ctx))
      .sort(
        (a, b) =>
          b.finalScore - a.finalScore ||
          b.candidate.similarityScore - a.candidate.similarityScore ||
          compareIds(a.candidate.itemId, b.candidate.itemId),
      )
      .slice(0, limit);

    const explanations = await this.explain(selected, conditions, memory, signal);

    const results: RankedResult[] = selected.map((item, i) => ({
      itemId: item.candidate.itemId,
      rank: i + 1,
      finalScore: round(item.finalScore),
      similarityScore: round(item.candidate.similarityScore),
      explanation: explanations.get(item.candidate.itemId) ?? templateExplanation(item, conditions),
      metadata: item.metadata,
      contributions: item.contributions.map((c) => ({ ...c, score: round(c.score), contribution: round(c.contribution) })),
    }));

    if (results.length > 0) {
      memory.recordRecommendation({ query: query ?? null, conditions, results });
    }

    logger.info('rerank:done', {
      sessionId: memory.sessionId,
      candidates: candidates.length,
      results: results.length,
      conditions: conditions.map((c) => `${c.name}:${c.weight.toFixed(3)}`),
    });
    return { results, conditions };
  }

  private score(item: ScoredCandidate, conditions: readonly RankingCondition[], ctx: EvaluationContext): Scored {
    const contributions = conditions.map((condition) => {
      const score = evaluate(condition.evaluator, item, ctx);
      return { condition: condition.name, score, contribution: score * condition.weight };
    });
    return {
      ...item,
      contributions,
      finalScore: contributions.reduce((s, c) => s + c.contribution, 0),
    };
  }

  private async buildConditions(
    items: ScoredCandidate[],
    memory: SessionMemory,
    hasHistory: boolean,
    signal?: AbortSignal,
  ): Promise<RankingCondition[]> {
    const slots = memory.getSlots();
    const persona = this.config.personas[memory.personaId] ?? this.config.personas['default'];
    const base = baseConditions(this.config, { slots, hasHistory, persona });

    if (!this.config.generativeConditions || !this.gateway.isAvailable() || items.length === 0) {
      return base;
    }

    try {
      const payload = await this.gateway.call(
        'conditions',
        {
          slots,
          history: memory.recentTurns(this.config.historyWindow).map((t) => ({ speaker: t.speaker, text: t.text })),
          persona: persona ? `${memory.personaId}: ${persona.description}` : null,
          recentCuisines: Array.from(
            new Set(memory.recentRecommendations(this.config.diversityWindow).flatMap((c) => c.cuisines)),
          ),
          evaluatorGuide: Object.values(EVALUATOR_GUIDE),
          candidateSample: items.slice(0, 8).map(({ candidate, metadata }) => ({
            itemId: candidate.itemId,
            name: metadata.name,
            cuisines: metadata.cuisines,
            price: metadata.price,
          })),
        },
        signal,
      );
      return mergeGenerated(base, payload.conditions, this.config.maxGeneratedConditions);
    } catch (err) {
      logger.warn('rerank:conditions_fallback', { error: errorMessage(err) });
      return base;
    }
  }

  /** Generated text per item id; anything missing falls back to the template. */
  private async explain(
    selected: Scored[],
    conditions: readonly RankingCondition[],
    memory: SessionMemory,
    signal?: AbortSignal,
  ): Promise<Map<string, string>> {
    const out = new Map<string, string>();
    if (this.config.explanationMode !== 'generative' || !this.gateway.isAvailable() || selected.length === 0) {
      return out;
    }

    const byName = new Map(conditions.map((c) => [c.name, c.description]));
    try {
      const payload = await this.gateway.call(
        'explain',
        {
          slots: memory.getSlots(),
          items: selected.map((item) => ({
            itemId: item.candidate.itemId,
            name: item.metadata.name,
            topConditions: topContributions(item.contributions, 2).map((c) => byName.get(c.condition) ?? c.condition),
          })),
        },
        signal,
      );
      const wanted = new Set(selected.map((s) => s.candidate.itemId));
      for (const { itemId, text } of payload.explanations) {
        const trimmed = text.trim();
        if (wanted.has(itemId) && trimmed.length > 0 && trimmed.length <= MAX_EXPLANATION_LENGTH) {
          out.set(itemId, trimmed);
        }
      }
    } catch (err) {
      logger.warn('rerank:explain_fallback', { error: errorMessage(err) });
    }
    return out;
  }
}

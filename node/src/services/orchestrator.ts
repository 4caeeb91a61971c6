// src/services/orchestrator.ts: one conversational turn, end to end
import {
  SLOT_BEARING_INTENTS,
  type Intent,
  type RecommendationCycle,
  type SearchHistoryEntry,
  type TurnResponse,
} from '@/types/core';
import type { RecommenderConfig } from '@/config/recommender.config';
import { TotalRetrievalFailure, TurnTimeoutError, errorMessage } from '@/errors/pipelineErrors';
import type { DialogueManager, DialogueOutcome } from '@/agent/dialogueManager';
import { SessionMemory, type SessionSnapshot } from '@/memory/sessionMemory';
import type { SessionStore } from '@/memory/SessionStore';
import { formatSearchHistory } from '@/memory/searchHistory';
import { buildQuery } from '@/refinement/buildQuery';
import type { PersonaProvider } from './providers/personas/persona-provider';
import type { RerankEngine } from './rerank';
import type { ShardRetrievalCoordinator } from './shard-retrieval';
import { logger } from './logger';

export interface OrchestratorDeps {
  sessions: SessionStore;
  personas: PersonaProvider;
  dialogue: DialogueManager;
  retrieval: ShardRetrievalCoordinator;
  reranker: RerankEngine;
  config: RecommenderConfig;
  turnTimeoutMs: number;
}

export interface TurnOptions {
  userId?: string;
}

export const MESSAGES = {
  greeting: "Hi! Tell me what you're craving, a dish or a cuisine, and your budget, and I'll find something for you.",
  goodbye: 'Thanks for chatting. Enjoy your meal!',
  unknown: "Sorry, I didn't catch that. Tell me a dish, a cuisine, or a budget to get started.",
  retry: "I couldn't reach the menu right now. Please try again in a moment.",
  noMatches: 'Nothing matched all of your preferences. Try a higher budget or a different dish.',
} as const;

function checkAborted(signal: AbortSignal, timeoutMs: number): void {
  if (signal.aborted) throw new TurnTimeoutError(timeoutMs);
}

/**
 * Entry point for the front end. Turns of one session run strictly in arrival
 * order; different sessions proceed independently.
 */
export class Orchestrator {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly deps: OrchestratorDeps) {}

  handleTurn(sessionId: string, rawText: string, options: TurnOptions = {}): Promise<TurnResponse> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => this.runTurn(sessionId, rawText, options));

    const release = () => {
      if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
    };
    const tail: Promise<void> = run.then(release, release);
    this.queues.set(sessionId, tail);

    return run;
  }

  async endSession(sessionId: string): Promise<boolean> {
    const existing = await this.deps.sessions.get(sessionId);
    await this.deps.sessions.delete(sessionId);
    return existing !== null;
  }

  /** Past recommendation cycles of a session, or null when the session is unknown. */
  async searchHistory(sessionId: string): Promise<SearchHistoryEntry[] | null> {
    const memory = await this.deps.sessions.get(sessionId);
    return memory ? formatSearchHistory(memory.recommendationHistory()) : null;
  }

  /** One cycle by its history index; null when the session or the index does not exist. */
  async searchAt(sessionId: string, index: number): Promise<RecommendationCycle | null> {
    const memory = await this.deps.sessions.get(sessionId);
    return memory?.recommendationAt(index) ?? null;
  }

  activeSessions(): number {
    return this.deps.sessions.size();
  }

  private async getOrCreate(sessionId: string, userId?: string): Promise<SessionMemory> {
    const existing = await this.deps.sessions.get(sessionId);
    if (existing) return existing;

    const memory = new SessionMemory(sessionId, this.deps.personas.personaFor(userId));
    await this.deps.sessions.set(sessionId, memory);
    logger.info('session:created', { sessionId, personaId: memory.personaId });
    return memory;
  }

  private async runTurn(sessionId: string, rawText: string, options: TurnOptions): Promise<TurnResponse> {
    const memory = await this.getOrCreate(sessionId, options.userId);
    const snapshot = memory.snapshot();
    const startedAt = Date.now();
    const timeoutMs = this.deps.turnTimeoutMs;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    let intent: Intent = 'unknown';

    try {
      const outcome = await this.deps.dialogue.processTurn(rawText, memory, controller.signal);
      intent = outcome.intent;
      checkAborted(controller.signal, timeoutMs);

      const response = await this.respond(memory, outcome, controller.signal);
      checkAborted(controller.signal, timeoutMs);

      memory.recordTurn('system', response.message, null);
      logger.info('turn:done', { sessionId, intent, kind: response.kind, ms: Date.now() - startedAt });

      if (intent === 'goodbye') await this.deps.sessions.delete(sessionId);
      return response;
    } catch (err) {
      if (err instanceof TotalRetrievalFailure || err instanceof TurnTimeoutError || controller.signal.aborted) {
        return this.retry(memory, snapshot, intent, err);
      }
      memory.restore(snapshot);
      logger.error('turn:failed', { sessionId, error: errorMessage(err) });
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Slots and pending state go back to where the turn started; the turn stays in history. */
  private retry(memory: SessionMemory, snapshot: SessionSnapshot, intent: Intent, err: unknown): TurnResponse {
    memory.restore(snapshot);
    memory.recordTurn('system', MESSAGES.retry, null);
    logger.warn('turn:retry', { sessionId: memory.sessionId, reason: errorMessage(err) });
    return { kind: 'retry', sessionId: memory.sessionId, intent, message: MESSAGES.retry };
  }

  private async respond(memory: SessionMemory, outcome: DialogueOutcome, signal: AbortSignal): Promise<TurnResponse> {
    const { intent } = outcome;
    const base = { sessionId: memory.sessionId, intent };

    if (!SLOT_BEARING_INTENTS.has(intent)) {
      const message = intent === 'greeting' ? MESSAGES.greeting : intent === 'goodbye' ? MESSAGES.goodbye : MESSAGES.unknown;
      return { ...base, kind: 'message', message };
    }

    if (!outcome.sufficiency) {
      memory.setPending(outcome.missingSlots);
      return {
        ...base,
        kind: 'clarification',
        message: outcome.unmet?.question ?? MESSAGES.unknown,
        missingSlots: outcome.missingSlots,
      };
    }

    memory.clearPending();
    const query = buildQuery(outcome.updatedSlots);
    const retrieval = await this.deps.retrieval.retrieve(query, {
      topNPerShard: this.deps.config.retrieval.topNPerShard,
      cap: this.deps.config.retrieval.candidateCap,
      signal,
    });
    checkAborted(signal, this.deps.turnTimeoutMs);

    if (retrieval.candidates.length === 0) {
      return { ...base, kind: 'message', message: MESSAGES.noMatches };
    }

    const { results, conditions } = await this.deps.reranker.rerank(retrieval.candidates, memory, { query, signal });
    return {
      ...base,
      kind: 'recommendations',
      message: `Here are ${results.length} dish${results.length === 1 ? '' : 'es'} you might like.`,
      results,
      conditions: conditions.map(({ name, weight, description, source }) => ({
        name,
        weight: Math.round(weight * 10000) / 10000,
        description,
        source,
      })),
      degraded: retrieval.degraded,
      failedShards: retrieval.failedShards,
    };
  }
}

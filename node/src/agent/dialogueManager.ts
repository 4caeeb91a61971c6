// src/agent/dialogueManager.ts: turn text + session memory → intent, slots, sufficiency
import { SLOT_BEARING_INTENTS, isIntent, type Intent, type SlotName, type SlotSet } from '@/types/core';
import { errorMessage } from '@/errors/pipelineErrors';
import type { SufficiencyRequirement } from '@/config/recommender.config';
import type { LanguageModelGateway } from '@/services/llm-gateway';
import type { ContextTurn } from '@/services/prompt-templates';
import { logger } from '@/services/logger';
import { classifyIntentFallback } from '@/intent/fallbackClassifier';
import { extractSlotsFallback } from '@/slots/fallbackSlots';
import type { Lexicon } from '@/slots/lexicon';
import type { SlotRejection, SlotSchema } from '@/slots/slotSchema';
import type { SessionMemory } from '@/memory/sessionMemory';
import { checkSufficiency, type SufficiencyResult } from './sufficiency';

export interface DialogueManagerOptions {
  historyWindow: number;
  requirements: readonly SufficiencyRequirement[];
  /** Model answers below this confidence defer to a matching rule. */
  minIntentConfidence?: number;
}

export type SignalSource = 'model' | 'rules';

export interface DialogueOutcome {
  intent: Intent;
  intentSource: SignalSource;
  updatedSlots: SlotSet;
  sufficiency: boolean;
  missingSlots: SlotName[];
  unmet: SufficiencyResult['unmet'];
  newQuery: boolean;
  rejected: SlotRejection[];
}

interface Extraction {
  newQuery: boolean;
  raw: Record<string, unknown>;
  source: SignalSource;
}

const NEW_QUERY_CUE = /\b(now i want|instead|change (?:it )?to|switch to|something else)\b/;

function toContext(memory: SessionMemory, window: number): ContextTurn[] {
  return memory.recentTurns(window).map((t) => ({ speaker: t.speaker, text: t.text }));
}

/**
 * The only writer of session memory during a turn. Model output is never
 * trusted directly: intents are checked against the enumeration and slot
 * values against the slot schema before anything is merged.
 */
export class DialogueManager {
  private readonly minIntentConfidence: number;

  constructor(
    private readonly gateway: LanguageModelGateway,
    private readonly schema: SlotSchema,
    private readonly lexicon: Lexicon,
    private readonly options: DialogueManagerOptions,
  ) {
    this.minIntentConfidence = options.minIntentConfidence ?? 0.4;
  }

  async processTurn(rawText: string, memory: SessionMemory, signal?: AbortSignal): Promise<DialogueOutcome> {
    const text = rawText.trim();
    const history = toContext(memory, this.options.historyWindow);
    const pending = memory.pendingSlots();
    const ruleSlots = this.schema.validate(extractSlotsFallback(text, this.lexicon)).accepted;

    let intent: Intent = 'unknown';
    let intentSource: SignalSource = 'rules';
    try {
      ({ intent, source: intentSource } = await this.classify(text, history, pending, ruleSlots, signal));
    } finally {
      memory.recordTurn('user', text, intent);
    }

    let newQuery = false;
    let rejected: SlotRejection[] = [];

    if (SLOT_BEARING_INTENTS.has(intent)) {
      const extraction = await this.extract(text, history, memory.getSlots(), signal);
      const validated = this.schema.validate(extraction.raw);
      rejected = validated.rejected;
      for (const r of rejected) {
        logger.warn('dialogue:slot_rejected', { sessionId: memory.sessionId, ...r, source: extraction.source });
      }

      newQuery = extraction.newQuery && (validated.accepted.dish !== undefined || validated.accepted.cuisine !== undefined);
      if (newQuery) {
        logger.info('dialogue:new_query', { sessionId: memory.sessionId });
        memory.resetSlots();
        memory.clearPending();
      }
      memory.applySlotUpdates(validated.accepted);
      memory.resolvePending();
    }

    const updatedSlots = memory.getSlots();
    const gate = checkSufficiency(updatedSlots, this.options.requirements);

    logger.debug('dialogue:turn', { sessionId: memory.sessionId, intent, intentSource, slots: updatedSlots, gate });

    return {
      intent,
      intentSource,
      updatedSlots,
      sufficiency: gate.sufficient,
      missingSlots: gate.missingSlots,
      unmet: gate.unmet,
      newQuery,
      rejected,
    };
  }

  private async classify(
    text: string,
    history: ContextTurn[],
    pendingSlots: SlotName[],
    ruleSlots: SlotSet,
    signal?: AbortSignal,
  ): Promise<{ intent: Intent; source: SignalSource }> {
    const fallback = () =>
      classifyIntentFallback(text, { pendingSlots, hasSlotContent: Object.keys(ruleSlots).length > 0 });

    if (!this.gateway.isAvailable()) {
      return { intent: fallback(), source: 'rules' };
    }

    try {
      const payload = await this.gateway.call('intent', { text, history, pendingSlots }, signal);
      const label = payload.intent.trim().toLowerCase();
      if (!isIntent(label)) {
        logger.warn('dialogue:intent_out_of_enum', { received: payload.intent });
        return { intent: fallback(), source: 'rules' };
      }
      if (payload.confidence !== undefined && payload.confidence < this.minIntentConfidence) {
        const ruled = fallback();
        if (ruled !== 'unknown') {
          logger.info('dialogue:intent_low_confidence', { model: label, rules: ruled, confidence: payload.confidence });
          return { intent: ruled, source: 'rules' };
        }
      }
      return { intent: label, source: 'model' };
    } catch (err) {
      logger.warn('dialogue:intent_fallback', { error: errorMessage(err) });
      return { intent: fallback(), source: 'rules' };
    }
  }

  private async extract(
    text: string,
    history: ContextTurn[],
    currentSlots: SlotSet,
    signal?: AbortSignal,
  ): Promise<Extraction> {
    const fallback = (): Extraction => ({
      newQuery: NEW_QUERY_CUE.test(text.toLowerCase()),
      raw: extractSlotsFallback(text, this.lexicon),
      source: 'rules',
    });

    if (!this.gateway.isAvailable()) return fallback();

    try {
      const payload = await this.gateway.call(
        'slot_extract',
        { text, history, currentSlots, slotGuide: this.schema.describe() },
        signal,
      );
      return { newQuery: payload.newQuery, raw: payload.slots, source: 'model' };
    } catch (err) {
      logger.warn('dialogue:extract_fallback', { error: errorMessage(err) });
      return fallback();
    }
  }
}

// src/memory/sessionMemory.ts
import type {
  Intent,
  Query,
  RankedResult,
  RecommendationCycle,
  SlotName,
  SlotSet,
  Speaker,
  Turn,
} from '@/types/core';
import { mergeSlots } from '@/slots/slotSchema';

/** Cycles kept for diversity and repeat checks. */
export const MAX_RECOMMENDATION_CYCLES = 20;

/** State restored when a turn cannot complete. Turn history is never part of it. */
export interface SessionSnapshot {
  readonly slots: SlotSet;
  readonly pending: readonly SlotName[];
  readonly cycles: readonly RecommendationCycle[];
}

export interface CycleRecord {
  query: Query | null;
  conditions: ReadonlyArray<{ name: string; weight: number }>;
  results: readonly RankedResult[];
}

function copySlots(slots: SlotSet): SlotSet {
  return {
    ...slots,
    ...(slots.cuisine && { cuisine: [...slots.cuisine] }),
    ...(slots.labels && { labels: [...slots.labels] }),
  };
}

/**
 * State of one conversation. Owned by a single session; the orchestrator
 * serializes turns so only one mutation runs at a time.
 */
export class SessionMemory {
  private readonly turns: Turn[] = [];
  private slots: SlotSet = {};
  private pending = new Set<SlotName>();
  private cycles: RecommendationCycle[] = [];
  readonly createdAt = new Date().toISOString();

  constructor(
    readonly sessionId: string,
    readonly personaId: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  recordTurn(speaker: Speaker, text: string, detectedIntent: Intent | null): Turn {
    const turn: Turn = Object.freeze({
      speaker,
      text,
      timestamp: this.now().toISOString(),
      detectedIntent,
    });
    this.turns.push(turn);
    return turn;
  }

  get turnCount(): number {
    return this.turns.length;
  }

  /** Last `n` turns, oldest first. */
  recentTurns(n: number): readonly Turn[] {
    return n <= 0 ? [] : this.turns.slice(-n);
  }

  getSlots(): SlotSet {
    return copySlots(this.slots);
  }

  applySlotUpdates(updates: SlotSet): SlotSet {
    this.slots = mergeSlots(this.slots, updates);
    return this.getSlots();
  }

  resetSlots(): void {
    this.slots = {};
  }

  pendingSlots(): SlotName[] {
    return Array.from(this.pending);
  }

  setPending(slots: readonly SlotName[]): void {
    this.pending = new Set(slots);
  }

  /** Clears the pending question once any of its slots has a value. */
  resolvePending(): void {
    if (this.pending.size === 0) return;
    const answered = Array.from(this.pending).some((slot) => this.slots[slot] !== undefined);
    if (answered) this.pending.clear();
  }

  clearPending(): void {
    this.pending.clear();
  }

  snapshot(): SessionSnapshot {
    return { slots: copySlots(this.slots), pending: this.pendingSlots(), cycles: [...this.cycles] };
  }

  restore(snapshot: SessionSnapshot): void {
    this.slots = copySlots(snapshot.slots);
    this.pending = new Set(snapshot.pending);
    this.cycles = [...snapshot.cycles];
  }

  recordRecommendation({ query, conditions, results }: CycleRecord): RecommendationCycle {
    const cycle: RecommendationCycle = {
      at: this.now().toISOString(),
      query,
      conditions: conditions.map(({ name, weight }) => ({ name, weight })),
      results: results.map(({ itemId, metadata, rank, finalScore, explanation }) => ({
        itemId,
        name: metadata.name,
        rank,
        finalScore,
        explanation,
      })),
      itemIds: results.map((r) => r.itemId),
      cuisines: Array.from(new Set(results.flatMap((r) => r.metadata.cuisines))).sort(),
    };
    this.cycles.push(cycle);
    if (this.cycles.length > MAX_RECOMMENDATION_CYCLES) {
      this.cycles.splice(0, this.cycles.length - MAX_RECOMMENDATION_CYCLES);
    }
    return cycle;
  }

  /** Last `n` recommendation cycles, oldest first. */
  recentRecommendations(n: number): readonly RecommendationCycle[] {
    return n <= 0 ? [] : this.cycles.slice(-n);
  }

  /** Kept cycles, oldest first; index 0 is the oldest still held. */
  recommendationHistory(): readonly RecommendationCycle[] {
    return [...this.cycles];
  }

  recommendationAt(index: number): RecommendationCycle | undefined {
    return Number.isInteger(index) && index >= 0 ? this.cycles[index] : undefined;
  }
}

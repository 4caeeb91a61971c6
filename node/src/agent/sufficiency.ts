// src/agent/sufficiency.ts: gate deciding whether the slots are enough to recommend
import type { SlotName, SlotSet } from '@/types/core';
import type { SufficiencyRequirement } from '@/config/recommender.config';

export interface SufficiencyResult {
  sufficient: boolean;
  /** Slots of the first unmet requirement; empty when sufficient. */
  missingSlots: SlotName[];
  /** The requirement to ask about next, if any. */
  unmet: SufficiencyRequirement | null;
}

function isFilled(slots: SlotSet, name: SlotName): boolean {
  const value = slots[name];
  if (value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'boolean') return value;
  return true;
}

/** Requirements are checked in order; only the first unmet one is reported. */
export function checkSufficiency(
  slots: SlotSet,
  requirements: readonly SufficiencyRequirement[],
): SufficiencyResult {
  const unmet = requirements.find((req) => !req.anyOf.some((name) => isFilled(slots, name)));
  return unmet
    ? { sufficient: false, missingSlots: [...unmet.anyOf], unmet }
    : { sufficient: true, missingSlots: [], unmet: null };
}

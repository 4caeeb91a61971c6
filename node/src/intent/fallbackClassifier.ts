// src/intent/fallbackClassifier.ts: ordered keyword rules, first match wins
import type { Intent, SlotName } from '@/types/core';

export interface FallbackContext {
  /** Slots the assistant's last question asked for. */
  pendingSlots: readonly SlotName[];
  /** Whether the rule-based slot extractor found anything in the text. */
  hasSlotContent: boolean;
}

interface IntentRule {
  intent: Intent;
  matches: (text: string, ctx: FallbackContext) => boolean;
}

const RULES: readonly IntentRule[] = [
  {
    intent: 'goodbye',
    matches: (t) => /\b(bye|goodbye|quit|exit|that'?s all|see you|see ya)\b/.test(t),
  },
  {
    intent: 'greeting',
    matches: (t, ctx) =>
      /^(hi|hello|hey|hiya|namaste|good (morning|afternoon|evening))\b/.test(t) && !ctx.hasSlotContent,
  },
  {
    intent: 'update_preference',
    matches: (t) => /\b(change|instead|actually|make it|rather|switch|no longer)\b/.test(t),
  },
  {
    intent: 'request_recommendation',
    matches: (t) => /\b(recommend|suggest|show me|looking for|find|want|craving|get me|hungry)\b/.test(t),
  },
  {
    intent: 'clarification_response',
    matches: (_t, ctx) => ctx.pendingSlots.length > 0 && ctx.hasSlotContent,
  },
  {
    intent: 'specify_preference',
    matches: (_t, ctx) => ctx.hasSlotContent,
  },
];

export function classifyIntentFallback(text: string, ctx: FallbackContext): Intent {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ').trim();
  const rule = RULES.find((r) => r.matches(normalized, ctx));
  return rule ? rule.intent : 'unknown';
}

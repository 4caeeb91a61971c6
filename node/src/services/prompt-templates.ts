// node/src/services/prompt-templates.ts: prompts for the four gateway tasks
import type { SlotName, SlotSet, Speaker } from '@/types/core';
import { INTENTS } from '@/types/core';

export interface ContextTurn {
  speaker: Speaker;
  text: string;
}

export interface IntentRequest {
  text: string;
  history: ContextTurn[];
  pendingSlots: SlotName[];
}

export interface SlotExtractRequest {
  text: string;
  history: ContextTurn[];
  currentSlots: SlotSet;
  /** One line per slot: name, accepted values, meaning. */
  slotGuide: string[];
}

export interface ConditionsRequest {
  slots: SlotSet;
  history: ContextTurn[];
  persona: string | null;
  recentCuisines: string[];
  evaluatorGuide: string[];
  candidateSample: Array<{ itemId: string; name: string; cuisines: string[]; price?: number }>;
}

export interface ExplainRequest {
  slots: SlotSet;
  items: Array<{ itemId: string; name: string; topConditions: string[] }>;
}

function formatHistory(history: ContextTurn[]): string {
  if (history.length === 0) return '(no earlier turns)';
  return history.map((t) => `${t.speaker === 'user' ? 'User' : 'Assistant'}: ${t.text}`).join('\n');
}

export function buildIntentPrompt(req: IntentRequest): string {
  const pending = req.pendingSlots.length
    ? `\nThe assistant's last question asked for: ${req.pendingSlots.join(', ')}. A message that answers it is "clarification_response".`
    : '';
  return `Classify the user's latest message in a food recommendation chat into exactly one intent.
Intents:
- greeting: opens the conversation
- goodbye: ends the conversation
- specify_preference: states a food preference (dish, cuisine, diet, budget, spice, meal) without asking for results
- update_preference: changes or removes a preference stated earlier
- request_recommendation: asks to see dishes or suggestions
- clarification_response: answers the assistant's follow-up question
- unknown: anything else${pending}

Recent conversation:
${formatHistory(req.history)}

Latest message: ${JSON.stringify(req.text)}

Respond with JSON only: {"intent": one of ${JSON.stringify(INTENTS)}, "confidence": number between 0 and 1}`;
}

export function buildSlotExtractPrompt(req: SlotExtractRequest): string {
  return `Extract food preferences stated in the user's latest message.
Only extract values present in the latest message; never infer from earlier turns or invent values.
Infer "dietary" from the dish when it is unambiguous (paneer => veg, chicken or mutton => nonveg).
Set "newQuery" to true only when the user switches to a different dish or cuisine family ("now I want", "instead", "change to", main course to dessert); otherwise false.

Slots:
${req.slotGuide.join('\n')}

Current preferences: ${JSON.stringify(req.currentSlots)}
Recent conversation:
${formatHistory(req.history)}

Latest message: ${JSON.stringify(req.text)}

Respond with JSON only: {"newQuery": boolean, "slots": {slot name: value}} and leave out slots the message does not mention.`;
}

export function buildConditionsPrompt(req: ConditionsRequest): string {
  return `You tune ranking for a food recommender. Propose up to 3 extra ranking conditions that reflect the user's journey.
Each condition must use one of these evaluators:
${req.evaluatorGuide.join('\n')}

User preferences: ${JSON.stringify(req.slots)}
User segment: ${req.persona ?? 'unknown'}
Cuisines shown in recent recommendations: ${JSON.stringify(req.recentCuisines)}
Recent conversation:
${formatHistory(req.history)}
Sample candidates: ${JSON.stringify(req.candidateSample)}

Respond with JSON only: {"conditions": [{"name": string, "weight": number in (0,1], "description": string, "evaluator": {"kind": string, ...}}]}`;
}

export function buildExplainPrompt(req: ExplainRequest): string {
  return `Write one short sentence per dish explaining why it was recommended. Refer to the listed top conditions; do not invent facts.

User preferences: ${JSON.stringify(req.slots)}
Dishes: ${JSON.stringify(req.items)}

Respond with JSON only: {"explanations": [{"itemId": string, "text": string}]}`;
}

import { DialogueManager } from '@/agent/dialogueManager';
import { SessionMemory } from '@/memory/sessionMemory';
import { SlotSchema } from '@/slots/slotSchema';
import type { LanguageModelGateway } from '@/services/llm-gateway';
import { FakeGateway, offlineGateway, testConfig, testLexicon } from './helpers/fakes';

const lexicon = testLexicon();
const { requirements } = testConfig();

function manager(gateway: LanguageModelGateway): DialogueManager {
  return new DialogueManager(gateway, new SlotSchema(lexicon), lexicon, { historyWindow: 6, requirements });
}

describe('DialogueManager', () => {
  let memory: SessionMemory;

  beforeEach(() => {
    memory = new SessionMemory('s1', 'default');
  });

  it('reads a complete request with the rule-based fallbacks', async () => {
    const outcome = await manager(offlineGateway()).processTurn('Show me spicy veg biryani under 300', memory);

    expect(outcome.intent).toBe('request_recommendation');
    expect(outcome.intentSource).toBe('rules');
    expect(outcome.updatedSlots).toEqual({ dietary: 'veg', priceMax: 300, spice: 'high', dish: 'biryani' });
    expect(outcome.sufficiency).toBe(true);
    expect(outcome.missingSlots).toEqual([]);
    expect(memory.recentTurns(1)[0]).toMatchObject({
      speaker: 'user',
      text: 'Show me spicy veg biryani under 300',
      detectedIntent: 'request_recommendation',
    });
  });

  it('uses the model intent and validated model slots', async () => {
    const gateway = new FakeGateway({
      intent: () => ({ intent: 'Specify_Preference', confidence: 0.9 }),
      slot_extract: () => ({ newQuery: false, slots: { dish: 'Momos', priceMax: '₹300', cuisine: ['martian'] } }),
    });

    const outcome = await manager(gateway).processTurn('momos, three hundred max', memory);

    expect(outcome.intent).toBe('specify_preference');
    expect(outcome.intentSource).toBe('model');
    expect(outcome.updatedSlots).toEqual({ dish: 'momos', priceMax: 300 });
    expect(outcome.rejected).toEqual([{ slot: 'cuisine', value: 'martian', reason: 'not_in_vocabulary' }]);
    expect(gateway.calls).toEqual(['intent', 'slot_extract']);
  });

  it('falls back to the rules when the model answers outside the intent set', async () => {
    const gateway = new FakeGateway({
      intent: () => ({ intent: 'ordering_food' }),
      slot_extract: () => ({ newQuery: false, slots: {} }),
    });

    const outcome = await manager(gateway).processTurn('hello', memory);

    expect(outcome.intent).toBe('greeting');
    expect(outcome.intentSource).toBe('rules');
    expect(gateway.calls).toEqual(['intent']);
  });

  it('prefers a matching rule over a low-confidence model answer', async () => {
    const gateway = new FakeGateway({
      intent: () => ({ intent: 'greeting', confidence: 0.1 }),
      slot_extract: () => ({ newQuery: false, slots: { dish: 'biryani' } }),
    });

    const outcome = await manager(gateway).processTurn('veg biryani', memory);

    expect(outcome.intent).toBe('specify_preference');
    expect(outcome.intentSource).toBe('rules');
  });

  it('falls back on both calls when the model fails', async () => {
    const gateway = new FakeGateway({});

    const outcome = await manager(gateway).processTurn('I want paneer tikka under 250', memory);

    expect(gateway.calls).toEqual(['intent', 'slot_extract']);
    expect(outcome.intent).toBe('request_recommendation');
    expect(outcome.updatedSlots).toEqual({ dish: 'paneer tikka', priceMax: 250 });
  });

  it('starts over when the user asks for something new', async () => {
    memory.applySlotUpdates({ dish: 'biryani', dietary: 'veg', priceMax: 300 });

    const outcome = await manager(offlineGateway()).processTurn('now I want pizza instead', memory);

    expect(outcome.intent).toBe('update_preference');
    expect(outcome.newQuery).toBe(true);
    expect(outcome.updatedSlots).toEqual({ dish: 'pizza' });
    expect(outcome.sufficiency).toBe(false);
    expect(outcome.missingSlots).toEqual(['priceMax', 'budgetTier', 'noPriceLimit']);
  });

  it('refines the current request otherwise', async () => {
    memory.applySlotUpdates({ dish: 'biryani', priceMax: 300 });

    const outcome = await manager(offlineGateway()).processTurn('make it under 200', memory);

    expect(outcome.intent).toBe('update_preference');
    expect(outcome.newQuery).toBe(false);
    expect(outcome.updatedSlots).toEqual({ dish: 'biryani', priceMax: 200 });
  });

  it('treats an answer to a pending question as a clarification', async () => {
    memory.applySlotUpdates({ dish: 'biryani' });
    memory.setPending(['priceMax', 'budgetTier', 'noPriceLimit']);

    const outcome = await manager(offlineGateway()).processTurn('under 300', memory);

    expect(outcome.intent).toBe('clarification_response');
    expect(outcome.sufficiency).toBe(true);
    expect(memory.pendingSlots()).toEqual([]);
  });

  it('leaves slots alone for a greeting', async () => {
    memory.applySlotUpdates({ dish: 'dosa' });
    const gateway = new FakeGateway({}, false);

    const outcome = await manager(gateway).processTurn('hi there', memory);

    expect(outcome.intent).toBe('greeting');
    expect(outcome.updatedSlots).toEqual({ dish: 'dosa' });
    expect(memory.turnCount).toBe(1);
  });
});

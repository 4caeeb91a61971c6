// src/slots/slotSchema.ts: the static slot schema: accepted values and merge policy per slot
import { z } from 'zod';
import type { BudgetTier, SlotName, SlotSet } from '@/types/core';
import type { Lexicon } from './lexicon';

/** `price`: one of the four budget slots merged together by `mergePrice`. */
export type MergePolicy = 'replace' | 'union' | 'price';

export interface SlotDefinition {
  name: SlotName;
  merge: MergePolicy;
  /** Shown to the language model when it extracts slots. */
  guide: string;
}

export interface SlotRejection {
  slot: string;
  value: unknown;
  reason: string;
}

export interface SlotValidationResult {
  accepted: SlotSet;
  rejected: SlotRejection[];
}

export const SLOT_NAMES: readonly SlotName[] = [
  'dietary',
  'cuisine',
  'dish',
  'priceMax',
  'priceMin',
  'noPriceLimit',
  'budgetTier',
  'mealType',
  'labels',
  'spice',
  'location',
];

const REPLACE_SLOTS = [
  'dietary',
  'dish',
  'priceMax',
  'priceMin',
  'noPriceLimit',
  'budgetTier',
  'mealType',
  'spice',
  'location',
] as const satisfies readonly SlotName[];

/** One budget statement, spread over four slots; merged as a unit. */
export const PRICE_GROUP = ['priceMax', 'priceMin', 'noPriceLimit', 'budgetTier'] as const satisfies readonly SlotName[];

export const BUDGET_TIERS: Record<BudgetTier, { min: number; max: number }> = {
  budget: { min: 50, max: 200 },
  affordable: { min: 200, max: 500 },
  premium: { min: 500, max: 1000 },
  luxury: { min: 1000, max: 2000 },
};

/** Values a model uses to say "nothing stated"; they are skipped, not rejected. */
const NOT_MENTIONED = new Set(['', 'null', 'none', 'any', 'n/a', 'unknown']);

const DIETARY_SYNONYMS: Record<string, string> = {
  vegetarian: 'veg',
  'non-veg': 'nonveg',
  'non veg': 'nonveg',
  'non-vegetarian': 'nonveg',
  'non vegetarian': 'nonveg',
};

const SPICE_SYNONYMS: Record<string, string> = {
  spicy: 'high',
  hot: 'high',
  'extra spicy': 'high',
  low: 'mild',
  moderate: 'medium',
};

const normalizeString = (value: unknown) =>
  typeof value === 'string' ? value.trim().toLowerCase().replace(/\s+/g, ' ') : value;

const withSynonyms = (synonyms: Record<string, string>) => (value: unknown) => {
  const normalized = normalizeString(value);
  return typeof normalized === 'string' ? synonyms[normalized] ?? normalized : normalized;
};

const toNumber = (value: unknown) => {
  if (typeof value === 'string') {
    const digits = value.replace(/[₹,\s]|rupees?|rs\.?|inr/gi, '');
    return digits === '' ? value : Number(digits);
  }
  return value;
};

const toBoolean = (value: unknown) => {
  if (value === 'true' || value === 'yes') return true;
  if (value === 'false' || value === 'no') return false;
  return value;
};

const price = (min: number) => z.preprocess(toNumber, z.number().finite().min(min).max(5000).transform(Math.round));

function isNotMentioned(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return NOT_MENTIONED.has(value.trim().toLowerCase());
  return Array.isArray(value) && value.length === 0;
}

function setSlot<K extends SlotName>(target: SlotSet, key: K, value: SlotSet[K]): void {
  target[key] = value;
}

function union(a: string[] | undefined, b: string[] | undefined): string[] | undefined {
  if (!a && !b) return undefined;
  return Array.from(new Set([...(a ?? []), ...(b ?? [])])).sort();
}

/**
 * Validation rules are fixed for the lifetime of the process; only the
 * vocabulary for cuisines and labels comes from the lexicon.
 */
export class SlotSchema {
  private readonly cuisines: Set<string>;
  private readonly labels: Set<string>;
  private readonly scalarSchemas: { [K in (typeof REPLACE_SLOTS)[number]]: z.ZodType<SlotSet[K], z.ZodTypeDef, unknown> };
  readonly definitions: Record<SlotName, SlotDefinition>;

  constructor(lexicon: Lexicon) {
    this.cuisines = new Set(lexicon.cuisines);
    this.labels = new Set(lexicon.labels);

    this.scalarSchemas = {
      dietary: z.preprocess(withSynonyms(DIETARY_SYNONYMS), z.enum(['veg', 'nonveg', 'vegan'])),
      dish: z.preprocess(normalizeString, z.string().min(2).max(60)),
      priceMax: price(50),
      priceMin: price(0),
      noPriceLimit: z.preprocess(toBoolean, z.boolean()),
      budgetTier: z.preprocess(normalizeString, z.enum(['budget', 'affordable', 'premium', 'luxury'])),
      mealType: z.preprocess(normalizeString, z.enum(['breakfast', 'lunch', 'dinner', 'snacks'])),
      spice: z.preprocess(withSynonyms(SPICE_SYNONYMS), z.enum(['mild', 'medium', 'high'])),
      location: z.preprocess(normalizeString, z.string().min(2).max(60)),
    };

    const definition = (name: SlotName, merge: MergePolicy, guide: string): SlotDefinition => ({
      name,
      merge,
      guide: `- ${name}: ${guide}`,
    });

    this.definitions = {
      dietary: definition('dietary', 'replace', '"veg" | "nonveg" | "vegan"'),
      cuisine: definition('cuisine', 'union', `list of cuisines from ${JSON.stringify(lexicon.cuisines)}`),
      dish: definition('dish', 'replace', 'the specific dish named, e.g. "paneer biryani"'),
      priceMax: definition('priceMax', 'price', 'integer budget ceiling in rupees (50-5000)'),
      priceMin: definition('priceMin', 'price', 'integer lower price bound in rupees (0-5000)'),
      noPriceLimit: definition('noPriceLimit', 'price', 'true when the user says price does not matter'),
      budgetTier: definition('budgetTier', 'price', '"budget" | "affordable" | "premium" | "luxury" when no number is given'),
      mealType: definition('mealType', 'replace', '"breakfast" | "lunch" | "dinner" | "snacks"'),
      labels: definition('labels', 'union', `list of menu labels from ${JSON.stringify(lexicon.labels)}`),
      spice: definition('spice', 'replace', '"mild" | "medium" | "high"'),
      location: definition('location', 'replace', 'area or locality for delivery'),
    };
  }

  describe(): string[] {
    return SLOT_NAMES.map((name) => this.definitions[name].guide);
  }

  isSlotName(name: string): name is SlotName {
    const names: readonly string[] = SLOT_NAMES;
    return names.includes(name);
  }

  /**
   * Checks raw values against the schema. Unknown slots and invalid values are
   * reported in `rejected` and never reach `accepted`.
   */
  validate(raw: Record<string, unknown>): SlotValidationResult {
    const accepted: SlotSet = {};
    const rejected: SlotRejection[] = [];

    for (const [slot, value] of Object.entries(raw)) {
      if (isNotMentioned(value)) continue;
      if (!this.isSlotName(slot)) {
        rejected.push({ slot, value, reason: 'unknown_slot' });
        continue;
      }

      if (slot === 'cuisine' || slot === 'labels') {
        const vocabulary = slot === 'cuisine' ? this.cuisines : this.labels;
        const { valid, invalid } = this.validateSet(value, vocabulary);
        if (valid.length) accepted[slot] = valid;
        for (const item of invalid) rejected.push({ slot, value: item, reason: 'not_in_vocabulary' });
        continue;
      }

      this.validateScalar(slot, value, accepted, rejected);
    }

    if (accepted.priceMin !== undefined && accepted.priceMax !== undefined && accepted.priceMin > accepted.priceMax) {
      rejected.push({ slot: 'priceMin', value: accepted.priceMin, reason: 'above_price_max' });
      delete accepted.priceMin;
    }

    return { accepted, rejected };
  }

  private validateScalar<K extends (typeof REPLACE_SLOTS)[number]>(
    slot: K,
    value: unknown,
    accepted: SlotSet,
    rejected: SlotRejection[],
  ): void {
    const schema: z.ZodType<SlotSet[K], z.ZodTypeDef, unknown> = this.scalarSchemas[slot];
    const parsed = schema.safeParse(value);
    if (parsed.success) {
      setSlot(accepted, slot, parsed.data);
    } else {
      rejected.push({ slot, value, reason: parsed.error.errors[0]?.message ?? 'invalid' });
    }
  }

  private validateSet(value: unknown, vocabulary: Set<string>): { valid: string[]; invalid: unknown[] } {
    const items = Array.isArray(value) ? value : [value];
    const valid: string[] = [];
    const invalid: unknown[] = [];
    for (const item of items) {
      const normalized = normalizeString(item);
      if (typeof normalized === 'string' && vocabulary.has(normalized)) {
        valid.push(normalized);
      } else if (!isNotMentioned(item)) {
        invalid.push(item);
      }
    }
    return { valid: Array.from(new Set(valid)).sort(), invalid };
  }
}

type PriceSlots = Pick<SlotSet, (typeof PRICE_GROUP)[number]>;

function priceSlots(slots: SlotSet): PriceSlots {
  const out: PriceSlots = {};
  for (const key of PRICE_GROUP) {
    const value = slots[key];
    if (value !== undefined) setSlot(out, key, value);
  }
  return out;
}

/**
 * The newest budget statement wins. "No limit" or a tier replaces the whole
 * group; a numeric bound replaces the tier and keeps the other bound unless
 * the two would contradict, in which case the older bound goes.
 */
export function mergePrice(current: SlotSet, updates: SlotSet): PriceSlots {
  if (!PRICE_GROUP.some((key) => updates[key] !== undefined)) return priceSlots(current);

  if (updates.noPriceLimit === true) return { noPriceLimit: true };
  if (updates.budgetTier !== undefined && updates.priceMax === undefined && updates.priceMin === undefined) {
    return { budgetTier: updates.budgetTier };
  }
  if (updates.priceMax === undefined && updates.priceMin === undefined) {
    // Only `noPriceLimit: false`: the stated bounds stay.
    const kept = priceSlots(current);
    delete kept.noPriceLimit;
    return kept;
  }

  let priceMax = updates.priceMax ?? current.priceMax;
  let priceMin = updates.priceMin ?? current.priceMin;
  if (priceMin !== undefined && priceMax !== undefined && priceMin > priceMax) {
    if (updates.priceMin === undefined) priceMin = undefined;
    else priceMax = undefined;
  }
  return {
    ...(priceMax !== undefined && { priceMax }),
    ...(priceMin !== undefined && { priceMin }),
  };
}

/**
 * Applies validated updates in order: replace slots take the new value,
 * union slots accumulate, and the price slots follow `mergePrice`.
 * Re-applying the same update leaves the result unchanged.
 */
export function mergeSlots(current: SlotSet, updates: SlotSet): SlotSet {
  const next: SlotSet = { ...current };

  for (const key of REPLACE_SLOTS) {
    const value = updates[key];
    if (value !== undefined) setSlot(next, key, value);
  }

  for (const key of PRICE_GROUP) delete next[key];
  Object.assign(next, mergePrice(current, updates));

  const cuisine = union(current.cuisine, updates.cuisine);
  if (cuisine) next.cuisine = cuisine;
  const labels = union(current.labels, updates.labels);
  if (labels) next.labels = labels;

  return next;
}

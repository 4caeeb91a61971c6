// src/slots/fallbackSlots.ts: rule-based slot guesses used when the model cannot extract
import type { Lexicon } from './lexicon';

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase)}(?=$|[^a-z0-9])`);
}

/**
 * Working copy of the message. Every matched phrase is blanked out so a later
 * rule cannot read the same words again ("veg" is never also a label).
 */
class MessageCursor {
  constructor(private text: string) {}

  take(pattern: RegExp): RegExpExecArray | null {
    const match = pattern.exec(this.text);
    if (match) {
      this.text =
        this.text.slice(0, match.index) + ' '.repeat(match[0].length) + this.text.slice(match.index + match[0].length);
    }
    return match;
  }

  takePhrase(phrases: readonly string[]): string | null {
    const longestFirst = [...phrases].sort((a, b) => b.length - a.length);
    for (const phrase of longestFirst) {
      if (this.take(phrasePattern(phrase))) return phrase;
    }
    return null;
  }

  takeAll(phrases: readonly string[], limit: number): string[] {
    const found: string[] = [];
    const longestFirst = [...phrases].sort((a, b) => b.length - a.length);
    for (const phrase of longestFirst) {
      if (found.length >= limit) break;
      if (this.take(phrasePattern(phrase))) found.push(phrase);
    }
    return found;
  }
}

const MIN_PRICE = 50;
const MAX_PRICE = 5000;
const inPriceRange = (n: number) => Number.isFinite(n) && n >= MIN_PRICE && n <= MAX_PRICE;

const NUM = '(?:₹|rs\\.?|inr)?\\s*(\\d{2,5})';
const BETWEEN = new RegExp(`\\bbetween\\s+${NUM}\\s*(?:and|-|to)\\s*${NUM}`);
const CEILING = [
  new RegExp(`\\b(?:under|below|less than|upto|up to|max(?:imum)?|not more than|within|budget of|budget is)\\s*${NUM}`),
  /₹\s*(\d{2,5})/,
  /\b(\d{2,5})\s*(?:rs|rupees|inr|bucks)\b/,
];
const NO_LIMIT = /\b(no budget|any price|no price limit|price (?:doesn'?t|does not) matter|budget (?:doesn'?t|does not) matter|money is no)\b/;

/**
 * Reads slot values from plain text. The result is raw: it still goes through
 * schema validation like any model output.
 */
export function extractSlotsFallback(message: string, lexicon: Lexicon): Record<string, unknown> {
  const cursor = new MessageCursor(message.toLowerCase().replace(/\s+/g, ' ').trim());
  const out: Record<string, unknown> = {};

  if (cursor.take(/\b(no restrictions?|no dietary|eat everything|not picky)\b/)) out.dietary = 'nonveg';
  else if (cursor.take(/\bnon[\s-]?veg(?:etarian)?\b/)) out.dietary = 'nonveg';
  else if (cursor.take(/\bvegan\b/)) out.dietary = 'vegan';
  else if (cursor.take(/\bveg(?:etarian|gie)?\b/)) out.dietary = 'veg';

  if (cursor.take(NO_LIMIT)) {
    out.noPriceLimit = true;
  } else {
    const between = cursor.take(BETWEEN);
    if (between) {
      const low = Number(between[1]);
      const high = Number(between[2]);
      if (inPriceRange(low) && inPriceRange(high) && low <= high) {
        out.priceMin = low;
        out.priceMax = high;
      }
    }
    for (const pattern of CEILING) {
      if (out.priceMax !== undefined) break;
      const m = cursor.take(pattern);
      if (m && inPriceRange(Number(m[1]))) out.priceMax = Number(m[1]);
    }
  }

  // Spice groups are checked mild first: "not spicy" must not read as "spicy".
  for (const level of ['mild', 'medium', 'high'] as const) {
    if (cursor.takePhrase(lexicon.spiceKeywords[level])) {
      out.spice = level;
      break;
    }
  }

  for (const meal of ['breakfast', 'lunch', 'dinner', 'snacks'] as const) {
    if (cursor.takePhrase(lexicon.mealKeywords[meal])) {
      out.mealType = meal;
      break;
    }
  }

  for (const tier of ['budget', 'affordable', 'premium', 'luxury'] as const) {
    if (out.priceMax !== undefined || out.noPriceLimit) break;
    if (cursor.takePhrase(lexicon.budgetKeywords[tier])) {
      out.budgetTier = tier;
      break;
    }
  }

  const dish = cursor.takePhrase(lexicon.dishes);
  if (dish) out.dish = dish;

  const cuisines = cursor.takeAll(lexicon.cuisines, 2);
  if (cuisines.length) out.cuisine = cuisines;

  const labels = cursor.takeAll(lexicon.labels, lexicon.labels.length);
  if (labels.length) out.labels = labels;

  return out;
}

// src/slots/lexicon.ts: word lists shared by slot validation and the rule-based fallbacks
import fs from 'fs';
import { z } from 'zod';

const keywords = z.array(z.string().min(1)).min(1);

export const lexiconSchema = z.object({
  cuisines: z.array(z.string().min(1)).min(1),
  dishes: z.array(z.string().min(1)),
  labels: z.array(z.string().min(1)),
  mealKeywords: z.object({ breakfast: keywords, lunch: keywords, dinner: keywords, snacks: keywords }),
  spiceKeywords: z.object({ high: keywords, medium: keywords, mild: keywords }),
  budgetKeywords: z.object({ budget: keywords, affordable: keywords, premium: keywords, luxury: keywords }),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

const cache = new Map<string, Lexicon>();

export function loadLexicon(filePath: string): Lexicon {
  const cached = cache.get(filePath);
  if (cached) return cached;

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const lexicon = lexiconSchema.parse(raw);
  const normalized: Lexicon = {
    ...lexicon,
    cuisines: lexicon.cuisines.map((c) => c.toLowerCase()),
    dishes: lexicon.dishes.map((d) => d.toLowerCase()),
    labels: lexicon.labels.map((l) => l.toLowerCase()),
  };
  cache.set(filePath, normalized);
  return normalized;
}

// src/config/recommender.config.ts: tuning for the dialogue gate, retrieval and reranking
import fs from 'fs';
import { z } from 'zod';
import type { SlotName } from '@/types/core';
import { SLOT_NAMES } from '@/slots/slotSchema';

/** Evaluators that take no parameters and can be weighted from configuration. */
export const WEIGHTED_KINDS = [
  'similarity',
  'price_fit',
  'dietary_match',
  'rating',
  'value_for_money',
  'cuisine_diversity',
  'repeat_penalty',
  'keyword_match',
] as const;

export type WeightedKind = (typeof WEIGHTED_KINDS)[number];

export function isWeightedKind(value: string): value is WeightedKind {
  const kinds: readonly string[] = WEIGHTED_KINDS;
  return kinds.includes(value);
}

const weight = z.number().gt(0).max(1);
const slotNames: readonly string[] = SLOT_NAMES;
const slotName = z.string().refine((s): s is SlotName => slotNames.includes(s), {
  message: 'unknown slot',
});

const requirementSchema = z.object({
  id: z.string().min(1),
  anyOf: z.array(slotName).min(1),
  question: z.string().min(1),
});

const personaProfileSchema = z.object({
  description: z.string(),
  scale: z.record(z.enum(WEIGHTED_KINDS), z.number().min(0.1).max(5)).default({}),
  add: z.record(z.enum(WEIGHTED_KINDS), weight).default({}),
});

export const recommenderConfigSchema = z.object({
  historyWindow: z.number().int().min(1).max(50).default(6),
  retrieval: z
    .object({
      topNPerShard: z.number().int().min(1).max(200).default(20),
      candidateCap: z.number().int().min(1).max(500).default(50),
    })
    .default({}),
  resultSize: z.number().int().min(1).max(10).default(10),
  diversityWindow: z.number().int().min(1).max(20).default(3),
  requirements: z.array(requirementSchema).min(1),
  baselineWeights: z.object({ similarity: weight, price_fit: weight, dietary_match: weight }),
  contextualWeights: z.object({ keyword_match: weight, cuisine_diversity: weight, repeat_penalty: weight }),
  personas: z.record(personaProfileSchema).refine((p) => 'default' in p, { message: 'a "default" persona is required' }),
  explanationMode: z.enum(['generative', 'template']).default('generative'),
  generativeConditions: z.boolean().default(true),
  maxGeneratedConditions: z.number().int().min(0).max(5).default(3),
});

export type RecommenderConfig = z.infer<typeof recommenderConfigSchema>;
export type SufficiencyRequirement = z.infer<typeof requirementSchema>;
export type PersonaProfile = z.infer<typeof personaProfileSchema>;

export function parseRecommenderConfig(raw: unknown): RecommenderConfig {
  const parsed = recommenderConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`).join('; ');
    throw new Error(`Invalid recommender config: ${details}`);
  }
  return parsed.data;
}

export function loadRecommenderConfig(filePath: string): RecommenderConfig {
  return parseRecommenderConfig(JSON.parse(fs.readFileSync(filePath, 'utf8')));
}

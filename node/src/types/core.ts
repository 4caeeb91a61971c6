// src/types/core.ts

export const INTENTS = [
  'greeting',
  'goodbye',
  'specify_preference',
  'update_preference',
  'request_recommendation',
  'clarification_response',
  'unknown',
] as const;

export type Intent = (typeof INTENTS)[number];

/** Intents whose turns carry slot values and may lead to a recommendation cycle. */
export const SLOT_BEARING_INTENTS: ReadonlySet<Intent> = new Set<Intent>([
  'specify_preference',
  'update_preference',
  'clarification_response',
  'request_recommendation',
]);

export function isIntent(value: unknown): value is Intent {
  const names: readonly string[] = INTENTS;
  return typeof value === 'string' && names.includes(value);
}

export type Speaker = 'user' | 'system';

/** One recorded turn. Frozen once appended to session memory. */
export interface Turn {
  readonly speaker: Speaker;
  readonly text: string;
  readonly timestamp: string;
  readonly detectedIntent: Intent | null;
}

export type Dietary = 'veg' | 'nonveg' | 'vegan';
export type BudgetTier = 'budget' | 'affordable' | 'premium' | 'luxury';
export type MealType = 'breakfast' | 'lunch' | 'dinner' | 'snacks';
export type SpiceLevel = 'mild' | 'medium' | 'high';

/** Accumulated preferences. Set-valued slots are kept sorted and unique. */
export interface SlotSet {
  dietary?: Dietary;
  cuisine?: string[];
  dish?: string;
  priceMax?: number;
  priceMin?: number;
  noPriceLimit?: boolean;
  budgetTier?: BudgetTier;
  mealType?: MealType;
  labels?: string[];
  spice?: SpiceLevel;
  location?: string;
}

export type SlotName = keyof SlotSet;

export type FilterConstraint =
  | { op: 'eq'; value: string | number | boolean }
  | { op: 'range'; min?: number; max?: number }
  | { op: 'in'; values: string[] };

export interface Query {
  semanticText: string;
  filters: Record<string, FilterConstraint>;
}

/** Normalized item metadata, from a shard hit overlaid by the catalog. */
export interface ItemMetadata {
  name: string;
  restaurant?: string;
  price?: number;
  dietary?: string;
  cuisines: string[];
  labels: string[];
  rating?: number;
  location?: string;
  description?: string;
}

export interface CandidateItem {
  readonly itemId: string;
  readonly similarityScore: number;
  readonly shardId: string;
  readonly rawMetadata: Readonly<Record<string, unknown>>;
}

export type EvaluatorSpec =
  | { kind: 'similarity' }
  | { kind: 'price_fit' }
  | { kind: 'dietary_match' }
  | { kind: 'rating' }
  | { kind: 'value_for_money' }
  | { kind: 'cuisine_diversity' }
  | { kind: 'repeat_penalty' }
  | { kind: 'keyword_match'; terms: string[] }
  | { kind: 'label_match'; labels: string[] };

export type EvaluatorKind = EvaluatorSpec['kind'];

export type ConditionSource = 'baseline' | 'contextual' | 'persona' | 'generated';

export interface RankingCondition {
  name: string;
  weight: number;
  description: string;
  evaluator: EvaluatorSpec;
  source: ConditionSource;
}

export interface ConditionContribution {
  condition: string;
  score: number;
  contribution: number;
}

export interface RankedResult {
  itemId: string;
  rank: number;
  finalScore: number;
  similarityScore: number;
  explanation: string;
  metadata: ItemMetadata;
  contributions: ConditionContribution[];
}

export interface CycleResult {
  itemId: string;
  name: string;
  rank: number;
  finalScore: number;
  explanation: string;
}

/** One set of recommendations shown to the user. */
export interface RecommendationCycle {
  at: string;
  /** Null when the items were ranked outside a full turn. */
  query: Query | null;
  conditions: Array<{ name: string; weight: number }>;
  results: CycleResult[];
  itemIds: string[];
  cuisines: string[];
}

/** Listing row for a past recommendation cycle. */
export interface SearchHistoryEntry {
  index: number;
  timestamp: string;
  readableTime: string;
  query: string;
  resultsCount: number;
  preview: string;
}

export interface ShardFailure {
  shardId: string;
  reason: 'timeout' | 'error' | 'aborted';
  message: string;
}

interface BaseTurnResponse {
  sessionId: string;
  intent: Intent;
  message: string;
}

export type TurnResponse =
  | (BaseTurnResponse & { kind: 'clarification'; missingSlots: SlotName[] })
  | (BaseTurnResponse & {
      kind: 'recommendations';
      results: RankedResult[];
      conditions: Array<Pick<RankingCondition, 'name' | 'weight' | 'description' | 'source'>>;
      degraded: boolean;
      failedShards: ShardFailure[];
    })
  | (BaseTurnResponse & { kind: 'retry' })
  | (BaseTurnResponse & { kind: 'message' });

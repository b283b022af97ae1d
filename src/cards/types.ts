// Memory cards: atomic facts about a user, partitioned by persona.
// Constraints, preferences, goals and capabilities share one shape; the type
// only decides grouping and the constraint bonus.

import { z } from 'zod';

export const CARD_TYPES = ['constraint', 'preference', 'goal', 'capability'] as const;
export const CARD_PRIORITIES = ['hard', 'soft'] as const;
export const SENSITIVITY_MODES = ['quiet', 'verbose'] as const;

export type CardType = (typeof CARD_TYPES)[number];
export type CardPriority = (typeof CARD_PRIORITIES)[number];
export type SensitivityMode = (typeof SENSITIVITY_MODES)[number];

// Provenance tags
export const PROFILE_TAG = 'profile';      // answered questionnaire
export const EXTRACTED_TAG = 'extracted';  // mined from conversation text

export const DEFAULT_PERSONA = 'Personal';

export interface MemoryCard {
  id: string;
  type: CardType;
  text: string;
  domain: string[];
  priority: CardPriority;
  tags: string[];
  persona: string;
  createdAt: Date;
  updatedAt?: Date;
}

export interface CreateCardInput {
  type: CardType;
  text: string;
  domain?: string[];
  priority?: CardPriority;
  tags?: string[];
  persona?: string;
}

export interface PromptAnalysis {
  intent: string;
  domains: string[];
  explicitPreferences: string[];  // statements that override stored memory locally
  keywords: string[];
}

export interface ScoredCard {
  card: MemoryCard;
  relevanceScore: number;
}

const nonBlank = z.string().min(1).refine((s) => s.trim().length > 0, 'must not be blank');

// Read schema: fields are checked, never rewritten
export const MemoryCardSchema: z.ZodType<MemoryCard, z.ZodTypeDef, unknown> = z.object({
  id: nonBlank,
  type: z.enum(CARD_TYPES),
  text: nonBlank,
  domain: z.array(z.string()).default([]),
  priority: z.enum(CARD_PRIORITIES).default('soft'),
  tags: z.array(z.string()).default([]),
  persona: nonBlank.default(DEFAULT_PERSONA),
  createdAt: z.coerce.date().default(() => new Date(0)),
  updatedAt: z.coerce.date().optional(),
});

export const CreateCardInputSchema = z.object({
  type: z.enum(CARD_TYPES),
  text: z.string().trim().min(1).max(2000),
  domain: z.array(z.string().trim().min(1)).default([]),
  priority: z.enum(CARD_PRIORITIES).default('soft'),
  tags: z.array(z.string().trim().min(1)).default([]),
  persona: z.string().trim().min(1).default(DEFAULT_PERSONA),
});

export type NormalizedCardInput = z.infer<typeof CreateCardInputSchema>;

export function hasTag(card: Pick<MemoryCard, 'tags'>, tag: string): boolean {
  return card.tags.includes(tag);
}

export function isProfileCard(card: Pick<MemoryCard, 'tags'>): boolean {
  return hasTag(card, PROFILE_TAG);
}

export function isExtractedCard(card: Pick<MemoryCard, 'tags'>): boolean {
  return hasTag(card, EXTRACTED_TAG);
}

export function isCardType(value: string): value is CardType {
  return CARD_TYPES.some((type) => type === value);
}

/**
 * Contradiction rule tables.
 *
 * A rule fires when the card under test contains one of `subjectPhrases` and
 * the text it is compared with contains one of `opposingPhrases`. Matching is
 * a case-insensitive substring test. Tables are evaluated in order; add a new
 * axis by appending a rule.
 */

export type ConflictAxis =
  | 'price-quality'
  | 'options-quantity'
  | 'health-taste'
  | 'durability'
  | 'brand-loyalty'
  | 'planning';

export interface ContradictionRule {
  axis: ConflictAxis;
  subjectPhrases: readonly string[];
  opposingPhrases: readonly string[];
}

/**
 * Card text vs the draft prompt (or an explicit preference stated in it).
 *
 * Ranking statements such as "quality over price" are left to arbitration;
 * this table only vetoes cards that assert the opposite of what the prompt
 * asks for.
 */
export const PROMPT_CONTRADICTION_RULES: readonly ContradictionRule[] = [
  {
    axis: 'price-quality',
    subjectPhrases: ['expensive', 'premium', 'luxury', 'high-end'],
    opposingPhrases: ['cheapest', 'budget', 'affordable', 'cheap', 'save money'],
  },
  {
    axis: 'price-quality',
    subjectPhrases: ['cheap', 'budget', 'inexpensive', 'affordable', 'lowest price'],
    opposingPhrases: ['premium', 'luxury', 'best quality', 'money is no object', "price doesn't matter"],
  },
  {
    axis: 'options-quantity',
    subjectPhrases: ['few options', 'curated', 'best options picked'],
    opposingPhrases: ['many options', 'lots of choices', 'browse', 'show me everything', 'all options'],
  },
  {
    axis: 'options-quantity',
    subjectPhrases: ['browsing lots', 'many alternatives', 'explore options'],
    opposingPhrases: ['just pick one', 'best option', 'recommend one', "don't show me many"],
  },
  {
    axis: 'health-taste',
    subjectPhrases: ['health', 'nutrition', 'healthy'],
    opposingPhrases: ['taste', 'comfort food', 'indulgent', 'delicious', 'tasty'],
  },
  {
    axis: 'health-taste',
    subjectPhrases: ['taste', 'comfort', 'indulgent'],
    opposingPhrases: ['healthy', 'nutritious', 'diet', 'low calorie'],
  },
  {
    axis: 'durability',
    subjectPhrases: ['durable', 'long-lasting', 'quality'],
    opposingPhrases: ['disposable', 'temporary', 'short-term', 'one-time use'],
  },
  {
    axis: 'brand-loyalty',
    subjectPhrases: ['brand loyal', 'stick to brands', 'same brands'],
    opposingPhrases: ['try new', 'different brands', 'alternatives', 'variety'],
  },
  {
    axis: 'planning',
    subjectPhrases: ['plans ahead', 'decides before', 'planned'],
    opposingPhrases: ['spontaneous', 'browse', 'discover', 'just looking'],
  },
];

/**
 * Extracted card (subject) vs an answered profile card (opposing).
 */
export const ARBITRATION_RULES: readonly ContradictionRule[] = [
  {
    axis: 'price-quality',
    subjectPhrases: ['cheapest', 'cheap', 'budget', 'goal cheap'],
    opposingPhrases: ['quality over', 'prioritizes quality', 'not the cheapest'],
  },
  {
    axis: 'options-quantity',
    subjectPhrases: ['lots', 'many'],
    opposingPhrases: ['few', 'curated'],
  },
];

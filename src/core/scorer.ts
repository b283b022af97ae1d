import type { MemoryCard, PromptAnalysis } from '../cards/types.js';
import { isExtractedCard, isProfileCard } from '../cards/types.js';
import { PROMPT_STOPWORDS, contentWords, tokenizeWords } from './text.js';

export interface RelevanceWeights {
  profileBoost: number;
  domainOverlap: number;
  conversationalDomainBonus: number;
  lexicalMatchPerWord: number;
  lexicalMatchCap: number;
  keywordMatchPerWord: number;
  keywordMatchCap: number;
  constraintBonus: number;
  hardConstraintBonus: number;
  extractedDamping: number;
}

// Empirical constants. Not calibrated against usage data yet.
export const RELEVANCE_WEIGHTS: Readonly<RelevanceWeights> = {
  profileBoost: 0.3,
  domainOverlap: 0.4,
  conversationalDomainBonus: 0.35,
  lexicalMatchPerWord: 0.45,
  lexicalMatchCap: 0.8,
  keywordMatchPerWord: 0.08,
  keywordMatchCap: 0.25,
  constraintBonus: 0.2,
  hardConstraintBonus: 0.15,
  extractedDamping: 0.9,
};

// Style cards apply to every interaction, whatever the prompt is about
export const CONVERSATIONAL_DOMAINS: ReadonlySet<string> = new Set(['communication', 'personality']);

export interface ScoreBreakdown {
  profile: number;
  domainOverlap: number;
  conversational: number;
  lexical: number;
  lexicalMatches: string[];
  keyword: number;
  keywordMatches: string[];
  typePriority: number;
  dampingFactor: number;
  total: number;
}

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Per-signal contributions for one card. `total` is what `scoreCard` returns.
 *
 * Signals add up and saturate at 1.0; the extracted-card damping is applied to
 * the clamped sum so a mined card never ties a confirmed one at saturation.
 */
export function explainScore(
  card: MemoryCard,
  analysis: PromptAnalysis,
  promptText: string,
  weights: Readonly<RelevanceWeights> = RELEVANCE_WEIGHTS
): ScoreBreakdown {
  const profile = isProfileCard(card);
  const cardText = card.text.toLowerCase();

  const cardDomains = new Set(card.domain.map((d) => d.toLowerCase()));
  const promptDomains = new Set(analysis.domains.map((d) => d.toLowerCase()));
  let overlap = 0;
  for (const domain of cardDomains) {
    if (promptDomains.has(domain)) overlap++;
  }
  const domainOverlap = overlap > 0
    ? weights.domainOverlap * (overlap / Math.max(cardDomains.size, 1))
    : 0;

  const conversational = [...cardDomains].some((d) => CONVERSATIONAL_DOMAINS.has(d))
    ? weights.conversationalDomainBonus
    : 0;

  // Substring test so "pans" hits "cast iron pans," and "iron" hits "cast iron"
  const lexicalMatches = contentWords(promptText, PROMPT_STOPWORDS, 3)
    .filter((word) => cardText.includes(word));
  const lexical = lexicalMatches.length > 0
    ? Math.min(weights.lexicalMatchCap, weights.lexicalMatchPerWord * lexicalMatches.length)
    : 0;

  const cardWords = new Set(tokenizeWords(card.text));
  const keywordMatches = [...new Set(analysis.keywords.map((k) => k.toLowerCase()))]
    .filter((keyword) => cardWords.has(keyword));
  const keyword = keywordMatches.length > 0
    ? Math.min(weights.keywordMatchCap, weights.keywordMatchPerWord * keywordMatches.length)
    : 0;

  let typePriority = 0;
  if (card.type === 'constraint') {
    typePriority += weights.constraintBonus;
    if (card.priority === 'hard') typePriority += weights.hardConstraintBonus;
  }

  const profileBoost = profile ? weights.profileBoost : 0;
  const dampingFactor = isExtractedCard(card) && !profile ? weights.extractedDamping : 1;

  const sum = profileBoost + domainOverlap + conversational + lexical + keyword + typePriority;
  const total = clampScore(clampScore(sum) * dampingFactor);

  return {
    profile: profileBoost,
    domainOverlap,
    conversational,
    lexical,
    lexicalMatches,
    keyword,
    keywordMatches,
    typePriority,
    dampingFactor,
    total,
  };
}

export function scoreCard(
  card: MemoryCard,
  analysis: PromptAnalysis,
  promptText: string,
  weights: Readonly<RelevanceWeights> = RELEVANCE_WEIGHTS
): number {
  return explainScore(card, analysis, promptText, weights).total;
}

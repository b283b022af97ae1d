/**
 * Keyword-based prompt analysis.
 *
 * Synchronous and side-effect free: this is what selection runs on when no
 * model is configured or the model call fails.
 */

import type { PromptAnalysis } from '../cards/types.js';
import { tokenizeWords, uniqueInOrder } from '../core/text.js';
import type { PromptAnalyzer } from './types.js';

export const DOMAIN_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  shopping: [
    'buy', 'purchase', 'price', 'cost', 'store', 'shop', 'product', 'brand', 'deal',
    'discount', 'order', 'amazon', 'review', 'rating', 'cheap', 'expensive', 'quality',
    'return', 'refund',
  ],
  eating: [
    'eat', 'food', 'restaurant', 'meal', 'cook', 'recipe', 'dinner', 'lunch', 'breakfast',
    'snack', 'hungry', 'cuisine', 'diet', 'taste', 'delicious',
  ],
  health: [
    'health', 'fitness', 'exercise', 'workout', 'gym', 'doctor', 'medical', 'symptom',
    'medicine', 'sleep', 'weight', 'nutrition', 'vitamin', 'supplement',
  ],
  work: [
    'work', 'job', 'project', 'meeting', 'deadline', 'email', 'colleague', 'office', 'code',
    'programming', 'finance', 'budget', 'career', 'boss', 'salary',
  ],
};

// Always relevant: they shape how the answer is written
export const STYLE_DOMAINS = ['communication', 'personality'] as const;

export const FALLBACK_INTENT = 'user request';

export function detectDomains(promptText: string): string[] {
  const lower = promptText.toLowerCase();
  const domains = Object.entries(DOMAIN_KEYWORDS)
    .filter(([, keywords]) => keywords.some((keyword) => lower.includes(keyword)))
    .map(([domain]) => domain);

  if (domains.length === 0) domains.push('general');
  domains.push(...STYLE_DOMAINS);

  return uniqueInOrder(domains);
}

export function fallbackPromptAnalysis(promptText: string): PromptAnalysis {
  return {
    intent: FALLBACK_INTENT,
    domains: detectDomains(promptText),
    explicitPreferences: [],
    keywords: uniqueInOrder(tokenizeWords(promptText).filter((word) => word.length > 3)),
  };
}

export class KeywordPromptAnalyzer implements PromptAnalyzer {
  readonly name = 'keyword';

  async analyze(promptText: string): Promise<PromptAnalysis> {
    return fallbackPromptAnalysis(promptText);
  }
}

import { containsAny } from './text.js';
import { PROMPT_CONTRADICTION_RULES, type ContradictionRule } from './rules.js';

export interface RuleMatch {
  rule: ContradictionRule;
  subjectPhrase: string;
  opposingPhrase: string;
}

export interface PromptConflict extends RuleMatch {
  source: 'prompt' | 'explicit_preference';
  sourceText: string;
}

/**
 * First rule in table order whose two sides are both present
 */
export function findContradiction(
  subjectText: string,
  opposingText: string,
  rules: readonly ContradictionRule[]
): RuleMatch | undefined {
  for (const rule of rules) {
    const subjectPhrase = containsAny(subjectText, rule.subjectPhrases);
    if (subjectPhrase === undefined) continue;

    const opposingPhrase = containsAny(opposingText, rule.opposingPhrases);
    if (opposingPhrase !== undefined) {
      return { rule, subjectPhrase, opposingPhrase };
    }
  }

  return undefined;
}

/**
 * Check a card against the prompt, then against each explicit preference
 * with the card side fixed.
 */
export function findPromptConflict(
  cardText: string,
  promptText: string,
  explicitPreferences: readonly string[] = [],
  rules: readonly ContradictionRule[] = PROMPT_CONTRADICTION_RULES
): PromptConflict | undefined {
  const promptMatch = findContradiction(cardText, promptText, rules);
  if (promptMatch) {
    return { ...promptMatch, source: 'prompt', sourceText: promptText };
  }

  for (const preference of explicitPreferences) {
    const match = findContradiction(cardText, preference, rules);
    if (match) {
      return { ...match, source: 'explicit_preference', sourceText: preference };
    }
  }

  return undefined;
}

export function conflictsWithPrompt(
  cardText: string,
  promptText: string,
  explicitPreferences: readonly string[] = [],
  rules: readonly ContradictionRule[] = PROMPT_CONTRADICTION_RULES
): boolean {
  return findPromptConflict(cardText, promptText, explicitPreferences, rules) !== undefined;
}

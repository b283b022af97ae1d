import type { MemoryCard, ScoredCard } from '../cards/types.js';
import { isExtractedCard, isProfileCard } from '../cards/types.js';
import { findContradiction, type RuleMatch } from './contradictions.js';
import { ARBITRATION_RULES, type ContradictionRule } from './rules.js';

export interface ArbitrationDrop {
  dropped: ScoredCard;
  winner: MemoryCard;
  match: RuleMatch;
}

export interface ArbitrationResult {
  kept: ScoredCard[];
  dropped: ArbitrationDrop[];
}

/**
 * Resolve card-vs-card conflicts on a score-ordered list.
 *
 * Answered profile cards always stay. An extracted card that contradicts any
 * profile card in the list is dropped. This is a filter: the input order is
 * preserved.
 */
export function arbitrateWithReport(
  scored: readonly ScoredCard[],
  rules: readonly ContradictionRule[] = ARBITRATION_RULES
): ArbitrationResult {
  const profileCards = scored.filter((s) => isProfileCard(s.card)).map((s) => s.card);
  const kept: ScoredCard[] = [];
  const dropped: ArbitrationDrop[] = [];

  for (const entry of scored) {
    const { card } = entry;

    if (isProfileCard(card) || !isExtractedCard(card)) {
      kept.push(entry);
      continue;
    }

    let drop: ArbitrationDrop | undefined;
    for (const profileCard of profileCards) {
      const match = findContradiction(card.text, profileCard.text, rules);
      if (match) {
        drop = { dropped: entry, winner: profileCard, match };
        break;
      }
    }

    if (drop) {
      dropped.push(drop);
    } else {
      kept.push(entry);
    }
  }

  return { kept, dropped };
}

export function arbitrate(
  scored: readonly ScoredCard[],
  rules: readonly ContradictionRule[] = ARBITRATION_RULES
): ScoredCard[] {
  return arbitrateWithReport(scored, rules).kept;
}

import type { MemoryCard } from './types.js';

/**
 * Source of truth for candidate cards. Returns every card of a persona in a
 * stable order; that order breaks score ties.
 */
export interface CardRepository {
  getCards(persona: string, domainFilter?: string): MemoryCard[];
}

/**
 * Supplementary relatedness lookup by tag. Results are hints only.
 */
export interface TagSearch {
  relatedCardIdsByTags(tags: readonly string[], persona: string, limit: number): Promise<string[]>;
}

export function matchesDomainFilter(card: Pick<MemoryCard, 'domain'>, domainFilter?: string): boolean {
  if (!domainFilter) return true;
  const needle = domainFilter.toLowerCase();
  return card.domain.some((domain) => domain.toLowerCase().includes(needle));
}

/**
 * Repository over a fixed list, mostly for tests and one-off packs
 */
export class InMemoryCardRepository implements CardRepository {
  constructor(private cards: readonly MemoryCard[]) {}

  getCards(persona: string, domainFilter?: string): MemoryCard[] {
    return this.cards.filter(
      (card) => card.persona === persona && matchesDomainFilter(card, domainFilter)
    );
  }
}

import type { TagSearch } from './repository.js';

export interface TagIndexSource {
  getTagIndex(persona: string): Array<{ cardId: string; tag: string }>;
}

export interface TagMatch {
  cardId: string;
  matchedTags: string[];
  relevance: number;  // matched search tags / search tags
}

/**
 * Rank cards by how many search tags relate to their own tags. A search tag
 * relates to a card tag when either contains the other, ignoring case.
 */
export function rankCardsByTags(
  index: ReadonlyArray<{ cardId: string; tag: string }>,
  searchTags: readonly string[],
  limit: number
): TagMatch[] {
  const needles = [...new Set(searchTags.map((tag) => tag.trim().toLowerCase()).filter(Boolean))];
  if (needles.length === 0 || limit <= 0) return [];

  const cardTags = new Map<string, string[]>();
  for (const { cardId, tag } of index) {
    const list = cardTags.get(cardId) ?? [];
    list.push(tag.toLowerCase());
    cardTags.set(cardId, list);
  }

  const matches: TagMatch[] = [];
  for (const [cardId, tags] of cardTags) {
    const matchedTags = needles.filter((needle) =>
      tags.some((tag) => tag.includes(needle) || needle.includes(tag))
    );
    if (matchedTags.length > 0) {
      matches.push({ cardId, matchedTags, relevance: matchedTags.length / needles.length });
    }
  }

  return matches
    .sort((a, b) => b.relevance - a.relevance)
    .slice(0, limit);
}

/**
 * Tag search over the card store's tag table
 */
export class StoreTagSearch implements TagSearch {
  constructor(private source: TagIndexSource) {}

  async relatedCardIdsByTags(tags: readonly string[], persona: string, limit: number): Promise<string[]> {
    return rankCardsByTags(this.source.getTagIndex(persona), tags, limit).map((match) => match.cardId);
  }
}

import { describe, it, expect } from 'vitest';
import { StoreTagSearch, rankCardsByTags } from '../../src/cards/tag-search.js';

const index = [
  { cardId: 'a', tag: 'cookware' },
  { cardId: 'a', tag: 'Shopping' },
  { cardId: 'b', tag: 'shopping' },
  { cardId: 'c', tag: 'travel' },
];

describe('rankCardsByTags', () => {
  it('ranks by the share of search tags matched', () => {
    expect(rankCardsByTags(index, ['shopping', 'cook'], 10)).toEqual([
      { cardId: 'a', matchedTags: ['shopping', 'cook'], relevance: 1 },
      { cardId: 'b', matchedTags: ['shopping'], relevance: 0.5 },
    ]);
  });

  it('matches when either tag contains the other', () => {
    expect(rankCardsByTags(index, ['travelling'], 10).map((m) => m.cardId)).toEqual(['c']);
  });

  it('dedupes search tags and honors the limit', () => {
    const matches = rankCardsByTags(index, ['SHOPPING', 'shopping '], 1);
    expect(matches).toEqual([{ cardId: 'a', matchedTags: ['shopping'], relevance: 1 }]);
  });

  it('returns nothing for empty input', () => {
    expect(rankCardsByTags(index, [], 10)).toEqual([]);
    expect(rankCardsByTags(index, ['shopping'], 0)).toEqual([]);
  });
});

describe('StoreTagSearch', () => {
  it('returns card ids from the persona index', async () => {
    const personas: string[] = [];
    const search = new StoreTagSearch({
      getTagIndex: (persona) => {
        personas.push(persona);
        return index;
      },
    });

    await expect(search.relatedCardIdsByTags(['travel'], 'Personal', 5)).resolves.toEqual(['c']);
    expect(personas).toEqual(['Personal']);
  });
});

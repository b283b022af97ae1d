import { describe, it, expect } from 'vitest';
import { arbitrate, arbitrateWithReport } from '../../src/core/arbiter.js';
import type { MemoryCard, ScoredCard } from '../../src/cards/types.js';

function scored(id: string, text: string, tags: string[], relevanceScore = 0.8): ScoredCard {
  const card: MemoryCard = {
    id,
    type: 'preference',
    text,
    domain: [],
    priority: 'soft',
    tags,
    persona: 'Personal',
    createdAt: new Date(0),
  };
  return { card, relevanceScore };
}

const qualityProfile = scored('p1', 'User prioritizes quality over price, not the cheapest option', ['profile'], 0.83);
const cheapExtracted = scored('e1', "User's goal: cheapest pans possible", ['extracted'], 0.9);

describe('arbitrate', () => {
  it('drops an extracted card that contradicts a profile card', () => {
    const untagged = scored('n1', 'Cheap fixes are fine', [], 0.6);
    const result = arbitrateWithReport([cheapExtracted, qualityProfile, untagged]);

    expect(result.kept.map((s) => s.card.id)).toEqual(['p1', 'n1']);
    expect(result.dropped).toHaveLength(1);
    expect(result.dropped[0].dropped.card.id).toBe('e1');
    expect(result.dropped[0].winner.id).toBe('p1');
    expect(result.dropped[0].match.rule.axis).toBe('price-quality');
  });

  it('resolves the options-quantity axis', () => {
    const kept = arbitrate([
      scored('p1', 'Prefers a few curated picks', ['profile']),
      scored('e1', 'Likes browsing lots of stores', ['extracted']),
    ]);
    expect(kept.map((s) => s.card.id)).toEqual(['p1']);
  });

  it('keeps extracted cards when no profile card is present', () => {
    const kept = arbitrate([cheapExtracted]);
    expect(kept).toEqual([cheapExtracted]);
  });

  it('treats a card tagged both ways as a profile card', () => {
    const both = scored('b1', 'Wants the cheapest pans', ['profile', 'extracted']);
    expect(arbitrate([qualityProfile, both]).map((s) => s.card.id)).toEqual(['p1', 'b1']);
  });

  it('never drops profile cards', () => {
    const kept = arbitrate([
      scored('p1', 'Prefers a few options', ['profile']),
      scored('p2', 'Likes lots of options', ['profile']),
    ]);
    expect(kept).toHaveLength(2);
  });

  it('accepts a custom rule table', () => {
    const kept = arbitrate(
      [qualityProfile, cheapExtracted],
      [{ axis: 'brand-loyalty', subjectPhrases: ['brand'], opposingPhrases: ['variety'] }]
    );
    expect(kept).toHaveLength(2);
  });

  it('returns an empty list for empty input', () => {
    expect(arbitrate([])).toEqual([]);
  });
});

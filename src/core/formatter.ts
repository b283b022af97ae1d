import type { CardType, MemoryCard } from '../cards/types.js';

export const PACK_HEADER = '--- PERSONAL CONTEXT ---';
export const PACK_FOOTER = '--- END PERSONAL CONTEXT ---';
export const HARD_MARKER = ' [HARD]';

// Emission order of the groups
const GROUPS: ReadonlyArray<{ type: CardType; heading: string }> = [
  { type: 'constraint', heading: 'CONSTRAINTS:' },
  { type: 'preference', heading: 'PREFERENCES:' },
  { type: 'goal', heading: 'GOALS:' },
  { type: 'capability', heading: 'CAPABILITIES:' },
];

export function selectTopCards<T>(ordered: readonly T[], maxCards: number): T[] {
  const limit = Math.max(0, Math.floor(maxCards));
  return ordered.slice(0, Math.min(ordered.length, limit));
}

export function formatCardLine(card: MemoryCard): string {
  const marker = card.type === 'constraint' && card.priority === 'hard' ? HARD_MARKER : '';
  return `• ${card.text}${marker}`;
}

/**
 * Render selected cards as the block prepended to a prompt.
 *
 * Grouping is presentational: inside a group cards keep selection order.
 * No cards renders as the empty string.
 */
export function formatContextPack(cards: readonly MemoryCard[]): string {
  if (cards.length === 0) return '';

  const lines = [PACK_HEADER, ''];

  for (const group of GROUPS) {
    const members = cards.filter((card) => card.type === group.type);
    if (members.length === 0) continue;

    lines.push(group.heading);
    lines.push(...members.map(formatCardLine));
    lines.push('');
  }

  lines.push(PACK_FOOTER);
  return lines.join('\n');
}

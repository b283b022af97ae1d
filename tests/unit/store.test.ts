import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import Database from 'better-sqlite3';
import { CardStore } from '../../src/cards/store.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';

function tmpDb(): string {
  return path.join(os.tmpdir(), `cpack-test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

const T0 = new Date('2026-03-01T10:00:00.000Z');
const T1 = new Date('2026-03-02T10:00:00.000Z');

describe('CardStore', () => {
  let store: CardStore;
  let dbPath: string;
  let now: Date;

  beforeEach(() => {
    dbPath = tmpDb();
    now = T0;
    store = new CardStore(dbPath, { clock: () => now });
  });

  afterEach(() => {
    store.close();
    for (const suffix of ['', '-journal', '-wal', '-shm']) {
      try { fs.unlinkSync(dbPath + suffix); } catch { /* ignore */ }
    }
  });

  describe('addCard', () => {
    it('stores a card with defaults and returns it', () => {
      const card = store.addCard({ type: 'preference', text: '  Likes green tea  ' });

      expect(card.text).toBe('Likes green tea');
      expect(card.persona).toBe('Personal');
      expect(card.priority).toBe('soft');
      expect(card.createdAt).toEqual(T0);
      expect(store.getCard(card.id)).toEqual(card);
    });

    it('keeps domain and tag order', () => {
      const card = store.addCard({
        type: 'constraint',
        text: 'No peanuts',
        priority: 'hard',
        domain: ['eating', 'health'],
        tags: ['profile', 'allergy', 'food'],
      });

      const loaded = store.getCard(card.id);
      expect(loaded?.domain).toEqual(['eating', 'health']);
      expect(loaded?.tags).toEqual(['profile', 'allergy', 'food']);
      expect(loaded?.priority).toBe('hard');
    });

    it('rejects empty text', () => {
      expect(() => store.addCard({ type: 'goal', text: '   ' })).toThrow(ValidationError);
    });
  });

  describe('getCards', () => {
    it('returns a persona in insertion order', () => {
      const a = store.addCard({ type: 'preference', text: 'A' });
      store.addCard({ type: 'preference', text: 'W', persona: 'Work' });
      const b = store.addCard({ type: 'goal', text: 'B' });

      expect(store.getCards('Personal').map((c) => c.id)).toEqual([a.id, b.id]);
      expect(store.getCards('Nobody')).toEqual([]);
    });

    it('filters by domain substring', () => {
      store.addCard({ type: 'preference', text: 'Tea', domain: ['eating'] });
      const shoe = store.addCard({ type: 'preference', text: 'Shoes', domain: ['Shopping'] });

      expect(store.getCards('Personal', 'shop').map((c) => c.id)).toEqual([shoe.id]);
    });

    it('skips rows that no longer validate', () => {
      const good = store.addCard({ type: 'preference', text: 'Good' });
      const bad = store.addCard({ type: 'preference', text: 'Bad' });

      const raw = new Database(dbPath);
      raw.prepare("UPDATE memory_cards SET domain = 'not json' WHERE id = ?").run(bad.id);
      raw.close();

      expect(store.getCards('Personal').map((c) => c.id)).toEqual([good.id]);
    });
  });

  describe('replaceCard', () => {
    it('replaces content and keeps id and creation time', () => {
      const card = store.addCard({ type: 'preference', text: 'Old', tags: ['extracted'] });
      now = T1;

      const replaced = store.replaceCard(card.id, { type: 'goal', text: 'New', tags: ['profile'] });

      expect(replaced.id).toBe(card.id);
      expect(replaced.createdAt).toEqual(T0);
      expect(replaced.updatedAt).toEqual(T1);
      expect(store.getCard(card.id)?.tags).toEqual(['profile']);
      expect(store.getCard(card.id)?.type).toBe('goal');
    });

    it('throws NotFoundError for unknown ids', () => {
      expect(() => store.replaceCard('missing', { type: 'goal', text: 'x' })).toThrow(NotFoundError);
    });
  });

  describe('deleteCard', () => {
    it('removes the card and its tags', () => {
      const card = store.addCard({ type: 'preference', text: 'Tea', tags: ['drink'] });

      expect(store.deleteCard(card.id)).toBe(true);
      expect(store.getCard(card.id)).toBeNull();
      expect(store.getTagIndex('Personal')).toEqual([]);
      expect(store.deleteCard(card.id)).toBe(false);
    });
  });

  describe('importCards', () => {
    it('is all or nothing', () => {
      expect(() => store.importCards([
        { type: 'preference', text: 'One' },
        { type: 'preference', text: '' },
      ])).toThrow(ValidationError);
      expect(store.getCards('Personal')).toEqual([]);

      const imported = store.importCards([
        { type: 'preference', text: 'One' },
        { type: 'goal', text: 'Two' },
      ]);
      expect(store.getCards('Personal').map((c) => c.id)).toEqual(imported.map((c) => c.id));
    });
  });

  describe('listCards', () => {
    it('filters by persona, type and tag with a limit', () => {
      store.addCard({ type: 'preference', text: 'A', tags: ['profile'] });
      store.addCard({ type: 'goal', text: 'B', tags: ['extracted'] });
      store.addCard({ type: 'preference', text: 'C', tags: ['extracted'], persona: 'Work' });

      expect(store.listCards({ type: 'preference' }).map((c) => c.text)).toEqual(['A', 'C']);
      expect(store.listCards({ tag: 'extracted' }).map((c) => c.text)).toEqual(['B', 'C']);
      expect(store.listCards({ persona: 'Work' }).map((c) => c.text)).toEqual(['C']);
      expect(store.listCards({ limit: 1 }).map((c) => c.text)).toEqual(['A']);
    });
  });

  describe('getTagIndex', () => {
    it('lists tags of a persona in card order', () => {
      const a = store.addCard({ type: 'preference', text: 'A', tags: ['x', 'y'] });
      store.addCard({ type: 'preference', text: 'W', tags: ['z'], persona: 'Work' });

      expect(store.getTagIndex('Personal')).toEqual([
        { cardId: a.id, tag: 'x' },
        { cardId: a.id, tag: 'y' },
      ]);
    });
  });

  describe('getStats', () => {
    it('counts cards by type and provenance', () => {
      store.addCard({ type: 'preference', text: 'A', tags: ['profile'] });
      store.addCard({ type: 'goal', text: 'B', tags: ['extracted'] });
      store.addCard({ type: 'goal', text: 'C', persona: 'Work' });

      expect(store.getStats()).toEqual({
        totalCards: 3,
        byType: { constraint: 0, preference: 1, goal: 2, capability: 0 },
        personas: ['Personal', 'Work'],
        profileCards: 1,
        extractedCards: 1,
      });
    });
  });

  it('persists across reopen', () => {
    const card = store.addCard({ type: 'capability', text: 'Speaks French' });
    store.close();

    store = new CardStore(dbPath);
    expect(store.getCard(card.id)?.text).toBe('Speaks French');
  });
});

import * as fs from 'fs';
import Database from 'better-sqlite3';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { matchesDomainFilter, type CardRepository } from './repository.js';
import {
  CreateCardInputSchema,
  MemoryCardSchema,
  isExtractedCard,
  isProfileCard,
  type CardType,
  type CreateCardInput,
  type MemoryCard,
} from './types.js';
import { StoreError, ValidationError, NotFoundError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

const CardRowSchema = z.object({
  id: z.string(),
  type: z.string(),
  text: z.string(),
  domain: z.string(),
  priority: z.string(),
  persona: z.string(),
  created_at: z.string(),
  updated_at: z.string().nullable(),
});

const TagRowSchema = z.object({
  card_id: z.string(),
  tag: z.string(),
});

type CardRow = z.infer<typeof CardRowSchema>;

export interface CardStats {
  totalCards: number;
  byType: Record<CardType, number>;
  personas: string[];
  profileCards: number;
  extractedCards: number;
}

export interface ListCardsOptions {
  persona?: string;
  type?: CardType;
  tag?: string;
  limit?: number;
}

export interface CardStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * SQLite-backed card storage. Insertion order (rowid) is the stable order
 * every read returns.
 */
export class CardStore implements CardRepository {
  private db: Database.Database;
  private logger: Logger;
  private clock: () => Date;

  constructor(dbPath: string, options: CardStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());

    try {
      this.db = new Database(dbPath);
    } catch (error) {
      throw new StoreError(`Cannot open card database at ${dbPath}: ${errorMessage(error)}`);
    }
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.runMigrations();

    if (dbPath !== ':memory:') {
      // Owner read/write only
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch (error) {
        this.logger.debug('Could not restrict database permissions', {
          path: dbPath,
          error: errorMessage(error),
        });
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare('SELECT name FROM migrations').pluck().all()
        .filter((name): name is string => typeof name === 'string')
    );

    if (!appliedMigrations.has('001_cards')) {
      this.db.exec(`
        CREATE TABLE memory_cards (
          id TEXT PRIMARY KEY,
          type TEXT NOT NULL,
          text TEXT NOT NULL,
          domain TEXT NOT NULL DEFAULT '[]',
          priority TEXT NOT NULL DEFAULT 'soft',
          persona TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT
        );

        CREATE TABLE card_tags (
          card_id TEXT NOT NULL REFERENCES memory_cards(id) ON DELETE CASCADE,
          position INTEGER NOT NULL,
          tag TEXT NOT NULL,
          PRIMARY KEY (card_id, position)
        );

        CREATE INDEX idx_cards_persona ON memory_cards(persona);
        CREATE INDEX idx_tags_tag ON card_tags(tag);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_cards');
    }
  }

  close(): void {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  addCard(input: CreateCardInput): MemoryCard {
    const normalized = this.normalize(input);
    const id = nanoid();
    const createdAt = this.clock();

    this.transaction(() => {
      this.db.prepare(`
        INSERT INTO memory_cards (id, type, text, domain, priority, persona, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        id,
        normalized.type,
        normalized.text,
        JSON.stringify(normalized.domain),
        normalized.priority,
        normalized.persona,
        createdAt.toISOString()
      );
      this.writeTags(id, normalized.tags);
    });

    return { id, ...normalized, createdAt };
  }

  /**
   * Insert many cards in one transaction; all or nothing
   */
  importCards(inputs: readonly CreateCardInput[]): MemoryCard[] {
    return this.transaction(() => inputs.map((input) => this.addCard(input)));
  }

  /**
   * Replace a card's content, keeping its id and creation time
   */
  replaceCard(id: string, input: CreateCardInput): MemoryCard {
    const existing = this.getCard(id);
    if (!existing) {
      throw new NotFoundError('Card', id);
    }

    const normalized = this.normalize(input);
    const updatedAt = this.clock();

    this.transaction(() => {
      this.db.prepare(`
        UPDATE memory_cards
        SET type = ?, text = ?, domain = ?, priority = ?, persona = ?, updated_at = ?
        WHERE id = ?
      `).run(
        normalized.type,
        normalized.text,
        JSON.stringify(normalized.domain),
        normalized.priority,
        normalized.persona,
        updatedAt.toISOString(),
        id
      );
      this.db.prepare('DELETE FROM card_tags WHERE card_id = ?').run(id);
      this.writeTags(id, normalized.tags);
    });

    return { id, ...normalized, createdAt: existing.createdAt, updatedAt };
  }

  deleteCard(id: string): boolean {
    const result = this.db.prepare('DELETE FROM memory_cards WHERE id = ?').run(id);
    return result.changes > 0;
  }

  getCard(id: string): MemoryCard | null {
    const row = this.db.prepare('SELECT * FROM memory_cards WHERE id = ?').get(id);
    if (row === undefined) return null;
    return this.hydrate([row])[0] ?? null;
  }

  getCards(persona: string, domainFilter?: string): MemoryCard[] {
    const rows = this.db.prepare(`
      SELECT * FROM memory_cards WHERE persona = ? ORDER BY rowid
    `).all(persona);

    return this.hydrate(rows).filter((card) => matchesDomainFilter(card, domainFilter));
  }

  listCards(options: ListCardsOptions = {}): MemoryCard[] {
    const { persona, type, tag, limit = 100 } = options;

    let sql = 'SELECT * FROM memory_cards WHERE 1=1';
    const params: (string | number)[] = [];

    if (persona) {
      sql += ' AND persona = ?';
      params.push(persona);
    }

    if (type) {
      sql += ' AND type = ?';
      params.push(type);
    }

    if (tag) {
      sql += ' AND id IN (SELECT card_id FROM card_tags WHERE tag = ?)';
      params.push(tag);
    }

    sql += ' ORDER BY rowid LIMIT ?';
    params.push(limit);

    return this.hydrate(this.db.prepare(sql).all(...params));
  }

  listPersonas(): string[] {
    return this.db.prepare('SELECT DISTINCT persona FROM memory_cards ORDER BY persona')
      .pluck()
      .all()
      .filter((persona): persona is string => typeof persona === 'string');
  }

  /**
   * Every (card, tag) pair of a persona, in card order
   */
  getTagIndex(persona: string): Array<{ cardId: string; tag: string }> {
    const rows = this.db.prepare(`
      SELECT t.card_id, t.tag
      FROM card_tags t
      JOIN memory_cards c ON c.id = t.card_id
      WHERE c.persona = ?
      ORDER BY c.rowid, t.position
    `).all(persona);

    return rows.flatMap((row) => {
      const parsed = TagRowSchema.safeParse(row);
      return parsed.success ? [{ cardId: parsed.data.card_id, tag: parsed.data.tag }] : [];
    });
  }

  getStats(): CardStats {
    const byType: Record<CardType, number> = { constraint: 0, preference: 0, goal: 0, capability: 0 };
    const cards = this.listCards({ limit: Number.MAX_SAFE_INTEGER });

    let profileCards = 0;
    let extractedCards = 0;
    for (const card of cards) {
      byType[card.type]++;
      if (isProfileCard(card)) profileCards++;
      if (isExtractedCard(card)) extractedCards++;
    }

    return {
      totalCards: cards.length,
      byType,
      personas: this.listPersonas(),
      profileCards,
      extractedCards,
    };
  }

  private normalize(input: CreateCardInput) {
    const parsed = CreateCardInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid card',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private writeTags(cardId: string, tags: readonly string[]): void {
    const insert = this.db.prepare('INSERT INTO card_tags (card_id, position, tag) VALUES (?, ?, ?)');
    tags.forEach((tag, position) => insert.run(cardId, position, tag));
  }

  private tagsFor(ids: readonly string[]): Map<string, string[]> {
    const tags = new Map<string, string[]>();
    if (ids.length === 0) return tags;

    const placeholders = ids.map(() => '?').join(',');
    const rows = this.db.prepare(`
      SELECT card_id, tag FROM card_tags
      WHERE card_id IN (${placeholders})
      ORDER BY card_id, position
    `).all(...ids);

    for (const row of rows) {
      const parsed = TagRowSchema.safeParse(row);
      if (!parsed.success) continue;
      const list = tags.get(parsed.data.card_id) ?? [];
      list.push(parsed.data.tag);
      tags.set(parsed.data.card_id, list);
    }

    return tags;
  }

  /**
   * Turn raw rows into cards; rows that no longer validate are skipped
   */
  private hydrate(rows: readonly unknown[]): MemoryCard[] {
    const parsedRows: CardRow[] = [];
    for (const row of rows) {
      const parsed = CardRowSchema.safeParse(row);
      if (parsed.success) parsedRows.push(parsed.data);
      else this.logger.warn('Skipping unreadable card row');
    }

    const tags = this.tagsFor(parsedRows.map((row) => row.id));
    const cards: MemoryCard[] = [];

    for (const row of parsedRows) {
      const card = MemoryCardSchema.safeParse({
        id: row.id,
        type: row.type,
        text: row.text,
        domain: parseJsonArray(row.domain),
        priority: row.priority,
        tags: tags.get(row.id) ?? [],
        persona: row.persona,
        createdAt: row.created_at,
        updatedAt: row.updated_at ?? undefined,
      });

      if (card.success) {
        cards.push(card.data);
      } else {
        this.logger.warn('Skipping malformed card', {
          id: row.id,
          issues: card.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
    }

    return cards;
  }
}

function parseJsonArray(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;  // not an array, so the row is reported as malformed
  }
}

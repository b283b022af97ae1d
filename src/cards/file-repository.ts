import * as fs from 'fs';
import { MemoryCardSchema, type MemoryCard } from './types.js';
import { matchesDomainFilter, type CardRepository } from './repository.js';
import { ParseError, StoreError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

/**
 * Pull the card list out of a parsed file: either a bare array or
 * `{ "cards": [...] }`
 */
export function cardRecordsFrom(document: unknown): unknown[] {
  if (Array.isArray(document)) return document;
  if (typeof document === 'object' && document !== null && 'cards' in document && Array.isArray(document.cards)) {
    return document.cards;
  }
  throw new ParseError('Expected an array of cards or an object with a "cards" array');
}

/**
 * Read-only repository over a JSON export. The file is read once, on first
 * use; malformed records are logged and left out.
 */
export class FileCardRepository implements CardRepository {
  private cards: MemoryCard[] | null = null;
  private logger: Logger;

  constructor(private filePath: string, logger: Logger = silentLogger) {
    this.logger = logger;
  }

  getCards(persona: string, domainFilter?: string): MemoryCard[] {
    return this.load().filter(
      (card) => card.persona === persona && matchesDomainFilter(card, domainFilter)
    );
  }

  private load(): MemoryCard[] {
    if (this.cards) return this.cards;

    let document: unknown;
    try {
      document = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new StoreError(`Cannot read cards from ${this.filePath}: ${errorMessage(error)}`);
    }

    const cards: MemoryCard[] = [];
    cardRecordsFrom(document).forEach((record, index) => {
      const parsed = MemoryCardSchema.safeParse(record);
      if (parsed.success) {
        cards.push(parsed.data);
      } else {
        this.logger.warn('Skipping malformed card in file', { path: this.filePath, index });
      }
    });

    this.cards = cards;
    return cards;
  }
}

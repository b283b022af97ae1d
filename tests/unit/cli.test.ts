import { describe, it, expect } from 'vitest';
import { logLevelFor, parseCardType, parseNumber, parseSensitivity, splitList } from '../../src/cli/run.js';
import { formatPackReport } from '../../src/cli/ui.js';
import type { ContextPack } from '../../src/core/context-pack.js';
import { ValidationError } from '../../src/errors.js';

const ANSI = /\u001b\[[0-9;]*m/g;

describe('option parsing', () => {
  it('parses numbers', () => {
    expect(parseNumber('0.25', 'min-relevance')).toBe(0.25);
    expect(() => parseNumber('', 'max-cards')).toThrow(ValidationError);
    expect(() => parseNumber('ten', 'max-cards')).toThrow("max-cards must be a number, got 'ten'");
  });

  it('parses sensitivity modes and card types', () => {
    expect(parseSensitivity('verbose')).toBe('verbose');
    expect(() => parseSensitivity('loud')).toThrow(ValidationError);
    expect(parseCardType('capability')).toBe('capability');
    expect(() => parseCardType('mood')).toThrow('type must be one of constraint, preference, goal, capability');
  });

  it('splits comma lists', () => {
    expect(splitList(' shopping, eating ,,')).toEqual(['shopping', 'eating']);
    expect(splitList(undefined)).toEqual([]);
  });

  it('maps verbosity flags to log levels', () => {
    expect(logLevelFor({ verbose: true })).toBe('debug');
    expect(logLevelFor({ quiet: true })).toBe('error');
    expect(logLevelFor({})).toBeUndefined();
  });
});

describe('formatPackReport', () => {
  it('lists used cards and exclusions', () => {
    const pack: ContextPack = {
      packText: 'ignored',
      usedCards: [
        {
          id: 'c1',
          type: 'preference',
          text: 'Quality first',
          domain: ['shopping'],
          priority: 'soft',
          relevanceScore: 0.834,
          tagSearchHit: true,
        },
      ],
      cardCount: 1,
      persona: 'Personal',
      sensitivityMode: 'quiet',
      generatedAt: '2026-01-02T03:04:05.000Z',
      analysis: { intent: 'user request', domains: ['shopping'], explicitPreferences: [], keywords: [] },
      conflicts: [
        { kind: 'arbitration', cardId: 'c2', cardText: 'Cheapest pans', axis: 'price-quality', winnerId: 'c1' },
        {
          kind: 'prompt',
          cardId: 'c3',
          cardText: 'Premium only',
          axis: 'price-quality',
          source: 'explicit_preference',
          sourceText: 'keep it cheap',
        },
      ],
      tagSearchHits: ['c1'],
    };

    expect(formatPackReport(pack).replace(ANSI, '').split('\n')).toEqual([
      'Persona      Personal',
      'Intent       user request',
      'Domains      shopping',
      'Cards used   1',
      '',
      '  83% preference Quality first (tag match)',
      '',
      'Excluded:',
      '  • Cheapest pans (price-quality: overridden by profile card c1)',
      '  • Premium only (price-quality: conflicts with "keep it cheap")',
    ]);
  });
});

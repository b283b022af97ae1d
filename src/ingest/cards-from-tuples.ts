import {
  DEFAULT_PERSONA,
  EXTRACTED_TAG,
  PROFILE_TAG,
  type CardType,
  type CreateCardInput,
} from '../cards/types.js';
import { uniqueInOrder } from '../core/text.js';
import type { SemanticTuple } from './tuples.js';

export type TupleCategory = 'Shopping' | 'Eating' | 'Health' | 'Work';
export type WorkSubcategory = 'Finance' | 'Coding' | 'Meetings' | 'Projects';

// Checked in order; the first category with a hit wins
const CATEGORY_KEYWORDS: ReadonlyArray<[TupleCategory, readonly string[]]> = [
  ['Shopping', ['shop', 'purchase', 'buy', 'product', 'shopping']],
  ['Eating', ['food', 'restaurant', 'meal', 'dining', 'diet', 'eating', 'cuisine']],
  ['Health', ['health', 'fitness', 'medical', 'exercise', 'wellness']],
  ['Work', ['work', 'project', 'code', 'finance', 'meeting', 'professional']],
];

const WORK_KEYWORDS: ReadonlyArray<[WorkSubcategory, readonly string[]]> = [
  ['Finance', ['finance', 'budget', 'money', 'cost', 'expense', 'financial']],
  ['Coding', ['code', 'programming', 'language', 'function', 'algorithm', 'coding', 'developer']],
  ['Meetings', ['meeting', 'call', 'schedule', 'calendar', 'appointment']],
];

// Words never worth a tag on an extracted card
const TAG_STOPWORDS: ReadonlySet<string> = new Set([
  'user', 'the', 'a', 'an', 'is', 'are', 'to', 'for', 'of', 'in', 'on', 'and', 'or',
  'likes', 'prefers', 'has_goal', 'avoids', 'wants',
]);

const MAX_CONTENT_TAGS = 5;

export function tupleToCardType(predicate: string): CardType {
  if (predicate.includes('CONSTRAINT')) return 'constraint';
  if (predicate.includes('GOAL')) return 'goal';
  return 'preference';
}

export function categorizeTuple(tuple: Pick<SemanticTuple, 'object' | 'objectType' | 'predicate'>): TupleCategory {
  const objectType = tuple.objectType.toLowerCase();
  const text = `${tuple.object} ${tuple.predicate}`.toLowerCase();

  const hit = CATEGORY_KEYWORDS.find(([, keywords]) =>
    keywords.some((keyword) => objectType.includes(keyword) || text.includes(keyword))
  );
  return hit ? hit[0] : 'Shopping';
}

export function workSubcategory(tuple: Pick<SemanticTuple, 'object' | 'predicate'>): WorkSubcategory {
  const text = `${tuple.object} ${tuple.predicate}`.toLowerCase();
  const hit = WORK_KEYWORDS.find(([, keywords]) => keywords.some((keyword) => text.includes(keyword)));
  return hit ? hit[0] : 'Projects';
}

export function tupleText(tuple: Pick<SemanticTuple, 'subject' | 'predicate' | 'object'>): string {
  return `${tuple.subject} ${tuple.predicate} ${tuple.object}`.trim();
}

function propertyWords(properties: SemanticTuple['properties']): string[] {
  const words: string[] = [];
  for (const value of Object.values(properties)) {
    const strings = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
    for (const item of strings) {
      words.push(...item.toLowerCase().split(/\s+/).filter(Boolean));
    }
  }
  return words;
}

/**
 * Card input for a tuple mined from conversation text. Extracted cards are
 * always soft and carry the `extracted` tag, so profile answers win over
 * them in arbitration.
 */
export function cardInputFromTuple(tuple: SemanticTuple, persona: string = DEFAULT_PERSONA): CreateCardInput {
  const category = categorizeTuple(tuple);
  const subcategory = category === 'Work' ? workSubcategory(tuple) : undefined;
  const text = tupleText(tuple);

  const domain = [category.toLowerCase()];
  if (subcategory) domain.push(subcategory.toLowerCase());

  const contentTags = text
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 3 && !TAG_STOPWORDS.has(word))
    .slice(0, MAX_CONTENT_TAGS);

  return {
    type: tupleToCardType(tuple.predicate),
    text,
    domain,
    priority: 'soft',
    tags: uniqueInOrder([EXTRACTED_TAG, ...domain, ...contentTags, ...propertyWords(tuple.properties)]),
    persona,
  };
}

export interface ProfileAnswerInput {
  text: string;
  type?: CardType;
  domain?: string[];
  semanticTags?: string[];
  persona?: string;
}

/**
 * Card input for an answered profile question
 */
export function profileCardInput(answer: ProfileAnswerInput): CreateCardInput {
  const domain = answer.domain && answer.domain.length > 0 ? answer.domain : ['general'];

  return {
    type: answer.type ?? 'preference',
    text: answer.text,
    domain,
    priority: 'soft',
    tags: uniqueInOrder([PROFILE_TAG, ...domain, ...(answer.semanticTags ?? [])]),
    persona: answer.persona ?? DEFAULT_PERSONA,
  };
}

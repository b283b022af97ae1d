/**
 * Semantic tuples: (subject, predicate, object) facts mined from free text
 * by a model, before they become extracted cards.
 */

import { z } from 'zod';
import { ParseError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export type TuplePropertyValue = string | number | boolean | null | string[];

export interface SemanticTuple {
  subject: string;
  subjectType: string;
  predicate: string;
  object: string;
  objectType: string;
  confidence: number;
  source: string;
  properties: Record<string, TuplePropertyValue>;
}

const PropertyValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.string()),
]);

// Wire shape a model returns; every field has the documented default
export const RawTupleSchema = z.object({
  subject: z.string().default('User'),
  subject_type: z.string().default('Person'),
  predicate: z.string().default('RELATES_TO'),
  object: z.string().default(''),
  object_type: z.string().default('Entity'),
  confidence: z.number().min(0).max(1).default(0.5),
  properties: z.record(PropertyValueSchema.catch(null)).default({}),
});

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function tupleList(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (typeof data === 'object' && data !== null) {
    if ('tuples' in data) {
      return Array.isArray(data.tuples) ? data.tuples : [];
    }
    return [data];
  }
  return [];
}

function spanBetween(content: string, open: string, close: string): string | undefined {
  const start = content.indexOf(open);
  const end = content.lastIndexOf(close);
  return start !== -1 && end > start ? content.slice(start, end + 1) : undefined;
}

/**
 * Pull a list of raw tuple records out of a model reply. Accepts fenced
 * JSON, a bare array, `{ "tuples": [...] }` or a single tuple object, and
 * falls back to the first bracketed span when the reply has prose around it.
 */
export function parseTupleResponse(content: string): unknown[] {
  const fenced = CODE_FENCE.exec(content);
  const body = (fenced?.[1] ?? content).trim();

  try {
    return tupleList(JSON.parse(body));
  } catch (error) {
    const array = spanBetween(body, '[', ']');
    if (array !== undefined) {
      try {
        return tupleList(JSON.parse(array));
      } catch {
        // try an object span next
      }
    }

    const object = spanBetween(body, '{', '}');
    if (object !== undefined) {
      try {
        const parsed: unknown = JSON.parse(object);
        return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? [parsed] : [];
      } catch {
        // reported below
      }
    }

    throw new ParseError(`No JSON tuples in model reply: ${errorMessage(error)}`, content);
  }
}

/**
 * Validate raw records into tuples. Entries that are not objects or carry
 * wrongly typed fields are skipped.
 */
export function toSemanticTuples(
  records: readonly unknown[],
  source: string,
  logger: Logger = silentLogger
): SemanticTuple[] {
  const tuples: SemanticTuple[] = [];

  records.forEach((record, index) => {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      logger.warn('Skipping tuple that is not an object', { index });
      return;
    }

    const parsed = RawTupleSchema.safeParse(record);
    if (!parsed.success) {
      logger.warn('Skipping invalid tuple', {
        index,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const raw = parsed.data;
    tuples.push({
      subject: raw.subject,
      subjectType: raw.subject_type,
      predicate: raw.predicate,
      object: raw.object,
      objectType: raw.object_type,
      confidence: raw.confidence,
      source,
      properties: raw.properties,
    });
  });

  return tuples;
}

import type { ModelAdapter } from '../adapters/index.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { parseTupleResponse, toSemanticTuples, type SemanticTuple } from './tuples.js';

export const EXTRACTION_SYSTEM_PROMPT = `You extract structured relationships from what a user says or does.

Output ONLY a JSON array of tuples. Each tuple has:
- subject: who or what is described, usually "User"
- subject_type: Person, Product, ...
- predicate: PREFERS, HAS_GOAL, HAS_CONSTRAINT, LIKES, DISLIKES, WANTS or AVOIDS
- object: the target entity
- object_type: Diet, Budget, Restaurant, Food, Product, ...
- confidence: 0.0 to 1.0, how certain the statement is
- properties: extra key-value details, if any

Example:
Input: "I want to keep grocery spending under 80 a week"
Output: [{"subject": "User", "subject_type": "Person", "predicate": "HAS_GOAL", "object": "Grocery budget 80 weekly", "object_type": "Budget", "confidence": 0.9, "properties": {"timeframe": "weekly"}}]`;

export interface TupleExtractorOptions {
  temperature?: number;
  logger?: Logger;
}

/**
 * Mines semantic tuples from free text. Adapters are tried in order; the
 * first one that returns at least one tuple wins.
 */
export class TupleExtractor {
  private logger: Logger;

  constructor(private adapters: readonly ModelAdapter[], private options: TupleExtractorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async extract(text: string, source: string = 'conversation'): Promise<SemanticTuple[]> {
    for (const adapter of this.adapters) {
      try {
        const response = await adapter.complete({
          messages: [
            { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
            { role: 'user', content: text },
          ],
          temperature: this.options.temperature ?? 0.1,
          maxTokens: 2000,
        });

        const tuples = toSemanticTuples(parseTupleResponse(response.content), source, this.logger);
        if (tuples.length > 0) {
          this.logger.info('Extracted tuples', { model: adapter.name, count: tuples.length });
          return tuples;
        }
        this.logger.warn('Model returned no tuples', { model: adapter.name });
      } catch (error) {
        this.logger.warn('Tuple extraction failed', { model: adapter.name, error: errorMessage(error) });
      }
    }

    this.logger.error('No model could extract tuples', { tried: this.adapters.length });
    return [];
  }
}

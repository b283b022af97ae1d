/**
 * Model-backed prompt analysis.
 *
 * Any failure (transport, non-JSON reply, wrong shape) falls back to the
 * keyword analysis, so `analyze` always resolves.
 */

import type { ModelAdapter, AdapterEnv } from '../adapters/index.js';
import { createAdapterFromString } from '../adapters/index.js';
import type { PromptAnalysis } from '../cards/types.js';
import type { AnalyzerConfig } from '../config/index.js';
import { ParseError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { KeywordPromptAnalyzer, fallbackPromptAnalysis } from './fallback.js';
import { ModelAnalysisSchema, fromModelAnalysis, type PromptAnalyzer } from './types.js';

export const ANALYSIS_SYSTEM_PROMPT = `You analyze a user's draft prompt before it is sent to an assistant.
Return a JSON object with these fields:
- "intent": one short phrase describing what the user wants
- "domains": the relevant domains, chosen from shopping, eating, health, work, communication, personality, general
- "explicit_preferences": preferences the user states directly in the prompt
- "keywords": the important words of the prompt

Return only the JSON object.`;

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match?.[1] ?? trimmed;
}

/**
 * Parse a model reply into an analysis; throws ParseError when it cannot
 */
export function parseAnalysisResponse(content: string): PromptAnalysis {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(content));
  } catch (error) {
    throw new ParseError(`Analysis reply is not JSON: ${errorMessage(error)}`, content);
  }

  const parsed = ModelAnalysisSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError('Analysis reply has the wrong shape', content);
  }
  return fromModelAnalysis(parsed.data);
}

export interface LlmPromptAnalyzerOptions {
  temperature?: number;
  logger?: Logger;
}

export class LlmPromptAnalyzer implements PromptAnalyzer {
  readonly name: string;
  private logger: Logger;

  constructor(private adapter: ModelAdapter, private options: LlmPromptAnalyzerOptions = {}) {
    this.name = adapter.name;
    this.logger = options.logger ?? silentLogger;
  }

  async analyze(promptText: string): Promise<PromptAnalysis> {
    try {
      const response = await this.adapter.complete({
        messages: [
          { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
          { role: 'user', content: promptText },
        ],
        temperature: this.options.temperature ?? 0.1,
        maxTokens: 512,
        responseFormat: 'json',
      });
      return parseAnalysisResponse(response.content);
    } catch (error) {
      this.logger.warn('Model analysis failed, using keyword analysis', {
        model: this.adapter.name,
        error: errorMessage(error),
      });
      return fallbackPromptAnalysis(promptText);
    }
  }
}

/**
 * Analyzer for the configured provider. A provider that cannot be set up
 * (missing key, bad model string) degrades to keyword analysis.
 */
export function createPromptAnalyzer(
  config: AnalyzerConfig,
  env: AdapterEnv = process.env,
  logger: Logger = silentLogger
): PromptAnalyzer {
  if (config.provider === 'keyword') {
    return new KeywordPromptAnalyzer();
  }

  try {
    const adapter = createAdapterFromString(`${config.provider}:${config.model}`, env);
    return new LlmPromptAnalyzer(adapter, { temperature: config.temperature, logger });
  } catch (error) {
    logger.warn('Analyzer unavailable, using keyword analysis', {
      provider: config.provider,
      error: errorMessage(error),
    });
    return new KeywordPromptAnalyzer();
  }
}

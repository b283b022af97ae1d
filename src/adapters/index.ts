/**
 * Model Adapters
 *
 * One completion interface over the supported providers.
 */

export * from './types.js';
export * from './ollama.js';
export * from './openai.js';
export * from './anthropic.js';

import type { ModelAdapter, FetchLike } from './types.js';
import { OllamaAdapter } from './ollama.js';
import { OpenAIAdapter } from './openai.js';
import { AnthropicAdapter } from './anthropic.js';
import { ValidationError } from '../errors.js';

export const DEFAULT_OLLAMA_HOST = 'http://127.0.0.1:11434';

export interface AdapterEnv {
  OPENAI_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
  OLLAMA_HOST?: string;
}

/**
 * Parse a model string like "ollama:llama3.2" or "openai:gpt-4o-mini"
 */
export function parseModelString(modelString: string): {
  provider: string;
  model: string;
} {
  const colonIndex = modelString.indexOf(':');

  if (colonIndex === -1) {
    // No provider prefix, default to ollama
    return { provider: 'ollama', model: modelString };
  }

  return {
    provider: modelString.slice(0, colonIndex),
    model: modelString.slice(colonIndex + 1),
  };
}

/**
 * Create a model adapter from a model string and environment
 */
export function createAdapterFromString(
  modelString: string,
  env: AdapterEnv = process.env,
  fetchImpl: FetchLike = fetch
): ModelAdapter {
  const { provider, model } = parseModelString(modelString);
  if (!model) {
    throw new ValidationError(`Model name missing in '${modelString}'`);
  }

  switch (provider) {
    case 'ollama':
      return new OllamaAdapter({ baseUrl: env.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST, model }, fetchImpl);

    case 'openai':
      if (!env.OPENAI_API_KEY) {
        throw new ValidationError('OPENAI_API_KEY environment variable required for OpenAI models');
      }
      return new OpenAIAdapter({ apiKey: env.OPENAI_API_KEY, model }, fetchImpl);

    case 'anthropic':
      if (!env.ANTHROPIC_API_KEY) {
        throw new ValidationError('ANTHROPIC_API_KEY environment variable required for Anthropic models');
      }
      return new AnthropicAdapter({ apiKey: env.ANTHROPIC_API_KEY, model }, fetchImpl);

    default:
      throw new ValidationError(`Unknown provider: ${provider}. Use ollama:, openai:, or anthropic:`);
  }
}

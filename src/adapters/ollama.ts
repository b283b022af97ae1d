/**
 * Ollama Model Adapter
 *
 * Connects to a local Ollama server, so prompt analysis can stay offline.
 */

import { z } from 'zod';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  OllamaConfig,
  FetchLike,
} from './types.js';
import { failedResponse, readJson } from './http.js';

const OllamaChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
  done: z.boolean().default(true),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'ollama';

  private baseUrl: string;
  private model: string;

  constructor(config: OllamaConfig, private fetchImpl: FetchLike = fetch) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
    this.name = `ollama:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages: request.messages,
        stream: false,
        format: request.responseFormat === 'json' ? 'json' : undefined,
        options: {
          temperature: request.temperature ?? 0.7,
          num_predict: request.maxTokens ?? 1024,
        },
      }),
    });

    if (!response.ok) {
      throw await failedResponse(response, this.provider);
    }

    const data = await readJson(response, OllamaChatResponseSchema, this.provider);
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      content: data.message.content,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      finishReason: data.done ? 'stop' : 'length',
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}

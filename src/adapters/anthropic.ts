/**
 * Anthropic Model Adapter
 */

import { z } from 'zod';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  AnthropicConfig,
  FetchLike,
  Message,
} from './types.js';
import { failedResponse, readJson } from './http.js';

const ANTHROPIC_API_VERSION = '2023-06-01';

// The messages API has no JSON mode; the instruction goes in the system prompt
const JSON_INSTRUCTION = 'Respond with a single JSON value and nothing else.';

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

export class AnthropicAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'anthropic';

  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(config: AnthropicConfig, private fetchImpl: FetchLike = fetch) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? 'https://api.anthropic.com/v1').replace(/\/$/, '');
    this.name = `anthropic:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const system = request.responseFormat === 'json'
      ? [systemPrompt, JSON_INSTRUCTION].filter(Boolean).join('\n\n')
      : systemPrompt;

    const response = await this.fetchImpl(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({
        model: this.model,
        max_tokens: request.maxTokens ?? 1024,
        system,
        messages,
        temperature: request.temperature ?? 0.7,
      }),
    });

    if (!response.ok) {
      throw await failedResponse(response, this.provider);
    }

    const data = await readJson(response, AnthropicResponseSchema, this.provider);

    const textContent = data.content
      .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
      .join('');

    return {
      content: textContent,
      usage: {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
        totalTokens: data.usage.input_tokens + data.usage.output_tokens,
      },
      finishReason: data.stop_reason === 'max_tokens' ? 'length' : 'stop',
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      // Minimal request to check the key
      const response = await this.fetchImpl(`${this.baseUrl}/messages`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          model: this.model,
          max_tokens: 1,
          messages: [{ role: 'user', content: 'Hi' }],
        }),
        signal: AbortSignal.timeout(10000),
      });

      return response.ok;
    } catch {
      return false;
    }
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-api-key': this.apiKey,
      'anthropic-version': ANTHROPIC_API_VERSION,
    };
  }

  /**
   * Anthropic takes the system prompt as a separate parameter
   */
  private splitSystemPrompt(messages: Message[]): {
    systemPrompt: string | undefined;
    messages: AnthropicMessage[];
  } {
    const system: string[] = [];
    const rest: AnthropicMessage[] = [];

    for (const message of messages) {
      if (message.role === 'system') system.push(message.content);
      else rest.push({ role: message.role, content: message.content });
    }

    return {
      systemPrompt: system.length > 0 ? system.join('\n\n') : undefined,
      messages: rest,
    };
  }
}

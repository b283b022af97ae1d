/**
 * Type definitions for model adapters
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON body where it supports that */
  responseFormat?: 'text' | 'json';
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Abstract model adapter interface
 */
export interface ModelAdapter {
  readonly name: string;
  readonly provider: string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Check if the adapter is properly configured and reachable
   */
  healthCheck(): Promise<boolean>;
}

/**
 * Configuration for different providers
 */
export interface OllamaConfig {
  baseUrl: string;
  model: string;
}

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export type AdapterConfig =
  | { provider: 'ollama'; config: OllamaConfig }
  | { provider: 'openai'; config: OpenAIConfig }
  | { provider: 'anthropic'; config: AnthropicConfig };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

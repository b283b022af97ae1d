import { describe, it, expect, vi } from 'vitest';
import { KeywordPromptAnalyzer, detectDomains, fallbackPromptAnalysis } from '../../src/analysis/fallback.js';
import {
  LlmPromptAnalyzer,
  createPromptAnalyzer,
  parseAnalysisResponse,
  stripCodeFence,
} from '../../src/analysis/llm-analyzer.js';
import type { CompletionRequest, CompletionResponse, ModelAdapter } from '../../src/adapters/types.js';
import { ParseError } from '../../src/errors.js';

function fakeAdapter(reply: (request: CompletionRequest) => Promise<string>) {
  const complete = vi.fn(async (request: CompletionRequest): Promise<CompletionResponse> => ({
    content: await reply(request),
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    finishReason: 'stop',
  }));
  const adapter = { name: 'fake:model', provider: 'fake', complete, healthCheck: async () => true };
  return adapter satisfies ModelAdapter;
}

describe('detectDomains', () => {
  it('detects domains from keywords in table order', () => {
    expect(detectDomains('Any good recipe for a cheap dinner?')).toEqual([
      'shopping', 'eating', 'communication', 'personality',
    ]);
  });

  it('falls back to general', () => {
    expect(detectDomains('tell me a story')).toEqual(['general', 'communication', 'personality']);
  });
});

describe('fallbackPromptAnalysis', () => {
  it('keeps distinct words longer than three letters', () => {
    expect(fallbackPromptAnalysis('Find me the cheapest pans, the CHEAPEST')).toEqual({
      intent: 'user request',
      domains: ['shopping', 'communication', 'personality'],
      explicitPreferences: [],
      keywords: ['find', 'cheapest', 'pans'],
    });
  });

  it('handles an empty prompt', () => {
    const analysis = fallbackPromptAnalysis('');
    expect(analysis.domains).toEqual(['general', 'communication', 'personality']);
    expect(analysis.keywords).toEqual([]);
  });

  it('backs the keyword analyzer', async () => {
    await expect(new KeywordPromptAnalyzer().analyze('plan a workout'))
      .resolves.toEqual(fallbackPromptAnalysis('plan a workout'));
  });
});

describe('parseAnalysisResponse', () => {
  it('maps the model fields', () => {
    const analysis = parseAnalysisResponse(JSON.stringify({
      intent: 'buy cookware',
      domains: ['shopping'],
      explicit_preferences: ['under 50 dollars'],
      keywords: ['pans'],
    }));
    expect(analysis).toEqual({
      intent: 'buy cookware',
      domains: ['shopping'],
      explicitPreferences: ['under 50 dollars'],
      keywords: ['pans'],
    });
  });

  it('accepts fenced replies and fills missing fields', () => {
    const analysis = parseAnalysisResponse('```json\n{"keywords": ["tea"]}\n```');
    expect(analysis).toEqual({
      intent: 'user request',
      domains: ['general', 'communication', 'personality'],
      explicitPreferences: [],
      keywords: ['tea'],
    });
  });

  it('uses default domains when the model sends a bad domain list', () => {
    expect(parseAnalysisResponse('{"domains": "shopping"}').domains)
      .toEqual(['general', 'communication', 'personality']);
  });

  it('throws ParseError for non-JSON replies', () => {
    expect(() => parseAnalysisResponse('Sure! Here you go')).toThrow(ParseError);
  });

  it('throws ParseError for the wrong shape', () => {
    expect(() => parseAnalysisResponse('[1, 2]')).toThrow(ParseError);
  });
});

describe('stripCodeFence', () => {
  it('leaves unfenced text trimmed', () => {
    expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
    expect(stripCodeFence('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });
});

describe('LlmPromptAnalyzer', () => {
  it('asks for JSON and parses the reply', async () => {
    const adapter = fakeAdapter(async () => '{"intent": "cook", "domains": ["eating"], "keywords": ["soup"]}');
    const analyzer = new LlmPromptAnalyzer(adapter, { temperature: 0.2 });

    const analysis = await analyzer.analyze('soup ideas');

    expect(analyzer.name).toBe('fake:model');
    expect(analysis.domains).toEqual(['eating']);
    const request: CompletionRequest = adapter.complete.mock.calls[0][0];
    expect(request.responseFormat).toBe('json');
    expect(request.temperature).toBe(0.2);
    expect(request.maxTokens).toBe(512);
    expect(request.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(request.messages[1].content).toBe('soup ideas');
  });

  it('falls back to keyword analysis on a bad reply', async () => {
    const analyzer = new LlmPromptAnalyzer(fakeAdapter(async () => 'not json'));
    await expect(analyzer.analyze('cheap pans')).resolves.toEqual(fallbackPromptAnalysis('cheap pans'));
  });

  it('falls back to keyword analysis when the call fails', async () => {
    const analyzer = new LlmPromptAnalyzer(fakeAdapter(async () => {
      throw new Error('connection refused');
    }));
    await expect(analyzer.analyze('cheap pans')).resolves.toEqual(fallbackPromptAnalysis('cheap pans'));
  });
});

describe('createPromptAnalyzer', () => {
  it('returns the keyword analyzer for the keyword provider', () => {
    const analyzer = createPromptAnalyzer({ provider: 'keyword', model: 'llama3.2', temperature: 0.1 }, {});
    expect(analyzer).toBeInstanceOf(KeywordPromptAnalyzer);
  });

  it('wraps a model adapter for other providers', () => {
    const analyzer = createPromptAnalyzer({ provider: 'ollama', model: 'llama3.2', temperature: 0.1 }, {});
    expect(analyzer).toBeInstanceOf(LlmPromptAnalyzer);
    expect(analyzer.name).toBe('ollama:llama3.2');
  });

  it('degrades to keyword analysis when the provider cannot be set up', () => {
    const analyzer = createPromptAnalyzer({ provider: 'openai', model: 'gpt-4o-mini', temperature: 0.1 }, {});
    expect(analyzer).toBeInstanceOf(KeywordPromptAnalyzer);
  });
});

import { z } from 'zod';
import type { PromptAnalysis } from '../cards/types.js';

/**
 * Turns a draft prompt into a structured analysis. Implementations must
 * resolve even when their backend fails.
 */
export interface PromptAnalyzer {
  readonly name: string;
  analyze(promptText: string): Promise<PromptAnalysis>;
}

// Wire shape requested from a model
export const ModelAnalysisSchema = z.object({
  intent: z.string().default('user request'),
  domains: z.array(z.string()).optional().catch(undefined),
  explicit_preferences: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
});

export type ModelAnalysis = z.infer<typeof ModelAnalysisSchema>;

export const DEFAULT_MODEL_DOMAINS = ['general', 'communication', 'personality'];

export function fromModelAnalysis(raw: ModelAnalysis): PromptAnalysis {
  return {
    intent: raw.intent,
    domains: raw.domains ?? [...DEFAULT_MODEL_DOMAINS],
    explicitPreferences: raw.explicit_preferences,
    keywords: raw.keywords,
  };
}

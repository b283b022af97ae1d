import { z } from 'zod';
import type { CardRepository, TagSearch } from '../cards/repository.js';
import type {
  CardPriority,
  CardType,
  MemoryCard,
  PromptAnalysis,
  ScoredCard,
  SensitivityMode,
} from '../cards/types.js';
import { DEFAULT_PERSONA, MemoryCardSchema, SENSITIVITY_MODES } from '../cards/types.js';
import type { PromptAnalyzer } from '../analysis/types.js';
import { fallbackPromptAnalysis } from '../analysis/fallback.js';
import { ValidationError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { arbitrateWithReport } from './arbiter.js';
import { findPromptConflict } from './contradictions.js';
import { formatContextPack, selectTopCards } from './formatter.js';
import { ARBITRATION_RULES, PROMPT_CONTRADICTION_RULES, type ConflictAxis, type ContradictionRule } from './rules.js';
import { RELEVANCE_WEIGHTS, scoreCard, type RelevanceWeights } from './scorer.js';

export const DEFAULT_MAX_CARDS = 12;
export const DEFAULT_MIN_RELEVANCE = 0.5;
export const DEFAULT_TAG_SEARCH_LIMIT = 20;

export const ContextPackRequestSchema = z.object({
  persona: z.string().trim().min(1).default(DEFAULT_PERSONA),
  draftPrompt: z.string(),
  sensitivityMode: z.enum(SENSITIVITY_MODES).default('quiet'),
  maxCards: z.number().int().min(0).default(DEFAULT_MAX_CARDS),
  minRelevance: z.number().min(0).max(1).default(DEFAULT_MIN_RELEVANCE),
  siteId: z.string().optional(),  // chat site the pack is for; recorded only
});

export type ContextPackRequest = z.input<typeof ContextPackRequestSchema>;

export interface UsedCard {
  id: string;
  type: CardType;
  text: string;
  domain: string[];
  priority: CardPriority;
  relevanceScore: number;
  tagSearchHit: boolean;
}

export type PackConflict =
  | {
      kind: 'prompt';
      cardId: string;
      cardText: string;
      axis: ConflictAxis;
      source: 'prompt' | 'explicit_preference';
      sourceText: string;
    }
  | {
      kind: 'arbitration';
      cardId: string;
      cardText: string;
      axis: ConflictAxis;
      winnerId: string;
    };

export interface ContextPack {
  packText: string;
  usedCards: UsedCard[];
  cardCount: number;
  persona: string;
  sensitivityMode: SensitivityMode;
  siteId?: string;
  generatedAt: string;
  analysis: PromptAnalysis;
  conflicts: PackConflict[];
  tagSearchHits: string[];
}

/**
 * Hook for letting the sensitivity mode shape the selection. It runs on the
 * arbitrated, score-ordered list before truncation. The default leaves the
 * list alone; quiet and verbose currently select the same cards.
 */
export interface SensitivityPolicy {
  apply(ordered: ScoredCard[], mode: SensitivityMode): ScoredCard[];
}

export const passthroughSensitivity: SensitivityPolicy = {
  apply: (ordered) => ordered,
};

export interface SelectionOptions {
  persona: string;
  maxCards: number;
  minRelevance: number;
  sensitivityMode?: SensitivityMode;
  weights?: Readonly<RelevanceWeights>;
  promptRules?: readonly ContradictionRule[];
  arbitrationRules?: readonly ContradictionRule[];
  sensitivityPolicy?: SensitivityPolicy;
  logger?: Logger;
}

export interface SelectionResult {
  selected: ScoredCard[];
  eligibleCount: number;   // cards at or above the threshold before arbitration
  skippedCount: number;    // malformed or foreign-persona records
  conflicts: PackConflict[];
  packText: string;
}

/**
 * Validate raw candidate records, keeping repository order. Bad records are
 * skipped so one broken card cannot sink the pack.
 */
export function validateCandidates(
  candidates: readonly unknown[],
  persona: string,
  logger: Logger = silentLogger
): { cards: MemoryCard[]; skipped: number } {
  const cards: MemoryCard[] = [];
  let skipped = 0;

  candidates.forEach((raw, index) => {
    const parsed = MemoryCardSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      logger.warn('Skipping malformed card', {
        index,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
      return;
    }

    if (parsed.data.persona !== persona) {
      skipped++;
      logger.debug('Skipping card from another persona', { id: parsed.data.id, persona: parsed.data.persona });
      return;
    }

    cards.push(parsed.data);
  });

  return { cards, skipped };
}

/**
 * Pure selection: veto, score, threshold, stable sort, arbitrate, truncate,
 * render. Same inputs always give the same output.
 */
export function selectContextPack(
  candidates: readonly unknown[],
  analysis: PromptAnalysis,
  promptText: string,
  options: SelectionOptions
): SelectionResult {
  const logger = options.logger ?? silentLogger;
  const weights = options.weights ?? RELEVANCE_WEIGHTS;
  const promptRules = options.promptRules ?? PROMPT_CONTRADICTION_RULES;
  const policy = options.sensitivityPolicy ?? passthroughSensitivity;

  const { cards, skipped } = validateCandidates(candidates, options.persona, logger);
  const conflicts: PackConflict[] = [];
  const scored: ScoredCard[] = [];

  for (const card of cards) {
    const conflict = findPromptConflict(card.text, promptText, analysis.explicitPreferences, promptRules);
    if (conflict) {
      logger.info('Excluding card that conflicts with the prompt', {
        id: card.id,
        axis: conflict.rule.axis,
        source: conflict.source,
      });
      conflicts.push({
        kind: 'prompt',
        cardId: card.id,
        cardText: card.text,
        axis: conflict.rule.axis,
        source: conflict.source,
        sourceText: conflict.sourceText,
      });
      continue;
    }

    const relevanceScore = scoreCard(card, analysis, promptText, weights);
    if (relevanceScore >= options.minRelevance) {
      scored.push({ card, relevanceScore });
    }
  }

  // Array.prototype.sort is stable: ties keep repository order
  scored.sort((a, b) => b.relevanceScore - a.relevanceScore);

  const arbitration = arbitrateWithReport(scored, options.arbitrationRules ?? ARBITRATION_RULES);
  for (const drop of arbitration.dropped) {
    logger.info('Conflict resolved: profile card wins over extracted card', {
      dropped: drop.dropped.card.id,
      winner: drop.winner.id,
      axis: drop.match.rule.axis,
    });
    conflicts.push({
      kind: 'arbitration',
      cardId: drop.dropped.card.id,
      cardText: drop.dropped.card.text,
      axis: drop.match.rule.axis,
      winnerId: drop.winner.id,
    });
  }

  const shaped = policy.apply(arbitration.kept, options.sensitivityMode ?? 'quiet');
  const selected = selectTopCards(shaped, options.maxCards);

  logger.debug('Selected cards', {
    selected: selected.length,
    eligible: scored.length,
    minRelevance: options.minRelevance,
  });

  return {
    selected,
    eligibleCount: scored.length,
    skippedCount: skipped,
    conflicts,
    packText: formatContextPack(selected.map((s) => s.card)),
  };
}

export interface ContextPackBuilderOptions {
  repository: CardRepository;
  analyzer: PromptAnalyzer;
  tagSearch?: TagSearch;
  tagSearchLimit?: number;
  weights?: Readonly<RelevanceWeights>;
  sensitivityPolicy?: SensitivityPolicy;
  logger?: Logger;
  clock?: () => Date;
}

export interface ContextPackPreview {
  persona: string;
  totalCards: number;
  previewCards: number;
  packPreview: string;
  cards: Array<Pick<MemoryCard, 'id' | 'type' | 'text' | 'domain'>>;
}

export class ContextPackBuilder {
  private logger: Logger;
  private clock: () => Date;

  constructor(private options: ContextPackBuilderOptions) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build the context pack for a draft prompt
   */
  async build(input: ContextPackRequest): Promise<ContextPack> {
    const parsed = ContextPackRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid context pack request',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    const request = parsed.data;

    const candidates = this.options.repository.getCards(request.persona);
    this.logger.info('Generating context pack', {
      persona: request.persona,
      promptLength: request.draftPrompt.length,
      totalCards: candidates.length,
    });

    if (candidates.length === 0) {
      return this.emptyPack(request.persona, request.sensitivityMode, request.siteId, fallbackPromptAnalysis(request.draftPrompt));
    }

    const analysis = await this.analyze(request.draftPrompt);
    const hints = await this.tagSearchHints(analysis, request.persona, candidates);

    const result = selectContextPack(candidates, analysis, request.draftPrompt, {
      persona: request.persona,
      maxCards: request.maxCards,
      minRelevance: request.minRelevance,
      sensitivityMode: request.sensitivityMode,
      weights: this.options.weights,
      sensitivityPolicy: this.options.sensitivityPolicy,
      logger: this.logger,
    });

    const usedCards = result.selected.map(({ card, relevanceScore }) => ({
      id: card.id,
      type: card.type,
      text: card.text,
      domain: card.domain,
      priority: card.priority,
      relevanceScore,
      tagSearchHit: hints.has(card.id),
    }));

    this.logger.info('Context pack generated', {
      cardsUsed: usedCards.length,
      eligible: result.eligibleCount,
      packLength: result.packText.length,
    });

    return {
      packText: result.packText,
      usedCards,
      cardCount: usedCards.length,
      persona: request.persona,
      sensitivityMode: request.sensitivityMode,
      siteId: request.siteId,
      generatedAt: this.clock().toISOString(),
      analysis,
      conflicts: result.conflicts,
      tagSearchHits: [...hints],
    };
  }

  /**
   * First cards of a persona in repository order, no prompt filtering
   */
  preview(persona: string = DEFAULT_PERSONA, maxCards: number = 5): ContextPackPreview {
    const { cards } = validateCandidates(this.options.repository.getCards(persona), persona, this.logger);
    const previewCards = selectTopCards(cards, maxCards);

    return {
      persona,
      totalCards: cards.length,
      previewCards: previewCards.length,
      packPreview: formatContextPack(previewCards),
      cards: previewCards.map((card) => ({
        id: card.id,
        type: card.type,
        text: card.text.length > 100 ? card.text.slice(0, 100) + '...' : card.text,
        domain: card.domain,
      })),
    };
  }

  private async analyze(promptText: string): Promise<PromptAnalysis> {
    try {
      const analysis = await this.options.analyzer.analyze(promptText);
      this.logger.debug('Prompt analyzed', {
        analyzer: this.options.analyzer.name,
        intent: analysis.intent,
        domains: analysis.domains,
      });
      return analysis;
    } catch (error) {
      this.logger.warn('Prompt analysis failed, using keyword fallback', { error: errorMessage(error) });
      return fallbackPromptAnalysis(promptText);
    }
  }

  private async tagSearchHints(
    analysis: PromptAnalysis,
    persona: string,
    candidates: readonly MemoryCard[]
  ): Promise<Set<string>> {
    const { tagSearch } = this.options;
    if (!tagSearch || analysis.keywords.length === 0) return new Set();

    try {
      const ids = await tagSearch.relatedCardIdsByTags(
        [...analysis.domains, ...analysis.keywords],
        persona,
        this.options.tagSearchLimit ?? DEFAULT_TAG_SEARCH_LIMIT
      );
      const known = new Set(candidates.map((card) => card.id));
      const hits = new Set(ids.filter((id) => known.has(id)));
      this.logger.debug('Tag search hints', { hits: hits.size });
      return hits;
    } catch (error) {
      this.logger.warn('Tag search failed, continuing without hints', { error: errorMessage(error) });
      return new Set();
    }
  }

  private emptyPack(
    persona: string,
    sensitivityMode: SensitivityMode,
    siteId: string | undefined,
    analysis: PromptAnalysis
  ): ContextPack {
    return {
      packText: '',
      usedCards: [],
      cardCount: 0,
      persona,
      sensitivityMode,
      siteId,
      generatedAt: this.clock().toISOString(),
      analysis,
      conflicts: [],
      tagSearchHits: [],
    };
  }
}

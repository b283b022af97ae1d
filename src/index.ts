/**
 * cardpack library entry point
 */

export * from './cards/types.js';
export * from './cards/repository.js';
export { CardStore } from './cards/store.js';
export type { CardStats, ListCardsOptions, CardStoreOptions } from './cards/store.js';
export { StoreTagSearch, rankCardsByTags } from './cards/tag-search.js';
export type { TagMatch, TagIndexSource } from './cards/tag-search.js';
export { FileCardRepository, cardRecordsFrom } from './cards/file-repository.js';

export * from './core/scorer.js';
export * from './core/rules.js';
export * from './core/contradictions.js';
export * from './core/arbiter.js';
export * from './core/formatter.js';
export * from './core/context-pack.js';

export * from './analysis/types.js';
export { KeywordPromptAnalyzer, fallbackPromptAnalysis, detectDomains } from './analysis/fallback.js';
export { LlmPromptAnalyzer, createPromptAnalyzer, parseAnalysisResponse } from './analysis/llm-analyzer.js';

export * from './ingest/tuples.js';
export * from './ingest/extractor.js';
export * from './ingest/cards-from-tuples.js';

export * from './adapters/index.js';
export * from './errors.js';
export { createLogger, silentLogger, scopedLogger } from './logger.js';
export type { Logger, LogLevel, LogFields } from './logger.js';
export { openWorkspace } from './workspace.js';
export type { Workspace, OpenWorkspaceOptions } from './workspace.js';

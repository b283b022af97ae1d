/**
 * Wires config, logger, store and builder together for one project
 * directory. Shared by the CLI and the MCP server.
 */

import type { AdapterEnv } from './adapters/index.js';
import { createPromptAnalyzer } from './analysis/llm-analyzer.js';
import { CardStore } from './cards/store.js';
import { StoreTagSearch } from './cards/tag-search.js';
import { findProjectRoot, getCardsDbPath, loadConfig, type Config } from './config/index.js';
import { ContextPackBuilder } from './core/context-pack.js';
import { CardPackError } from './errors.js';
import { createLogger, scopedLogger, type Logger, type LogLevel } from './logger.js';

export interface Workspace {
  root: string;
  config: Config;
  logger: Logger;
  store: CardStore;
  builder: ContextPackBuilder;
  close(): void;
}

export interface OpenWorkspaceOptions {
  cwd?: string;
  env?: AdapterEnv;
  logLevel?: LogLevel;
  logger?: Logger;
}

export function openWorkspace(options: OpenWorkspaceOptions = {}): Workspace {
  const root = findProjectRoot(options.cwd);
  if (!root) {
    throw new CardPackError('Not in a cardpack project. Run `cpack init` first.', 'NOT_FOUND');
  }

  const bootLogger = options.logger ?? createLogger({ level: options.logLevel ?? 'warn' });
  const config = loadConfig(root, bootLogger);
  const logger = options.logger ?? createLogger({ level: options.logLevel ?? config.logging.level });

  const store = new CardStore(getCardsDbPath(root), { logger: scopedLogger(logger, 'store') });
  const analyzer = createPromptAnalyzer(config.analyzer, options.env, logger);

  const builder = new ContextPackBuilder({
    repository: store,
    analyzer,
    tagSearch: config.pack.useTagSearch ? new StoreTagSearch(store) : undefined,
    tagSearchLimit: config.pack.tagSearchLimit,
    logger,
  });

  return {
    root,
    config,
    logger,
    store,
    builder,
    close: () => store.close(),
  };
}

import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { createPromptAnalyzer } from '../../analysis/llm-analyzer.js';
import { FileCardRepository } from '../../cards/file-repository.js';
import { defaultConfig, findProjectRoot, loadConfig, type PackConfig } from '../../config/index.js';
import { ContextPackBuilder } from '../../core/context-pack.js';
import { createLogger } from '../../logger.js';
import { emptyState, formatPackReport, header } from '../ui.js';
import {
  exitWithError,
  logLevelFor,
  parseNumber,
  parseSensitivity,
  withWorkspace,
  type GlobalOptions,
} from '../run.js';

interface PackOptions extends GlobalOptions {
  persona?: string;
  maxCards?: string;
  minRelevance?: string;
  sensitivity?: string;
  site?: string;
  json?: boolean;
  report?: boolean;
}

async function printPack(
  builder: ContextPackBuilder,
  defaults: PackConfig,
  draftPrompt: string,
  options: PackOptions
): Promise<void> {
  const pack = await builder.build({
    persona: options.persona ?? defaults.persona,
    draftPrompt,
    maxCards: options.maxCards !== undefined ? parseNumber(options.maxCards, 'max-cards') : defaults.maxCards,
    minRelevance: options.minRelevance !== undefined
      ? parseNumber(options.minRelevance, 'min-relevance')
      : defaults.minRelevance,
    sensitivityMode: options.sensitivity !== undefined
      ? parseSensitivity(options.sensitivity)
      : defaults.sensitivityMode,
    siteId: options.site,
  });

  if (options.json) {
    console.log(JSON.stringify(pack, null, 2));
    return;
  }

  if (options.report) {
    console.log(header('Context pack'));
    console.log(formatPackReport(pack));
    console.log();
  }

  if (pack.packText) {
    console.log(pack.packText);
  } else if (options.report) {
    emptyState('No cards were relevant enough for this prompt.');
  }
}

/**
 * Build from an exported card file; no project directory needed
 */
async function packFromFile(cardsPath: string, draftPrompt: string, options: PackOptions): Promise<void> {
  const root = findProjectRoot();
  const config = root ? loadConfig(root) : defaultConfig();
  const logger = createLogger({ level: logLevelFor(options) ?? config.logging.level });

  const builder = new ContextPackBuilder({
    repository: new FileCardRepository(cardsPath, logger),
    analyzer: createPromptAnalyzer(config.analyzer, process.env, logger),
    logger,
  });

  try {
    await printPack(builder, config.pack, draftPrompt, options);
  } catch (error) {
    exitWithError(error);
  }
}

export const packCommand = new Command('pack')
  .description('Build the personal context block for a draft prompt')
  .argument('<prompt...>', 'Draft prompt')
  .option('-p, --persona <persona>', 'Persona to draw cards from')
  .option('-n, --max-cards <count>', 'Maximum cards in the pack')
  .option('-m, --min-relevance <score>', 'Minimum relevance, 0 to 1')
  .option('-s, --sensitivity <mode>', 'quiet or verbose')
  .option('--site <siteId>', 'Chat site the pack is for')
  .option('--cards <file>', 'Read cards from a JSON export instead of the project store')
  .option('--json', 'Print the full result as JSON')
  .option('-r, --report', 'Print which cards were chosen and why')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('cpack pack')} "what pans should I buy"
  ${chalk.cyan('cpack pack')} "plan my week" ${chalk.gray('--report -n 5')}
  ${chalk.cyan('cpack pack')} "gift ideas" ${chalk.gray('--cards cards.json')}
`)
  .action(async (promptWords, options) => {
    const draftPrompt = promptWords.join(' ');

    if (options.cards) {
      await packFromFile(options.cards, draftPrompt, options);
      return;
    }

    await withWorkspace(options, ({ builder, config }) => printPack(builder, config.pack, draftPrompt, options));
  });

export const previewCommand = new Command('preview')
  .description('Show the first cards of a persona without prompt filtering')
  .option('-p, --persona <persona>', 'Persona to preview')
  .option('-n, --count <count>', 'Number of cards', '5')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (options) => {
    await withWorkspace(options, ({ builder, config }) => {
      const preview = builder.preview(options.persona ?? config.pack.persona, parseNumber(options.count, 'count'));

      if (preview.totalCards === 0) {
        emptyState(`No cards for persona ${preview.persona}.`, 'Add one with: cpack card add preference "..."');
        return;
      }

      console.log(chalk.gray(`Showing ${preview.previewCards} of ${preview.totalCards} cards for ${preview.persona}`));
      console.log();
      console.log(preview.packPreview);
    });
  });

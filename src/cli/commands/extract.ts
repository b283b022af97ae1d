import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import * as fs from 'fs';
import { createAdapterFromString, type ModelAdapter } from '../../adapters/index.js';
import { TupleExtractor } from '../../ingest/extractor.js';
import { cardInputFromTuple } from '../../ingest/cards-from-tuples.js';
import { ValidationError, errorMessage } from '../../errors.js';
import { emptyState, formatCard, success, warning } from '../ui.js';
import { withWorkspace } from '../run.js';

export const extractCommand = new Command('extract')
  .description('Mine extracted cards from conversation text with a model')
  .argument('[text...]', 'Text to mine')
  .option('-f, --file <path>', 'Read the text from a file')
  .option('-p, --persona <persona>', 'Persona for the new cards')
  .option('--dry-run', 'Show the cards without saving them')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (textWords, options) => {
    await withWorkspace(options, async ({ store, config, logger }) => {
      const text = options.file ? fs.readFileSync(options.file, 'utf-8') : textWords.join(' ');
      if (!text.trim()) {
        throw new ValidationError('Nothing to extract: pass text or --file');
      }

      const adapters: ModelAdapter[] = [];
      for (const model of config.extraction.models) {
        try {
          adapters.push(createAdapterFromString(model));
        } catch (error) {
          console.log(warning(`Skipping ${model}: ${errorMessage(error)}`));
        }
      }

      const extractor = new TupleExtractor(adapters, {
        temperature: config.extraction.temperature,
        logger,
      });
      const tuples = await extractor.extract(text, options.file ? 'file' : 'conversation');

      if (tuples.length === 0) {
        emptyState('No facts could be extracted.', 'Check extraction.models with: cpack config get extraction');
        return;
      }

      const persona = options.persona ?? config.pack.persona;
      const inputs = tuples.map((tuple) => cardInputFromTuple(tuple, persona));

      if (options.dryRun) {
        for (const input of inputs) {
          console.log(`${chalk.yellow(`[${input.type}]`)} ${input.text}`);
          console.log(chalk.gray(`   domain: ${(input.domain ?? []).join(', ')} | tags: ${(input.tags ?? []).join(', ')}`));
        }
        return;
      }

      const cards = store.importCards(inputs);
      console.log(success(`Saved ${cards.length} extracted card(s)`));
      for (const card of cards) {
        console.log(formatCard(card));
      }
    });
  });

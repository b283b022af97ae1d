import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import * as fs from 'fs';
import { CreateCardInputSchema, type CreateCardInput } from '../../cards/types.js';
import { cardRecordsFrom } from '../../cards/file-repository.js';
import { profileCardInput } from '../../ingest/cards-from-tuples.js';
import { NotFoundError, ParseError, ValidationError, errorMessage } from '../../errors.js';
import { emptyState, formatCard, keyValue, success } from '../ui.js';
import { parseCardType, splitList, withWorkspace } from '../run.js';

interface CardFieldOptions {
  domain?: string;
  tags?: string;
  hard?: boolean;
  persona?: string;
  profile?: boolean;
}

function cardInput(type: string, text: string, options: CardFieldOptions, defaultPersona: string): CreateCardInput {
  const base = {
    type: parseCardType(type),
    text,
    domain: splitList(options.domain),
    persona: options.persona ?? defaultPersona,
  };

  if (options.profile) {
    return {
      ...profileCardInput({ ...base, semanticTags: splitList(options.tags) }),
      priority: options.hard ? 'hard' : 'soft',
    };
  }

  return {
    ...base,
    tags: splitList(options.tags),
    priority: options.hard ? 'hard' : 'soft',
  };
}

export const cardCommand = new Command('card')
  .description('Manage memory cards')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('cpack card add')} constraint "Allergic to peanuts" ${chalk.gray('--domain eating,health --hard')}
  ${chalk.cyan('cpack card add')} preference "Prefers quality over price" ${chalk.gray('--domain shopping --profile')}
  ${chalk.cyan('cpack card list')} ${chalk.gray('--type goal')}
`);

cardCommand
  .command('add')
  .description('Add a card')
  .argument('<type>', 'constraint, preference, goal or capability')
  .argument('<text...>', 'Card text')
  .option('-d, --domain <domains>', 'Comma-separated domains')
  .option('-t, --tags <tags>', 'Comma-separated tags')
  .option('--hard', 'Mark as a hard constraint')
  .option('--profile', 'Card comes from an answered profile question')
  .option('-p, --persona <persona>', 'Persona')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (type, textWords, options) => {
    await withWorkspace(options, ({ store, config }) => {
      const card = store.addCard(cardInput(type, textWords.join(' '), options, config.pack.persona));
      console.log(success('Card added'));
      console.log(formatCard(card));
    });
  });

cardCommand
  .command('replace')
  .description('Replace the content of a card, keeping its id')
  .argument('<id>', 'Card id')
  .argument('<type>', 'constraint, preference, goal or capability')
  .argument('<text...>', 'New card text')
  .option('-d, --domain <domains>', 'Comma-separated domains')
  .option('-t, --tags <tags>', 'Comma-separated tags')
  .option('--hard', 'Mark as a hard constraint')
  .option('--profile', 'Card comes from an answered profile question')
  .option('-p, --persona <persona>', 'Persona')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (id, type, textWords, options) => {
    await withWorkspace(options, ({ store, config }) => {
      const card = store.replaceCard(id, cardInput(type, textWords.join(' '), options, config.pack.persona));
      console.log(success('Card replaced'));
      console.log(formatCard(card));
    });
  });

cardCommand
  .command('list')
  .description('List cards in storage order')
  .option('-p, --persona <persona>', 'Only this persona')
  .option('--type <type>', 'Only this card type')
  .option('--tag <tag>', 'Only cards with this tag')
  .option('-l, --limit <count>', 'Maximum cards', '100')
  .option('--json', 'Print as JSON')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (options) => {
    await withWorkspace(options, ({ store }) => {
      const cards = store.listCards({
        persona: options.persona,
        type: options.type !== undefined ? parseCardType(options.type) : undefined,
        tag: options.tag,
        limit: Number.parseInt(options.limit, 10) || 100,
      });

      if (options.json) {
        console.log(JSON.stringify(cards, null, 2));
        return;
      }

      if (cards.length === 0) {
        emptyState('No cards yet.', 'Add one with: cpack card add preference "..."');
        return;
      }

      for (const card of cards) {
        console.log(formatCard(card));
        console.log();
      }
      console.log(chalk.gray(`${cards.length} card(s)`));
    });
  });

cardCommand
  .command('show')
  .description('Show one card')
  .argument('<id>', 'Card id')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (id, options) => {
    await withWorkspace(options, ({ store }) => {
      const card = store.getCard(id);
      if (!card) {
        throw new NotFoundError('Card', id);
      }
      console.log(formatCard(card));
      console.log(keyValue('   Persona', card.persona));
      console.log(keyValue('   Created', card.createdAt.toISOString()));
      if (card.updatedAt) {
        console.log(keyValue('   Updated', card.updatedAt.toISOString()));
      }
    });
  });

cardCommand
  .command('remove')
  .description('Delete a card')
  .argument('<id>', 'Card id')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (id, options) => {
    await withWorkspace(options, ({ store }) => {
      if (!store.deleteCard(id)) {
        throw new NotFoundError('Card', id);
      }
      console.log(success(`Removed card ${id}`));
    });
  });

cardCommand
  .command('import')
  .description('Import cards from a JSON file (an array, or {"cards": [...]})')
  .argument('<file>', 'Path to the JSON file')
  .option('-p, --persona <persona>', 'Persona for records that name none')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (file, options) => {
    await withWorkspace(options, ({ store, config }) => {
      let document: unknown;
      try {
        document = JSON.parse(fs.readFileSync(file, 'utf-8'));
      } catch (error) {
        throw new ParseError(`Cannot read ${file}: ${errorMessage(error)}`);
      }

      const persona = options.persona ?? config.pack.persona;
      const inputs = cardRecordsFrom(document).map((record, index) => {
        const parsed = CreateCardInputSchema.safeParse(
          typeof record === 'object' && record !== null ? { persona, ...record } : record
        );
        if (!parsed.success) {
          throw new ValidationError(
            `Card ${index} in ${file} is invalid`,
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          );
        }
        return parsed.data;
      });

      const cards = store.importCards(inputs);
      console.log(success(`Imported ${cards.length} card(s)`));
    });
  });

cardCommand
  .command('stats')
  .description('Card counts by type and provenance')
  .option('--verbose', 'Debug logging')
  .option('--quiet', 'Errors only')
  .action(async (options) => {
    await withWorkspace(options, ({ store }) => {
      const stats = store.getStats();
      console.log(keyValue('Total', String(stats.totalCards)));
      for (const [type, count] of Object.entries(stats.byType)) {
        console.log(keyValue(`  ${type}`, String(count)));
      }
      console.log(keyValue('Profile', String(stats.profileCards)));
      console.log(keyValue('Extracted', String(stats.extractedCards)));
      console.log(keyValue('Personas', stats.personas.join(', ') || '-'));
    });
  });

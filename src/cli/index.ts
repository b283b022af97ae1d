import { Command } from '@commander-js/extra-typings';
import { initCommand } from './commands/init.js';
import { packCommand, previewCommand } from './commands/pack.js';
import { cardCommand } from './commands/card.js';
import { extractCommand } from './commands/extract.js';
import { configCommand } from './commands/config.js';
import { mcpCommand } from './commands/mcp.js';

export const program = new Command()
  .name('cpack')
  .description('Personal context packs for chat prompts, built from memory cards')
  .version('0.1.0');

// Initialize a new project
program
  .command('init')
  .description('Initialize cardpack in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(initCommand);

// Context packs
program.addCommand(packCommand);
program.addCommand(previewCommand);

// Card management
program.addCommand(cardCommand);
program.addCommand(extractCommand);

// Configuration management
program.addCommand(configCommand);

// MCP server over stdio
program.addCommand(mcpCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});

import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  findProjectRoot,
} from '../../config/index.js';
import { CardPackError } from '../../errors.js';
import { exitWithError } from '../run.js';

export const configCommand = new Command('config')
  .description('Manage cardpack configuration');

function requireRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    exitWithError(new CardPackError('Not in a cardpack project. Run `cpack init` first.', 'NOT_FOUND'));
  }
  return root;
}

// cpack config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., pack.maxCards)')
  .description('Get configuration value(s)')
  .action((key) => {
    const root = requireRoot();

    try {
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          exitWithError(new CardPackError(`Unknown config key: ${key}`, 'NOT_FOUND'));
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// cpack config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., analyzer.provider)')
  .argument('<value>', 'New value; lists are comma-separated')
  .description('Set a configuration value')
  .action((key, value) => {
    const root = requireRoot();

    try {
      setConfigValue(key, value, root);
      console.log(chalk.green(`✓ Set ${key} = ${value}`));
    } catch (error) {
      exitWithError(error);
    }
  });

// cpack config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    const root = requireRoot();

    try {
      printConfigTree(loadConfig(root), '');
    } catch (error) {
      exitWithError(error);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function printConfigTree(obj: object, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}

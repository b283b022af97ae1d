import chalk from 'chalk';
import * as path from 'path';
import { initProject, findProjectRoot, CPACK_DIR, CARDS_DB, CONFIG_FILE } from '../../config/index.js';
import { CardStore } from '../../cards/store.js';
import { exitWithError } from '../run.js';

interface InitOptions {
  force?: boolean;
}

export function initCommand(options: InitOptions): void {
  const cwd = process.cwd();

  const existingRoot = findProjectRoot();
  if (existingRoot && !options.force) {
    console.log(chalk.yellow(`cardpack already initialized at: ${existingRoot}`));
    console.log(chalk.gray('Use --force to reinitialize'));
    return;
  }

  try {
    const cpackPath = initProject(cwd, options.force);

    // Create the database now so permissions are set before any card lands
    new CardStore(path.join(cpackPath, CARDS_DB)).close();

    console.log(chalk.green('✓ cardpack initialized'));
    console.log();
    console.log('Created:');
    console.log(chalk.gray(`  ${path.join(CPACK_DIR, CONFIG_FILE)}  - Configuration`));
    console.log(chalk.gray(`  ${path.join(CPACK_DIR, CARDS_DB)}     - Memory cards`));
    console.log(chalk.gray(`  ${path.join(CPACK_DIR, '.gitignore')}   - Git ignore rules`));
    console.log();
    console.log('Next steps:');
    console.log(chalk.cyan('  cpack card add preference "Prefers concise answers" --domain communication'));
    console.log(chalk.cyan('  cpack pack "find me a good chef knife"'));
  } catch (error) {
    exitWithError(error);
  }
}

import chalk from 'chalk';
import { CardPackError, ValidationError, errorMessage } from '../errors.js';
import type { LogLevel } from '../logger.js';
import { CARD_TYPES, SENSITIVITY_MODES, isCardType, type CardType, type SensitivityMode } from '../cards/types.js';
import { openWorkspace, type Workspace } from '../workspace.js';

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function logLevelFor(options: GlobalOptions): LogLevel | undefined {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  return undefined;
}

/**
 * Print an error the way every command does and exit non-zero
 */
export function exitWithError(error: unknown): never {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  if (error instanceof ValidationError) {
    for (const issue of error.issues) {
      console.error(chalk.gray(`  - ${issue}`));
    }
  }
  process.exit(error instanceof CardPackError && error.code === 'NOT_FOUND' ? 2 : 1);
}

/**
 * Open the project workspace, run a command body and always close the store
 */
export async function withWorkspace<T>(
  options: GlobalOptions,
  body: (workspace: Workspace) => T | Promise<T>
): Promise<T> {
  let workspace: Workspace;
  try {
    workspace = openWorkspace({ logLevel: logLevelFor(options) });
  } catch (error) {
    exitWithError(error);
  }

  try {
    const result = await body(workspace);
    workspace.close();
    return result;
  } catch (error) {
    workspace.close();
    exitWithError(error);
  }
}

export function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ValidationError(`${name} must be a number, got '${value}'`);
  }
  return parsed;
}

export function parseSensitivity(value: string): SensitivityMode {
  const mode = SENSITIVITY_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new ValidationError(`sensitivity must be one of ${SENSITIVITY_MODES.join(', ')}, got '${value}'`);
  }
  return mode;
}

export function parseCardType(value: string): CardType {
  if (!isCardType(value)) {
    throw new ValidationError(`type must be one of ${CARD_TYPES.join(', ')}, got '${value}'`);
  }
  return value;
}

export function splitList(value: string | undefined): string[] {
  return value ? value.split(',').map((item) => item.trim()).filter(Boolean) : [];
}

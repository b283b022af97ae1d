/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { CardType, MemoryCard } from '../cards/types.js';
import type { ContextPack } from '../core/context-pack.js';

export const icons = {
  constraint: '\u{1F6A7}', // construction sign
  preference: '\u{2728}',  // sparkles
  goal: '\u{1F3AF}',       // target
  capability: '\u{1F9F0}', // toolbox
  dot: '\u{2022}',
};

export const typeColors: Record<CardType, (text: string) => string> = {
  constraint: chalk.red,
  preference: chalk.yellow,
  goal: chalk.green,
  capability: chalk.blue,
};

export function formatCard(card: MemoryCard, options: { showId?: boolean } = {}): string {
  const colorFn = typeColors[card.type];
  const typeName = card.type.charAt(0).toUpperCase() + card.type.slice(1);
  const hard = card.priority === 'hard' ? chalk.bold.red(' [HARD]') : '';

  let output = `${icons[card.type]} ${colorFn(`[${typeName}]`)} ${chalk.white(card.text)}${hard}`;

  const details = [
    card.domain.length > 0 ? `domain: ${card.domain.join(', ')}` : '',
    card.tags.length > 0 ? `tags: ${card.tags.join(', ')}` : '',
  ].filter(Boolean);
  if (details.length > 0) {
    output += `\n   ${chalk.gray(details.join(' | '))}`;
  }

  if (options.showId ?? true) {
    output += `\n   ${chalk.dim(`ID: ${card.id}`)}`;
  }

  return output;
}

/**
 * Score as a coloured percentage
 */
export function formatScore(score: number): string {
  const percentage = Math.round(score * 100);

  let percentColor = chalk.red;
  if (percentage >= 80) percentColor = chalk.green;
  else if (percentage >= 60) percentColor = chalk.yellow;
  else if (percentage >= 40) percentColor = chalk.cyan;

  return percentColor(`${percentage}%`);
}

/**
 * Human-readable report of a pack: selected cards, then exclusions
 */
export function formatPackReport(pack: ContextPack): string {
  const lines: string[] = [];

  lines.push(keyValue('Persona', pack.persona));
  lines.push(keyValue('Intent', pack.analysis.intent));
  lines.push(keyValue('Domains', pack.analysis.domains.join(', ')));
  lines.push(keyValue('Cards used', String(pack.cardCount)));

  if (pack.usedCards.length > 0) {
    lines.push('');
    for (const card of pack.usedCards) {
      const hint = card.tagSearchHit ? chalk.magenta(' (tag match)') : '';
      lines.push(`  ${formatScore(card.relevanceScore)} ${typeColors[card.type](card.type.padEnd(10))} ${card.text}${hint}`);
    }
  }

  if (pack.conflicts.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Excluded:'));
    for (const conflict of pack.conflicts) {
      const reason = conflict.kind === 'prompt'
        ? `conflicts with ${conflict.source === 'prompt' ? 'the prompt' : `"${conflict.sourceText}"`}`
        : `overridden by profile card ${conflict.winnerId}`;
      lines.push(chalk.gray(`  ${icons.dot} ${conflict.cardText} (${conflict.axis}: ${reason})`));
    }
  }

  return lines.join('\n');
}

export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

export function header(text: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  return `\n${decoration}\n${chalk.bold.cyan(text)}\n${decoration}\n`;
}

export function keyValue(key: string, value: string, keyWidth: number = 12): string {
  return `${chalk.cyan(key.padEnd(keyWidth))} ${value}`;
}

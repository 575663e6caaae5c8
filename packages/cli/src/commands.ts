// ============================================================================
// @freqtable/cli — Commands
// ============================================================================
// Commands:
//   freqtable count <file> [--capacity N] [--top N] [--display] [--json]
//   freqtable hash  <word...> [--capacity N]
//   freqtable help
// ============================================================================

import { readFileSync } from 'node:fs';
import { DEFAULT_CAPACITY, FreqTableError, FrequencyTable, timer } from '@freqtable/core';
import type { Ui } from './ui.js';

const DEFAULT_TOP = 10;
const VALUE_FLAGS = new Set(['capacity', 'top']);

/**
 * Thrown for a malformed command line or unreadable input.
 */
export class UsageError extends FreqTableError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  out: Output;
  ui: Ui;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

export function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/**
 * Arguments after the command that are neither flags nor flag values.
 */
export function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (VALUE_FLAGS.has(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

function integerFlag(args: string[], name: string, fallback: number): number {
  const raw = getFlag(args, name);
  if (raw === undefined) {
    if (hasFlag(args, name)) throw new UsageError(`--${name} needs a value`);
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new UsageError(`invalid --${name} value: ${raw}`);
  }
  return value;
}

/**
 * Lower-cased runs of ASCII letters.
 */
export function extractWords(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

// ---------------------------------------------------------------------------
// count
// ---------------------------------------------------------------------------

export function countCommand(args: string[], { out, ui }: CliContext): number {
  const [file] = positionals(args);
  if (file === undefined) throw new UsageError('count needs a file: freqtable count <file>');

  const capacity = integerFlag(args, 'capacity', DEFAULT_CAPACITY);
  const topN = integerFlag(args, 'top', DEFAULT_TOP);
  if (topN < 0) throw new UsageError(`invalid --top value: ${topN}`);

  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (e) {
    throw new UsageError(`cannot read ${file}: ${errorMessage(e)}`);
  }

  const t = timer('count');
  const table = new FrequencyTable(capacity);
  const words = extractWords(text);
  for (const word of words) table.insert(word);
  const stats = table.getStats();
  const top = table.mostFrequent(topN);
  t.end({ words: words.length, distinct: stats.size });

  if (hasFlag(args, 'json')) {
    out.log(
      JSON.stringify(
        {
          file,
          totalWords: words.length,
          stats,
          top: top.map(([word, count]) => ({ word, count })),
        },
        null,
        2,
      ),
    );
    return 0;
  }

  const row = (label: string, value: string) => `${label.padEnd(16)}${ui.number(value)}`;
  out.log(
    ui.drawBox('Word Frequencies', 60, [
      `${'File'.padEnd(16)}${file}`,
      row('Total words', String(words.length)),
      row('Distinct words', String(stats.size)),
      row('Capacity', String(stats.capacity)),
      row('Load factor', stats.loadFactor.toFixed(3)),
      row('Collisions', String(stats.collisions)),
      row('Resizes', String(stats.resizes)),
    ]),
  );

  if (top.length > 0) {
    out.log('');
    out.log(ui.heading(`Top ${top.length} words`));
    out.log(ui.line);
    top.forEach(([word, count], i) => {
      out.log(`${String(i + 1).padStart(4)}. ${word.padEnd(20)} ${ui.number(String(count))}`);
    });
  }

  if (hasFlag(args, 'display')) {
    out.log('');
    out.log(table.display());
  }

  return 0;
}

// ---------------------------------------------------------------------------
// hash
// ---------------------------------------------------------------------------

export function hashCommand(args: string[], { out }: CliContext): number {
  const words = positionals(args);
  if (words.length === 0) throw new UsageError('hash needs at least one word');

  const table = new FrequencyTable(integerFlag(args, 'capacity', DEFAULT_CAPACITY));
  for (const word of words) {
    out.log(`${word}: ${table.hashOf(word)}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// help
// ---------------------------------------------------------------------------

export function printUsage({ out, ui }: CliContext): number {
  out.log(ui.heading('freqtable') + ' - word frequencies in an open-addressing hash table');
  out.log('');
  out.log('Usage:');
  out.log('  freqtable count <file> [--capacity N] [--top N] [--display] [--json]');
  out.log('  freqtable hash  <word...> [--capacity N]');
  out.log('');
  out.log(ui.dim('Set FREQTABLE_DEBUG=1 to log resizes and timings.'));
  return 0;
}

/**
 * Dispatch `args` (argv without the node and script paths) and return the
 * exit code. Errors are reported on `out.error`.
 */
export function runCli(args: string[], ctx: CliContext): number {
  try {
    switch (args[0]) {
      case 'count':
        return countCommand(args, ctx);
      case 'hash':
        return hashCommand(args, ctx);
      default:
        return printUsage(ctx);
    }
  } catch (error) {
    ctx.out.error(ctx.ui.fail(`Error: ${errorMessage(error)}`));
    return 1;
  }
}

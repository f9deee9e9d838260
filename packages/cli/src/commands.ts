import { Card, Deck, parseSeed } from '@deck-of-cards/core';

export const VERSION = '1.0.0';

export type OutputFormat = 'json' | 'table';

export interface CLIOptions {
  command: string;
  count: number;
  shuffle: boolean;
  reset: boolean;
  format: OutputFormat;
  seed?: number;
}

export interface DealReport {
  seed?: number;
  shuffled: boolean;
  dealt: Card[];
  cardsRemaining: number;
  /** Cards remaining after reset, when --reset was given */
  afterReset?: number;
}

function parseCount(value: string | undefined, flag: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`Invalid value for ${flag}: ${value ?? '(missing)'}`);
  }
  return parseInt(value, 10);
}

function parseSeedArg(value: string | undefined, flag: string): number {
  if (value === undefined) {
    throw new Error(`Invalid value for ${flag}: (missing)`);
  }
  try {
    return parseSeed(value);
  } catch {
    throw new Error(`Invalid value for ${flag}: ${value}`);
  }
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    count: 52,
    shuffle: false,
    reset: false,
    format: 'table'
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'deal':
        options.command = 'deal';
        break;

      case 'help':
      case '--help':
      case '-h':
        options.command = 'help';
        break;

      case '--version':
      case '-v':
        options.command = 'version';
        break;

      case '--count':
      case '-n':
        i++;
        options.count = parseCount(args[i], arg);
        break;

      case '--shuffle':
        options.shuffle = true;
        break;

      case '--reset':
        options.reset = true;
        break;

      case '--seed':
      case '-s':
        i++;
        options.seed = parseSeedArg(args[i], arg);
        break;

      case '--format':
      case '-f': {
        i++;
        const format = args[i];
        if (format !== 'json' && format !== 'table') {
          throw new Error(`Invalid format: ${format ?? '(missing)'}. Supported: json, table`);
        }
        options.format = format;
        break;
      }

      default:
        throw new Error(`Unknown argument: ${arg}`);
    }

    i++;
  }

  return options;
}

/**
 * Build a deck, optionally shuffle it, and deal the requested number of cards.
 * Throws EmptyDeckError when more cards are requested than the deck holds.
 */
export function runDeal(options: CLIOptions): DealReport {
  const deck = new Deck({ seed: options.seed });
  if (options.shuffle) {
    deck.shuffle();
  }

  const dealt = deck.dealMany(options.count);
  const report: DealReport = {
    seed: options.seed,
    shuffled: options.shuffle,
    dealt,
    cardsRemaining: deck.getCardsRemaining()
  };

  if (options.reset) {
    deck.reset();
    report.afterReset = deck.getCardsRemaining();
  }

  return report;
}

export function formatTable(report: DealReport): string[] {
  const lines: string[] = [];
  const order = report.shuffled
    ? `shuffled${report.seed !== undefined ? ` (seed ${report.seed})` : ''}`
    : 'unshuffled';
  lines.push(`Deck: ${order}`);

  report.dealt.forEach((card, index) => {
    lines.push(`Card ${index + 1}: ${card}`);
  });

  lines.push(`Cards remaining: ${report.cardsRemaining}`);
  if (report.afterReset !== undefined) {
    lines.push(`After reset: ${report.afterReset} cards remaining`);
  }
  return lines;
}

export function formatJSON(report: DealReport): string {
  return JSON.stringify({
    seed: report.seed ?? null,
    shuffled: report.shuffled,
    dealt: report.dealt.map(card => card.toNotation()),
    cardsRemaining: report.cardsRemaining,
    ...(report.afterReset !== undefined ? { afterReset: report.afterReset } : {})
  }, null, 2);
}

#!/usr/bin/env tsx

import {
  CLIOptions,
  VERSION,
  formatJSON,
  formatTable,
  parseArgs,
  runDeal
} from './commands.js';

function printHelp(): void {
  console.log(`
Deck Demo CLI v${VERSION}

USAGE:
  deck-demo <command> [options]

COMMANDS:
  deal             Deal cards from a fresh deck
  help             Show this help message

OPTIONS:
  -n, --count <n>          Number of cards to deal (default: 52)
  --shuffle                Shuffle the deck before dealing
  -s, --seed <n>           Random seed for a reproducible shuffle
  --reset                  Reset the deck after dealing
  -f, --format <format>    Output format: json, table (default: table)

EXAMPLES:
  # Deal five cards from a shuffled deck
  deck-demo deal --shuffle -n 5

  # Deal the whole deck in a reproducible order, as JSON
  deck-demo deal --shuffle --seed 42 -f json
`);
}

function printVersion(): void {
  console.log(`Deck Demo CLI v${VERSION}`);
}

function deal(options: CLIOptions): void {
  const report = runDeal(options);

  if (options.format === 'json') {
    console.log(formatJSON(report));
  } else {
    for (const line of formatTable(report)) {
      console.log(line);
    }
  }
}

function main(): void {
  const args = process.argv.slice(2);
  const options = parseArgs(args);

  switch (options.command) {
    case 'version':
      printVersion();
      break;

    case 'deal':
      deal(options);
      break;

    default:
      printHelp();
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}

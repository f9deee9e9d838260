import { Deck, parseSeed } from '@deck-of-cards/core';
import { createApp } from './app.js';

const PORT = Number(process.env.PORT) || 3000;

function readSeed(): number | undefined {
  const raw = process.env.DECK_SEED;
  if (raw === undefined || raw === '') return undefined;
  try {
    return parseSeed(raw);
  } catch {
    console.error(`Invalid DECK_SEED: ${raw}`);
    process.exit(1);
  }
}

const SEED = readSeed();

const app = createApp(new Deck({ seed: SEED }));

// Start server
const server = app.listen(PORT, () => {
  console.log(`
╔════════════════════════════════════════════════════════════╗
║                      Deck Demo                             ║
║                                                            ║
║   API running at: http://localhost:${PORT}/api/deck          ║
║                                                            ║
║   Press Ctrl+C to stop the server                          ║
╚════════════════════════════════════════════════════════════╝
`);
});

// Graceful shutdown
function shutdown(): void {
  console.log('\nShutting down...');
  server.close(() => {
    console.log('Server stopped.');
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

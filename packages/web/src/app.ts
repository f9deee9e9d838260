import express, { Request, Response } from 'express';
import { Deck, EmptyDeckError } from '@deck-of-cards/core';
import { toCardView, toDeckStatus } from './deckView.js';

/**
 * Build the express app around a single deck.
 *
 * The deck itself is not synchronized; every handler here runs to
 * completion on the event loop, so isEmpty/deal pairs never interleave.
 */
export function createApp(deck: Deck): express.Express {
  const app = express();

  app.use(express.json());

  // API Routes

  // Deck status
  app.get('/api/deck', (req: Request, res: Response) => {
    res.json(toDeckStatus(deck));
  });

  // Undealt cards, next card to deal last
  app.get('/api/deck/cards', (req: Request, res: Response) => {
    res.json({ cards: deck.peekRemaining().map(toCardView) });
  });

  app.post('/api/deck/shuffle', (req: Request, res: Response) => {
    deck.shuffle();
    console.log(`Shuffled ${deck.getCardsRemaining()} cards`);
    res.json(toDeckStatus(deck));
  });

  app.post('/api/deck/deal', (req: Request, res: Response) => {
    try {
      const card = deck.dealOneCard();
      res.json({ card: toCardView(card), cardsRemaining: deck.getCardsRemaining() });
    } catch (error) {
      if (error instanceof EmptyDeckError) {
        res.status(409).json({ error: error.message });
        return;
      }
      console.error('Deal error:', error);
      res.status(500).json({ error: 'Deal failed', details: String(error) });
    }
  });

  app.post('/api/deck/reset', (req: Request, res: Response) => {
    deck.reset();
    console.log('Deck reset');
    res.json(toDeckStatus(deck));
  });

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}

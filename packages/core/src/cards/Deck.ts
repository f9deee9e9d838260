import { Card, fullDeckCards } from './Card.js';
import { EmptyDeckError } from './EmptyDeckError.js';
import { createRng, randomIndex } from '../utils/random.js';
import type { RandomSource } from '../utils/random.js';

export interface DeckOptions {
  /** Seed for a reproducible shuffle order */
  seed?: number;
  /** Custom random source; takes precedence over `seed` */
  rng?: RandomSource;
}

/**
 * A standard 52-card deck with shuffle and deal operations.
 *
 * Dealt cards are never removed. The deck keeps all 52 cards in a fixed
 * array and a cursor marking how many from the front are still undealt
 * (the live prefix). Cards are dealt from the end of the live prefix,
 * and reset() simply moves the cursor back, so the deck becomes full again
 * in whatever order the last shuffle left it.
 *
 * Not synchronized. isEmpty() followed by dealOneCard() is not atomic;
 * callers sharing one deck between independent flows of control must hold
 * their own lock across both calls.
 */
export class Deck {
  private readonly cards: Card[];
  private cardsRemaining: number;
  private readonly rng: RandomSource;

  /** Create a new, unshuffled deck in canonical order */
  constructor(options: DeckOptions = {}) {
    this.cards = fullDeckCards();
    this.cardsRemaining = this.cards.length;
    this.rng = options.rng ?? createRng(options.seed);
  }

  /** Number of undealt cards */
  get remaining(): number {
    return this.cardsRemaining;
  }

  /** Total cards in deck (including dealt) */
  get size(): number {
    return this.cards.length;
  }

  getCardsRemaining(): number {
    return this.cardsRemaining;
  }

  /**
   * Fisher-Yates shuffle of the undealt cards. Positions past the cursor
   * are left alone.
   */
  shuffle(): void {
    const arr = this.cards;
    // Stops at 1: swapping index 0 with itself is a no-op.
    for (let i = this.cardsRemaining - 1; i > 0; i--) {
      const j = randomIndex(this.rng, i + 1);
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
  }

  isEmpty(): boolean {
    return this.cardsRemaining === 0;
  }

  /**
   * Deal the top card, the last one in the live prefix.
   *
   * @throws EmptyDeckError if no cards remain
   */
  dealOneCard(): Card {
    if (this.cardsRemaining === 0) {
      throw new EmptyDeckError();
    }
    this.cardsRemaining--;
    return this.cards[this.cardsRemaining];
  }

  /** Deal multiple cards, in deal order */
  dealMany(count: number): Card[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Invalid card count: ${count}`);
    }
    const dealt: Card[] = [];
    for (let i = 0; i < count; i++) {
      dealt.push(this.dealOneCard());
    }
    return dealt;
  }

  /** Return every dealt card to the deck without reordering */
  reset(): void {
    this.cardsRemaining = this.cards.length;
  }

  /** Get the undealt cards without dealing them; the next card to deal is last */
  peekRemaining(): Card[] {
    return this.cards.slice(0, this.cardsRemaining);
  }

  /**
   * Same concrete class, same number of cards remaining, and the same
   * undealt cards in the same order. Dealt cards are ignored, so two
   * empty decks are always equal.
   */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof Deck) || other.constructor !== this.constructor) {
      return false;
    }
    if (this.cardsRemaining !== other.cardsRemaining) {
      return false;
    }
    for (let i = 0; i < this.cardsRemaining; i++) {
      if (!this.cards[i].equals(other.cards[i])) {
        return false;
      }
    }
    return true;
  }

  /** Rolling hash over the undealt cards, consistent with equals() */
  hashCode(): number {
    let hash = 1;
    for (let i = 0; i < this.cardsRemaining; i++) {
      hash = (Math.imul(hash, 31) + this.cards[i].hashCode()) | 0;
    }
    return hash;
  }
}

import { Card, Deck, Rank, Suit, CardNotation } from '@deck-of-cards/core';

/** JSON shape of a card in API responses */
export interface CardView {
  rank: Rank;
  suit: Suit;
  notation: CardNotation;
  name: string;
}

export interface DeckStatus {
  cardsRemaining: number;
  isEmpty: boolean;
  size: number;
}

export function toCardView(card: Card): CardView {
  return {
    rank: card.rank,
    suit: card.suit,
    notation: card.toNotation(),
    name: card.toString()
  };
}

export function toDeckStatus(deck: Deck): DeckStatus {
  return {
    cardsRemaining: deck.getCardsRemaining(),
    isEmpty: deck.isEmpty(),
    size: deck.size
  };
}

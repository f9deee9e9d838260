/**
 * Card ranks: 2-14 where 11=Jack, 12=Queen, 13=King, 14=Ace
 */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

/**
 * Card suits, in enumeration order: hearts, diamonds, spades, clubs
 */
export type Suit = 'h' | 'd' | 's' | 'c';

/**
 * String notation for a card, e.g., "Ah", "Td", "7c"
 */
export type CardNotation = string;

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const;
export const SUITS: readonly Suit[] = ['h', 'd', 's', 'c'] as const;

const RANK_CHARS: Record<Rank, string> = {
  2: '2', 3: '3', 4: '4', 5: '5', 6: '6', 7: '7', 8: '8', 9: '9', 10: 'T',
  11: 'J', 12: 'Q', 13: 'K', 14: 'A'
};

const RANK_NAMES: Record<Rank, string> = {
  2: '2', 3: '3', 4: '4', 5: '5', 6: '6', 7: '7', 8: '8', 9: '9', 10: '10',
  11: 'Jack', 12: 'Queen', 13: 'King', 14: 'Ace'
};

const CHAR_TO_RANK: Record<string, Rank> = {
  '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9, 'T': 10, '10': 10,
  'J': 11, 'Q': 12, 'K': 13, 'A': 14
};

const SUIT_NAMES: Record<Suit, string> = {
  'h': 'Hearts', 'd': 'Diamonds', 's': 'Spades', 'c': 'Clubs'
};

/** Position of the rank in enumeration order (Two = 0, Ace = 12) */
export function rankOrdinal(rank: Rank): number {
  return rank - 2;
}

/** Position of the suit in enumeration order (Hearts = 0, Clubs = 3) */
export function suitOrdinal(suit: Suit): number {
  return SUITS.indexOf(suit);
}

/** Display name: "2".."10", "Jack", "Queen", "King", "Ace" */
export function rankName(rank: Rank): string {
  return RANK_NAMES[rank];
}

export function suitName(suit: Suit): string {
  return SUIT_NAMES[suit];
}

/**
 * Immutable representation of a playing card.
 *
 * Equality is type-exact: a subclass of Card never equals a plain Card,
 * even with the same rank and suit.
 */
export class Card {
  /** Compact encoding: rank ordinal in the high byte, suit ordinal in the low byte */
  private readonly _encoded: number;

  constructor(rank: Rank, suit: Suit) {
    this._encoded = (rankOrdinal(rank) << 8) | suitOrdinal(suit);
  }

  /** Create a card from rank and suit */
  static create(rank: Rank, suit: Suit): Card {
    return new Card(rank, suit);
  }

  /** Parse card from string notation like "Ah", "10d", "7c" */
  static parse(notation: CardNotation): Card {
    const trimmed = notation.trim();
    if (trimmed.length < 2 || trimmed.length > 3) {
      throw new Error(`Invalid card notation: ${notation}`);
    }

    const rankStr = trimmed.slice(0, -1).toUpperCase();
    const suitChar = trimmed[trimmed.length - 1].toLowerCase();

    const rank = CHAR_TO_RANK[rankStr];
    if (rank === undefined) {
      throw new Error(`Invalid rank in notation: ${notation}`);
    }

    const suit = SUITS.find(s => s === suitChar);
    if (suit === undefined) {
      throw new Error(`Invalid suit in notation: ${notation}`);
    }

    return new Card(rank, suit);
  }

  get rank(): Rank {
    return RANKS[this._encoded >> 8];
  }

  get suit(): Suit {
    return SUITS[this._encoded & 0xFF];
  }

  getRank(): Rank {
    return this.rank;
  }

  getSuit(): Suit {
    return this.suit;
  }

  /** Compact notation like "Ah", "Td" */
  toNotation(): CardNotation {
    return `${RANK_CHARS[this.rank]}${this.suit}`;
  }

  /** Human-readable format like "Ace of Spades" */
  toString(): string {
    return `${rankName(this.rank)} of ${suitName(this.suit)}`;
  }

  /** Same concrete class, same rank and suit */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof Card) || other.constructor !== this.constructor) {
      return false;
    }
    return this._encoded === other._encoded;
  }

  /** (rank ordinal << 8) | suit ordinal */
  hashCode(): number {
    return this._encoded;
  }
}

/** All 52 cards in canonical order: ranks ascending, suits in enumeration order within each rank */
export function fullDeckCards(): Card[] {
  const cards: Card[] = [];
  for (const rank of RANKS) {
    for (const suit of SUITS) {
      cards.push(Card.create(rank, suit));
    }
  }
  return cards;
}

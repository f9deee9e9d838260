export const EMPTY_DECK_MESSAGE = 'No cards remaining to deal!';

/**
 * Raised when a card is dealt from a deck with no cards remaining.
 */
export class EmptyDeckError extends Error {
  constructor(message: string = EMPTY_DECK_MESSAGE, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EmptyDeckError';
  }
}

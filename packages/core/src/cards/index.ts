export * from './Card.js';
export * from './Deck.js';
export * from './EmptyDeckError.js';

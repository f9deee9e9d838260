// Core playing-card library

// Cards, deck and dealing errors
export * from './cards/index.js';

// Random sources for shuffling
export * from './utils/random.js';

/**
 * Card System Module
 *
 * Card identity, ranks, suits and colours, the standard deck, and
 * seeded shuffling.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and helpers
export type { Card, Rank, Suit, SuitColor, FaceState } from './Card';
export {
  RANKS,
  SUITS,
  createCard,
  rankValue,
  nextRank,
  previousRank,
  suitColor,
  isOppositeColor,
  sameCard,
  cardLabel,
} from './Card';

// Deck factory and shuffling
export {
  DECK_SIZE,
  createStandardDeck,
  shuffle,
  shuffleWithSeed,
} from './Deck';

// Seeded generator
export { MAX_SEED, createSeededRng, randomSeed } from './SeededRng';

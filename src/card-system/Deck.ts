/**
 * Deck operations for the solitaire engine.
 *
 * A Deck is a plain Card array. The shuffle is Fisher-Yates driven by
 * an injectable generator, so a seed fully determines the order.
 */

import type { Card } from './Card';
import { RANKS, SUITS, createCard } from './Card';
import { createSeededRng } from './SeededRng';

/** Number of cards in a standard deck. */
export const DECK_SIZE = 52;

/**
 * Create a standard 52-card deck (no jokers).
 *
 * Cards are ordered by suit (alphabetical) then rank (A through K).
 */
export function createStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Shuffle a deck in place using the Fisher-Yates algorithm.
 *
 * The generator must return values in [0, 1) (same contract as
 * Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle<T>(deck: T[], rng: () => number = Math.random): T[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}

/**
 * Return a new permutation of the deck determined entirely by `seed`.
 * The input array is left untouched.
 */
export function shuffleWithSeed(deck: readonly Card[], seed: number): Card[] {
  return shuffle([...deck], createSeededRng(seed));
}

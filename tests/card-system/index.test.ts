import { describe, it, expect } from 'vitest';
import {
  CARD_SYSTEM_VERSION,
  DECK_SIZE,
  RANKS,
  SUITS,
  createCard,
  createStandardDeck,
  shuffleWithSeed,
  cardLabel,
} from '../../src/card-system/index';

describe('card-system barrel exports', () => {
  it('should export the module version', () => {
    expect(CARD_SYSTEM_VERSION).toBe('0.1.0');
  });

  it('should export Card factory and helpers', () => {
    expect(cardLabel(createCard('A', 'spades'))).toBe('A♠');
  });

  it('should export rank and suit constants', () => {
    expect(RANKS).toHaveLength(13);
    expect(SUITS).toHaveLength(4);
  });

  it('should export Deck functions', () => {
    expect(shuffleWithSeed(createStandardDeck(), 3)).toHaveLength(DECK_SIZE);
  });
});

/**
 * Card types and helpers for the solitaire engine.
 *
 * Defines Rank, Suit, colour and face state as the foundational data
 * model. A Card here is identity only (rank and suit); whether it is
 * face-up is a separate component, since it changes during play while
 * identity never does.
 */

/** All ranks in order (Ace low). */
export const RANKS = [
  'A',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  'J',
  'Q',
  'K',
] as const;

/** Standard playing card ranks. */
export type Rank = (typeof RANKS)[number];

/** All suits in alphabetical order. */
export const SUITS = ['clubs', 'diamonds', 'hearts', 'spades'] as const;

/** Standard playing card suits. */
export type Suit = (typeof SUITS)[number];

export type SuitColor = 'red' | 'black';

/** Whether a card shows its face. */
export type FaceState = 'face-up' | 'face-down';

/**
 * A playing card's identity. Fixed at creation.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

/** Create a card identity. */
export function createCard(rank: Rank, suit: Suit): Card {
  return { rank, suit };
}

// ── Rank utilities ──────────────────────────────────────────

/**
 * Get the numeric value of a rank (A=0, K=12).
 */
export function rankValue(rank: Rank): number {
  return RANKS.indexOf(rank);
}

/**
 * Return the next rank up, or undefined after King.
 */
export function nextRank(rank: Rank): Rank | undefined {
  const idx = rankValue(rank);
  return idx < RANKS.length - 1 ? RANKS[idx + 1] : undefined;
}

/**
 * Return the next rank down, or undefined below Ace.
 */
export function previousRank(rank: Rank): Rank | undefined {
  const idx = rankValue(rank);
  return idx > 0 ? RANKS[idx - 1] : undefined;
}

// ── Suit utilities ──────────────────────────────────────────

const SUIT_COLOR: Record<Suit, SuitColor> = {
  clubs: 'black',
  diamonds: 'red',
  hearts: 'red',
  spades: 'black',
};

const SUIT_SYMBOL: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
};

export function suitColor(suit: Suit): SuitColor {
  return SUIT_COLOR[suit];
}

/** Whether two cards sit in suits of different colours. */
export function isOppositeColor(a: Card, b: Card): boolean {
  return SUIT_COLOR[a.suit] !== SUIT_COLOR[b.suit];
}

/** Whether two references name the same card. */
export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Human-readable label, e.g. `10♥` or `K♠`. */
export function cardLabel(card: Card): string {
  return `${card.rank}${SUIT_SYMBOL[card.suit]}`;
}

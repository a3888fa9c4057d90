/**
 * Shared card projection types for the solitaire engine.
 *
 * CardView is the only card shape that leaves the engine: hosts render
 * it, transcripts store it, and saved boards are rebuilt from it.
 * Internal entity ids never appear in it.
 */

import type { Card, FaceState, Rank, Suit } from '../card-system/Card';

// ── Projection types ────────────────────────────────────────

/**
 * Serializable card projection (no methods, no entity ids).
 */
export interface CardView {
  readonly rank: Rank;
  readonly suit: Suit;
  readonly faceState: FaceState;
}

// ── Helpers ─────────────────────────────────────────────────

/**
 * Project a card identity and its face state into a CardView.
 */
export function toCardView(card: Card, faceState: FaceState): CardView {
  return {
    rank: card.rank,
    suit: card.suit,
    faceState,
  };
}

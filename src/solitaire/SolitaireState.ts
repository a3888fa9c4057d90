/**
 * Klondike state types.
 *
 * Constants of the layout, pile identifiers, the closed move union,
 * and the values the engine hands back to its host (status, outcomes,
 * rejections, board snapshots). Everything here is plain data that can
 * cross the embedding or network boundary; no entity ids appear.
 */

import type { Card, Suit } from '../card-system/Card';
import { SUITS } from '../card-system/Card';
import type { CardView } from '../core-engine/TranscriptTypes';

// ── Constants ───────────────────────────────────────────────

/** Number of tableau columns. */
export const TABLEAU_COUNT = 7;

/** Number of foundation piles (one per suit). */
export const FOUNDATION_COUNT = 4;

/** Cards in a complete foundation (Ace through King). */
export const CARDS_PER_FOUNDATION = 13;

/** Foundation suit order (matches SUITS from card-system). */
export const FOUNDATION_SUITS: readonly Suit[] = SUITS;

export const TABLEAU_INDICES = [0, 1, 2, 3, 4, 5, 6] as const;

export type TableauIndex = (typeof TABLEAU_INDICES)[number];

// ── Piles ───────────────────────────────────────────────────

/** What a pile entity is. Fixed once the layout is built. */
export type PileKind =
  | { readonly kind: 'tableau'; readonly index: TableauIndex }
  | { readonly kind: 'foundation'; readonly suit: Suit }
  | { readonly kind: 'stock' }
  | { readonly kind: 'waste' };

/** Every pile id, in layout order. */
export const PILE_IDS = [
  'stock',
  'waste',
  'foundation-clubs',
  'foundation-diamonds',
  'foundation-hearts',
  'foundation-spades',
  'tableau-0',
  'tableau-1',
  'tableau-2',
  'tableau-3',
  'tableau-4',
  'tableau-5',
  'tableau-6',
] as const;

/** Public pile identifier, e.g. `tableau-3` or `foundation-hearts`. */
export type PileId = (typeof PILE_IDS)[number];

const PILE_KINDS: Readonly<Record<PileId, PileKind>> = {
  stock: { kind: 'stock' },
  waste: { kind: 'waste' },
  'foundation-clubs': { kind: 'foundation', suit: 'clubs' },
  'foundation-diamonds': { kind: 'foundation', suit: 'diamonds' },
  'foundation-hearts': { kind: 'foundation', suit: 'hearts' },
  'foundation-spades': { kind: 'foundation', suit: 'spades' },
  'tableau-0': { kind: 'tableau', index: 0 },
  'tableau-1': { kind: 'tableau', index: 1 },
  'tableau-2': { kind: 'tableau', index: 2 },
  'tableau-3': { kind: 'tableau', index: 3 },
  'tableau-4': { kind: 'tableau', index: 4 },
  'tableau-5': { kind: 'tableau', index: 5 },
  'tableau-6': { kind: 'tableau', index: 6 },
};

export function tableauId(index: TableauIndex): PileId {
  return `tableau-${index}`;
}

export function foundationId(suit: Suit): PileId {
  return `foundation-${suit}`;
}

/** The id of a pile kind. */
export function pileIdOf(pile: PileKind): PileId {
  switch (pile.kind) {
    case 'tableau':
      return tableauId(pile.index);
    case 'foundation':
      return foundationId(pile.suit);
    case 'stock':
    case 'waste':
      return pile.kind;
  }
}

/** The pile kind an id names. */
export function pileKindOf(id: PileId): PileKind {
  return PILE_KINDS[id];
}

// ── Move types ──────────────────────────────────────────────

/**
 * Move a face-up run (the named card and everything above it) between
 * tableau columns.
 */
export interface TableauToTableauMove {
  readonly kind: 'tableau-to-tableau';
  readonly card: Card;
  readonly from: TableauIndex;
  readonly to: TableauIndex;
}

/** Move a tableau column's top card onto its foundation. */
export interface TableauToFoundationMove {
  readonly kind: 'tableau-to-foundation';
  readonly card: Card;
  readonly to: Suit;
}

/** Take a foundation's top card back down onto a tableau column. */
export interface FoundationToTableauMove {
  readonly kind: 'foundation-to-tableau';
  readonly card: Card;
  readonly from: Suit;
  readonly to: TableauIndex;
}

/**
 * Draw the stock's top card onto the waste, face-up. On an empty stock
 * this recycles the waste instead.
 */
export interface StockToWasteMove {
  readonly kind: 'stock-to-waste';
}

/** Turn the waste over into the empty stock (order reversed, face-down). */
export interface RecycleWasteMove {
  readonly kind: 'recycle-waste';
}

/** Play the waste's top card onto a tableau column. */
export interface WasteToTableauMove {
  readonly kind: 'waste-to-tableau';
  readonly card: Card;
  readonly to: TableauIndex;
}

/** Play the waste's top card onto its foundation. */
export interface WasteToFoundationMove {
  readonly kind: 'waste-to-foundation';
  readonly card: Card;
  readonly to: Suit;
}

/**
 * Any move in Klondike. Closed union: `switch (move.kind)` must be
 * exhaustive wherever moves are checked or applied.
 */
export type Move =
  | TableauToTableauMove
  | TableauToFoundationMove
  | FoundationToTableauMove
  | StockToWasteMove
  | RecycleWasteMove
  | WasteToTableauMove
  | WasteToFoundationMove;

export type MoveKind = Move['kind'];

// ── Outcomes ────────────────────────────────────────────────

export type GameStatus = 'in-progress' | 'won' | 'no-legal-moves';

/** Why a proposed move was refused. */
export type IllegalMoveReason =
  | 'not-top-of-pile'
  | 'wrong-rank'
  | 'wrong-color'
  | 'wrong-suit'
  | 'same-pile'
  | 'destination-full'
  | 'stock-empty'
  | 'recycle-limit-exceeded'
  | 'invariant-violation';

/** A rejected move. The world is untouched when one is returned. */
export interface IllegalMove {
  readonly reason: IllegalMoveReason;
  readonly move: Move;
  readonly message: string;
}

/** What an accepted move did, as seen from outside the engine. */
export interface AppliedMove {
  readonly move: Move;
  readonly from: PileId;
  readonly to: PileId;
  /** The cards that moved, bottom to top in their new pile. */
  readonly cards: readonly CardView[];
  /** The tableau card turned face-up by this move, if any. */
  readonly flipped: CardView | null;
  /** Whether the move turned the waste over into the stock. */
  readonly recycled: boolean;
  /** Moves made so far, including this one. */
  readonly moveCount: number;
}

/** An accepted move plus the game status after it. */
export interface MoveOutcome extends AppliedMove {
  readonly status: GameStatus;
}

// ── Board snapshot ──────────────────────────────────────────

/**
 * Every pile as CardView projections, bottom to top.
 *
 * This is the save format the host may persist, and the shape
 * `buildFromBoard` accepts.
 */
export interface BoardSnapshot {
  readonly stock: readonly CardView[];
  readonly waste: readonly CardView[];
  readonly foundations: Readonly<Record<Suit, readonly CardView[]>>;
  readonly tableau: ReadonlyArray<readonly CardView[]>;
}

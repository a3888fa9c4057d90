/**
 * Board builders for solitaire tests.
 *
 * Cards are written as short codes: rank then suit letter, e.g. `10h`,
 * `Ks`, `Ac`. A leading `~` marks a face-down card (`~Qd`). Every card
 * not placed explicitly is added as filler so the board always holds
 * the full deck.
 */

import { RANKS, SUITS } from '../../src/card-system/Card';
import type { Card, Rank, Suit } from '../../src/card-system/Card';
import type { CardView } from '../../src/core-engine/TranscriptTypes';
import type { SolitaireWorld } from '../../src/solitaire/SolitaireComponents';
import { buildFromBoard } from '../../src/solitaire/SolitaireLayout';
import type { GameOptions } from '../../src/solitaire/SolitaireOptions';
import type { BoardSnapshot, TableauIndex } from '../../src/solitaire/SolitaireState';

const SUIT_LETTERS: Record<string, Suit> = {
  c: 'clubs',
  d: 'diamonds',
  h: 'hearts',
  s: 'spades',
};

function isRank(value: string): value is Rank {
  return RANKS.some((rank) => rank === value);
}

/** Parse a card code such as `10h` into a card identity. */
export function card(code: string): Card {
  const rank = code.slice(0, -1);
  const suit = SUIT_LETTERS[code.slice(-1)];
  if (!isRank(rank) || suit === undefined) {
    throw new Error(`Bad card code "${code}"`);
  }
  return { rank, suit };
}

/** Parse a card code into a view; `~` prefix means face-down. */
export function view(code: string): CardView {
  const faceDown = code.startsWith('~');
  const identity = card(faceDown ? code.slice(1) : code);
  return { ...identity, faceState: faceDown ? 'face-down' : 'face-up' };
}

export interface BoardShape {
  /** Stock, bottom to top; always face-down. */
  stock?: string[];
  /** Waste, bottom to top; always face-up. */
  waste?: string[];
  /** Cards on each foundation, counted from the Ace. */
  foundations?: Partial<Record<Suit, number>>;
  /** Columns, bottom to top. */
  tableau?: string[][];
  /**
   * Where unplaced cards go: under the stock (default) or face-down at
   * the bottom of a tableau column.
   */
  filler?: 'stock' | TableauIndex;
}

/** Build a full 52-card board from a partial description. */
export function board(shape: BoardShape): BoardSnapshot {
  const used = new Set<string>();
  const mark = (c: Card): void => {
    used.add(`${c.rank}-${c.suit}`);
  };

  const stock: CardView[] = (shape.stock ?? []).map((code): CardView => ({
    ...card(code.replace('~', '')),
    faceState: 'face-down',
  }));
  const waste: CardView[] = (shape.waste ?? []).map((code): CardView => ({
    ...card(code),
    faceState: 'face-up',
  }));
  const tableau: CardView[][] = Array.from({ length: 7 }, (_, i) =>
    (shape.tableau?.[i] ?? []).map(view),
  );

  const foundations: Record<Suit, CardView[]> = {
    clubs: [],
    diamonds: [],
    hearts: [],
    spades: [],
  };
  for (const suit of SUITS) {
    const count = shape.foundations?.[suit] ?? 0;
    foundations[suit] = RANKS.slice(0, count).map((rank): CardView => ({
      rank,
      suit,
      faceState: 'face-up',
    }));
  }

  [
    ...stock,
    ...waste,
    ...tableau.flat(),
    ...Object.values(foundations).flat(),
  ].forEach(mark);

  const filler: CardView[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      if (!used.has(`${rank}-${suit}`)) {
        filler.push({ rank, suit, faceState: 'face-down' });
      }
    }
  }

  const target = shape.filler ?? 'stock';
  if (target === 'stock') {
    stock.unshift(...filler);
  } else {
    tableau[target].unshift(...filler);
  }

  return { stock, waste, foundations, tableau };
}

/** Build a world from a partial board description. */
export function worldFrom(
  shape: BoardShape,
  options: GameOptions = {},
): SolitaireWorld {
  return buildFromBoard(board(shape), options);
}

/** Card codes of a pile view, `~` marking face-down cards. */
export function codes(cards: readonly CardView[]): string[] {
  const letter: Record<Suit, string> = {
    clubs: 'c',
    diamonds: 'd',
    hearts: 'h',
    spades: 's',
  };
  return cards.map(
    (c) => `${c.faceState === 'face-down' ? '~' : ''}${c.rank}${letter[c.suit]}`,
  );
}

/** A board with every card on its foundation. */
export function wonBoard(): BoardSnapshot {
  return board({
    foundations: { clubs: 13, diamonds: 13, hearts: 13, spades: 13 },
  });
}

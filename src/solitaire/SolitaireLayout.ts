/**
 * Klondike layout builder.
 *
 * Turns a seed (or a saved board) into a fully populated world:
 * 13 pile entities, a table entity holding the rules and counters, and
 * one entity per card with identity, face state and pile membership.
 *
 * Classic deal:
 * - Shuffle a standard deck with the seeded generator.
 * - Deal row by row: pass r gives one card to each column r..6, so
 *   column i ends with i+1 cards. Only each column's last card is
 *   face-up.
 * - The 24 undealt cards form the stock, face-down; the last card of
 *   the shuffled deck is the stock's top.
 * - Waste and foundations start empty.
 */

import type { Suit } from '../card-system/Card';
import { createStandardDeck, shuffleWithSeed } from '../card-system/Deck';
import type { CardView } from '../core-engine/TranscriptTypes';
import { toCardView } from '../core-engine/TranscriptTypes';
import type { GameProgress, SolitaireWorld } from './SolitaireComponents';
import { createSolitaireWorld } from './SolitaireComponents';
import type { GameOptions, RuleSet } from './SolitaireOptions';
import { resolveRules, validateSeed } from './SolitaireOptions';
import { validateBoard } from './SolitaireInvariants';
import type { BoardSnapshot, PileId } from './SolitaireState';
import {
  PILE_IDS,
  TABLEAU_COUNT,
  TABLEAU_INDICES,
  pileKindOf,
} from './SolitaireState';
import { LayoutError } from './errors';

// ── Deal ────────────────────────────────────────────────────

/**
 * Compute the classic deal for a seed as a board projection.
 *
 * @throws SeedError if the seed is malformed.
 */
export function dealBoard(seed: number): BoardSnapshot {
  const deck = shuffleWithSeed(createStandardDeck(), validateSeed(seed));
  const tableau: CardView[][] = TABLEAU_INDICES.map(() => []);
  let next = 0;
  for (let row = 0; row < TABLEAU_COUNT; row++) {
    for (let col = row; col < TABLEAU_COUNT; col++) {
      tableau[col].push(toCardView(deck[next++], row === col ? 'face-up' : 'face-down'));
    }
  }

  const foundations: Record<Suit, CardView[]> = {
    clubs: [],
    diamonds: [],
    hearts: [],
    spades: [],
  };

  return {
    stock: deck.slice(next).map((card) => toCardView(card, 'face-down')),
    waste: [],
    foundations,
    tableau,
  };
}

// ── World construction ──────────────────────────────────────

function pileContents(board: BoardSnapshot, id: PileId): readonly CardView[] {
  const kind = pileKindOf(id);
  switch (kind.kind) {
    case 'stock':
      return board.stock;
    case 'waste':
      return board.waste;
    case 'foundation':
      return board.foundations[kind.suit];
    case 'tableau':
      return board.tableau[kind.index];
  }
}

function populate(
  board: BoardSnapshot,
  rules: RuleSet,
  progress: GameProgress,
): SolitaireWorld {
  const world = createSolitaireWorld();

  const table = world.spawn();
  world.set(table, 'rules', rules);
  world.set(table, 'progress', progress);

  for (const id of PILE_IDS) {
    const pile = world.spawn();
    world.set(pile, 'pileKind', pileKindOf(id));

    pileContents(board, id).forEach((view, position) => {
      const card = world.spawn();
      world.set(card, 'cardIdentity', { rank: view.rank, suit: view.suit });
      world.set(card, 'faceState', view.faceState);
      world.set(card, 'pileMembership', { pile, position });
    });
  }

  return world;
}

/**
 * Build a freshly dealt world.
 *
 * @param seed     Unsigned 32-bit seed; the same seed always gives the
 *                 same deal.
 * @param options  Rule options, resolved with defaults.
 * @throws SeedError if the seed is malformed.
 */
export function buildLayout(
  seed: number,
  options: GameOptions = {},
): SolitaireWorld {
  const board = dealBoard(seed);
  return populate(board, resolveRules(options), { seed, moves: 0, recycles: 0 });
}

/**
 * Rebuild a world from a board projection (a saved game).
 *
 * @param progress  Counters to resume from. The seed defaults to `null`,
 *                  the move and recycle counts to 0.
 * @throws LayoutError if the board breaks a world invariant or a
 *                     counter is negative.
 */
export function buildFromBoard(
  board: BoardSnapshot,
  options: GameOptions = {},
  progress: Partial<GameProgress> = {},
): SolitaireWorld {
  const { seed = null, moves = 0, recycles = 0 } = progress;
  const problems = validateBoard(board);
  if (!Number.isInteger(moves) || moves < 0) {
    problems.push(`move count must be a non-negative integer, got ${moves}`);
  }
  if (!Number.isInteger(recycles) || recycles < 0) {
    problems.push(`recycle count must be a non-negative integer, got ${recycles}`);
  }
  if (problems.length > 0) {
    throw new LayoutError(problems);
  }
  return populate(board, resolveRules(options), { seed, moves, recycles });
}

/** Tableau column sizes of a board, left to right. */
export function tableauSizes(board: BoardSnapshot): number[] {
  return board.tableau.map((column) => column.length);
}

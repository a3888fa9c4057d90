/**
 * World invariants of Klondike, as checks that report instead of throw.
 *
 * 1. Every card has exactly one pile membership, on a real pile.
 * 2. Positions within a pile are 0..n-1 with no gaps or duplicates.
 * 3. The piles hold the 52 cards of one deck exactly once.
 * 4. Foundations are same-suit runs from Ace; a tableau column's
 *    face-up cards are its top segment and run down in alternating
 *    colours; stock cards are face-down, waste cards face-up.
 *
 * Invariant 4 is checked on the board projection, which is also what
 * `buildFromBoard` validates before it builds anything.
 */

import type { Card } from '../card-system/Card';
import {
  cardLabel,
  isOppositeColor,
  rankValue,
} from '../card-system/Card';
import { DECK_SIZE } from '../card-system/Deck';
import { sameEntity } from '../ecs/Entity';
import type { Entity } from '../ecs/Entity';
import type { CardView } from '../core-engine/TranscriptTypes';
import type { SolitaireWorld } from './SolitaireComponents';
import { snapshotBoard } from './PileQueries';
import type { BoardSnapshot } from './SolitaireState';
import { FOUNDATION_SUITS, TABLEAU_COUNT } from './SolitaireState';

function key(card: Card): string {
  return `${card.rank}-${card.suit}`;
}

/**
 * Validate a board projection against invariants 3 and 4.
 *
 * @returns A list of problems; empty when the board is valid.
 */
export function validateBoard(board: BoardSnapshot): string[] {
  const problems: string[] = [];

  if (board.tableau.length !== TABLEAU_COUNT) {
    problems.push(
      `expected ${TABLEAU_COUNT} tableau columns, got ${board.tableau.length}`,
    );
  }

  // Deck completeness
  const all: CardView[] = [
    ...board.stock,
    ...board.waste,
    ...FOUNDATION_SUITS.flatMap((suit) => board.foundations[suit]),
    ...board.tableau.flat(),
  ];
  const seen = new Set<string>();
  for (const card of all) {
    const id = key(card);
    if (seen.has(id)) {
      problems.push(`${cardLabel(card)} appears more than once`);
    }
    seen.add(id);
  }
  if (all.length !== DECK_SIZE || seen.size !== DECK_SIZE) {
    problems.push(
      `expected ${DECK_SIZE} distinct cards, got ${seen.size} distinct of ${all.length}`,
    );
  }

  // Face states
  if (board.stock.some((c) => c.faceState !== 'face-down')) {
    problems.push('stock cards must be face-down');
  }
  if (board.waste.some((c) => c.faceState !== 'face-up')) {
    problems.push('waste cards must be face-up');
  }

  // Foundations: Ace upward, one suit
  for (const suit of FOUNDATION_SUITS) {
    board.foundations[suit].forEach((card, i) => {
      if (card.suit !== suit || rankValue(card.rank) !== i) {
        problems.push(
          `foundation-${suit} position ${i} holds ${cardLabel(card)}`,
        );
      }
      if (card.faceState !== 'face-up') {
        problems.push(`foundation-${suit} card ${cardLabel(card)} is face-down`);
      }
    });
  }

  // Tableau: face-down base, then a descending alternating face-up run
  board.tableau.forEach((column, col) => {
    const firstUp = column.findIndex((c) => c.faceState === 'face-up');
    if (firstUp === -1) {
      if (column.length > 0) {
        problems.push(`tableau-${col} has no face-up top card`);
      }
      return;
    }
    for (let i = firstUp + 1; i < column.length; i++) {
      const below = column[i - 1];
      const card = column[i];
      if (card.faceState !== 'face-up') {
        problems.push(`tableau-${col} has a face-down card above a face-up one`);
        break;
      }
      if (
        rankValue(card.rank) !== rankValue(below.rank) - 1 ||
        !isOppositeColor(card, below)
      ) {
        problems.push(
          `tableau-${col} run breaks at ${cardLabel(below)} -> ${cardLabel(card)}`,
        );
      }
    }
  });

  return problems;
}

/**
 * Check all world invariants.
 *
 * @returns Human-readable violations; empty when the world is healthy.
 */
export function checkInvariants(world: SolitaireWorld): string[] {
  const problems: string[] = [];

  const piles = world.all('pileKind').map(([entity]) => entity);
  const isPile = (entity: Entity): boolean =>
    piles.some((p) => sameEntity(p, entity));

  // 1. Membership
  const cards = world.all('cardIdentity');
  const byPile = new Map<number, number[]>();
  for (const [entity, identity] of cards) {
    const membership = world.tryGet(entity, 'pileMembership');
    if (!membership) {
      problems.push(`${cardLabel(identity)} is in no pile`);
      continue;
    }
    if (!isPile(membership.pile)) {
      problems.push(`${cardLabel(identity)} points at a non-pile entity`);
      continue;
    }
    if (!world.has(entity, 'faceState')) {
      problems.push(`${cardLabel(identity)} has no face state`);
    }
    const positions = byPile.get(membership.pile.index) ?? [];
    positions.push(membership.position);
    byPile.set(membership.pile.index, positions);
  }

  // 2. Contiguous positions
  for (const [pileIndex, positions] of byPile) {
    const sorted = [...positions].sort((a, b) => a - b);
    if (sorted.some((p, i) => p !== i)) {
      problems.push(
        `pile #${pileIndex} positions are not contiguous: ${sorted.join(',')}`,
      );
    }
  }

  if (problems.length > 0) return problems;

  // 3 and 4, on the projection
  return validateBoard(snapshotBoard(world));
}

/**
 * Auto-play helpers: safe foundation moves and end-game auto-complete.
 *
 * Neither function mutates the world; they return moves for the caller
 * to apply through the move engine.
 */

import type { Card, Suit } from '../card-system/Card';
import { rankValue, suitColor } from '../card-system/Card';
import type { SolitaireWorld } from './SolitaireComponents';
import {
  cardsInPile,
  findPile,
  identityOf,
  isFaceUp,
  topCard,
} from './PileQueries';
import { foundationAccepts } from './SolitaireRules';
import type { Move, TableauIndex } from './SolitaireState';
import {
  FOUNDATION_SUITS,
  TABLEAU_INDICES,
  foundationId,
  tableauId,
} from './SolitaireState';

function foundationCount(world: SolitaireWorld, suit: Suit): number {
  return cardsInPile(world, findPile(world, foundationId(suit))).length;
}

/**
 * Whether sending a card to its foundation can never cost the player a
 * tableau move: Aces and Twos always, otherwise only when both
 * foundations of the other colour have reached rank - 1.
 */
export function isSafeToFoundation(world: SolitaireWorld, card: Card): boolean {
  const value = rankValue(card.rank);
  if (value <= 1) return true;
  const color = suitColor(card.suit);
  return FOUNDATION_SUITS.filter((suit) => suitColor(suit) !== color).every(
    (suit) => foundationCount(world, suit) >= value,
  );
}

/**
 * Foundation moves that are both legal and safe right now.
 *
 * Candidates are the waste top and each tableau column's top card.
 */
export function findSafeAutoMoves(world: SolitaireWorld): Move[] {
  const moves: Move[] = [];

  const wasteTop = topCard(world, findPile(world, 'waste'));
  if (wasteTop !== undefined) {
    const card = identityOf(world, wasteTop);
    if (
      foundationAccepts(world, card.suit, card) === null &&
      isSafeToFoundation(world, card)
    ) {
      moves.push({ kind: 'waste-to-foundation', card, to: card.suit });
    }
  }

  for (const index of TABLEAU_INDICES) {
    const top = topCard(world, findPile(world, tableauId(index)));
    if (top === undefined || !isFaceUp(world, top)) continue;
    const card = identityOf(world, top);
    if (
      foundationAccepts(world, card.suit, card) === null &&
      isSafeToFoundation(world, card)
    ) {
      moves.push({ kind: 'tableau-to-foundation', card, to: card.suit });
    }
  }

  return moves;
}

// ── Auto-complete detection ─────────────────────────────────

/**
 * The rest of the game plays itself: stock and waste are empty and every
 * tableau card is face-up.
 *
 * Face-up tableau cards always form descending runs, so each column can
 * be emptied onto the foundations from the top down.
 */
export function isTriviallyWinnable(world: SolitaireWorld): boolean {
  if (cardsInPile(world, findPile(world, 'stock')).length > 0) return false;
  if (cardsInPile(world, findPile(world, 'waste')).length > 0) return false;

  return TABLEAU_INDICES.every((index) =>
    cardsInPile(world, findPile(world, tableauId(index))).every((card) =>
      isFaceUp(world, card),
    ),
  );
}

/**
 * The foundation moves that finish a trivially winnable game, in order.
 *
 * Works on a copy of the columns and does not touch the world. Returns
 * an empty list when {@link isTriviallyWinnable} is false.
 */
export function getAutoCompleteMoves(world: SolitaireWorld): Move[] {
  if (!isTriviallyWinnable(world)) return [];

  const columns: Array<{ index: TableauIndex; cards: Card[] }> =
    TABLEAU_INDICES.map((index) => ({
      index,
      cards: cardsInPile(world, findPile(world, tableauId(index))).map(
        (card) => identityOf(world, card),
      ),
    }));

  const counts = new Map<Suit, number>(
    FOUNDATION_SUITS.map((suit): [Suit, number] => [
      suit,
      foundationCount(world, suit),
    ]),
  );

  const moves: Move[] = [];
  let moved = true;
  while (moved) {
    moved = false;
    for (const column of columns) {
      const top = column.cards[column.cards.length - 1];
      if (top === undefined) continue;

      const count = counts.get(top.suit) ?? 0;
      if (rankValue(top.rank) === count) {
        moves.push({ kind: 'tableau-to-foundation', card: top, to: top.suit });
        counts.set(top.suit, count + 1);
        column.cards.pop();
        moved = true;
      }
    }
  }

  return moves;
}

/**
 * Win/stuck detection.
 *
 * Pure reads over the world: calling {@link detectStatus} any number of
 * times without an intervening move gives the same answer.
 */

import type { Entity } from '../ecs/Entity';
import type { SolitaireWorld } from './SolitaireComponents';
import {
  cardsInPile,
  findPile,
  getProgress,
  getRules,
  identityOf,
} from './PileQueries';
import {
  foundationAccepts,
  getLegalMoves,
  isStockMove,
  tableauAccepts,
} from './SolitaireRules';
import type { GameStatus } from './SolitaireState';
import {
  CARDS_PER_FOUNDATION,
  FOUNDATION_SUITS,
  TABLEAU_INDICES,
  foundationId,
  tableauId,
} from './SolitaireState';

/** All four foundations hold a full suit. */
export function isWon(world: SolitaireWorld): boolean {
  return FOUNDATION_SUITS.every(
    (suit) =>
      cardsInPile(world, findPile(world, foundationId(suit))).length ===
      CARDS_PER_FOUNDATION,
  );
}

/** Whether the waste may still be turned over into the stock. */
export function canRecycle(world: SolitaireWorld): boolean {
  const { maxRecycles } = getRules(world);
  return maxRecycles === null || getProgress(world).recycles < maxRecycles;
}

/**
 * Cards that stock draws (and recycles, while allowed) can bring to the
 * top of the waste.
 */
export function reachableThroughStock(world: SolitaireWorld): Entity[] {
  const stock = cardsInPile(world, findPile(world, 'stock'));
  const waste = cardsInPile(world, findPile(world, 'waste'));
  return canRecycle(world) ? [...stock, ...waste] : stock;
}

function isPlayable(world: SolitaireWorld, entity: Entity): boolean {
  const card = identityOf(world, entity);
  if (foundationAccepts(world, card.suit, card) === null) return true;
  return TABLEAU_INDICES.some(
    (index) =>
      tableauAccepts(world, findPile(world, tableauId(index)), card) === null,
  );
}

/**
 * Current game status.
 *
 * - `won` -- every foundation is complete.
 * - `no-legal-moves` -- no tableau, waste or foundation move is legal,
 *   and no card that cycling the stock could bring up is playable.
 *   Drawing never changes the tableau or foundations, so a game can be
 *   stuck while draws are still possible.
 * - `in-progress` -- otherwise.
 */
export function detectStatus(world: SolitaireWorld): GameStatus {
  if (isWon(world)) return 'won';

  if (getLegalMoves(world).some((move) => !isStockMove(move))) {
    return 'in-progress';
  }
  if (reachableThroughStock(world).some((card) => isPlayable(world, card))) {
    return 'in-progress';
  }
  return 'no-legal-moves';
}

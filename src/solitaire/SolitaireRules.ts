/**
 * Klondike move engine.
 *
 * Stateless: every function reads and writes the world it is given.
 * A move is first checked, which yields either a rejection reason or a
 * plan (which cards go from which pile to which), and only a legal plan
 * is ever executed, so a rejected move never touches the world.
 *
 * Klondike rules as modelled here:
 * - Foundations build up by suit from Ace to King.
 * - Tableau columns build down in alternating colours. Any face-up card
 *   whose upper cards form such a run can move with that run.
 * - An empty column accepts a King only, or any card under the
 *   `any-card` rule.
 * - The stock deals one card at a time onto the waste, face-up. An
 *   empty stock is refilled by turning the waste over, within the
 *   configured recycle limit.
 * - When a move uncovers a face-down tableau card, it turns face-up.
 */

import type { Card, Suit } from '../card-system/Card';
import {
  cardLabel,
  isOppositeColor,
  nextRank,
  rankValue,
} from '../card-system/Card';
import type { Entity } from '../ecs/Entity';
import { sameEntity } from '../ecs/Entity';
import type { CardView } from '../core-engine/TranscriptTypes';
import type { Result } from '../rule-engine/Result';
import { err, ok } from '../rule-engine/Result';
import type { SolitaireWorld } from './SolitaireComponents';
import {
  cardView,
  cardsInPile,
  findCard,
  findPile,
  getProgress,
  getRules,
  identityOf,
  isFaceUp,
  pileKind,
  setProgress,
  topCard,
} from './PileQueries';
import type { BoundaryOptions } from './ReleaseMode';
import { withFallback } from './ReleaseMode';
import type {
  AppliedMove,
  IllegalMove,
  IllegalMoveReason,
  Move,
  PileId,
} from './SolitaireState';
import {
  CARDS_PER_FOUNDATION,
  FOUNDATION_SUITS,
  TABLEAU_INDICES,
  foundationId,
  pileIdOf,
  tableauId,
} from './SolitaireState';

// ── Plans ───────────────────────────────────────────────────

/**
 * How a legal move changes the world.
 *
 * - `transfer` -- cards keep their face state.
 * - `draw`     -- the moved card turns face-up.
 * - `recycle`  -- the cards go over in reverse order, face-down.
 */
export interface MovePlan {
  readonly move: Move;
  readonly effect: 'transfer' | 'draw' | 'recycle';
  readonly source: Entity;
  readonly destination: Entity;
  /** Moving cards, bottom to top as they sit in the source pile. */
  readonly cards: readonly Entity[];
}

export type MoveCheck =
  | { readonly legal: true; readonly plan: MovePlan }
  | {
      readonly legal: false;
      readonly reason: IllegalMoveReason;
      readonly message: string;
    };

interface Rejection {
  readonly reason: IllegalMoveReason;
  readonly message: string;
}

function reject(reason: IllegalMoveReason, message: string): MoveCheck {
  return { legal: false, reason, message };
}

function plan(
  move: Move,
  effect: MovePlan['effect'],
  source: Entity,
  destination: Entity,
  cards: readonly Entity[],
): MoveCheck {
  return { legal: true, plan: { move, effect, source, destination, cards } };
}

// ── Destination rules ───────────────────────────────────────

/**
 * Whether a tableau column accepts a card (the base of the moving run).
 */
export function tableauAccepts(
  world: SolitaireWorld,
  column: Entity,
  card: Card,
): Rejection | null {
  const top = topCard(world, column);
  if (top === undefined) {
    if (getRules(world).emptyTableau === 'king-only' && card.rank !== 'K') {
      return {
        reason: 'wrong-rank',
        message: `Only a King may fill an empty column, not ${cardLabel(card)}`,
      };
    }
    return null;
  }

  const target = identityOf(world, top);
  if (rankValue(card.rank) !== rankValue(target.rank) - 1) {
    return {
      reason: 'wrong-rank',
      message: `${cardLabel(card)} cannot go on ${cardLabel(target)}: rank must be one lower`,
    };
  }
  if (!isOppositeColor(card, target)) {
    return {
      reason: 'wrong-color',
      message: `${cardLabel(card)} cannot go on ${cardLabel(target)}: colours must alternate`,
    };
  }
  return null;
}

/**
 * Whether the foundation of `suit` accepts a card.
 */
export function foundationAccepts(
  world: SolitaireWorld,
  suit: Suit,
  card: Card,
): Rejection | null {
  const foundation = cardsInPile(world, findPile(world, foundationId(suit)));
  if (foundation.length >= CARDS_PER_FOUNDATION) {
    return {
      reason: 'destination-full',
      message: `The ${suit} foundation is complete`,
    };
  }
  if (card.suit !== suit) {
    return {
      reason: 'wrong-suit',
      message: `${cardLabel(card)} does not belong on the ${suit} foundation`,
    };
  }

  const expected =
    foundation.length === 0
      ? 'A'
      : nextRank(identityOf(world, foundation[foundation.length - 1]).rank);
  if (card.rank !== expected) {
    return {
      reason: 'wrong-rank',
      message: `The ${suit} foundation needs ${expected ?? 'nothing'}, not ${card.rank}`,
    };
  }
  return null;
}

// ── Source rules ────────────────────────────────────────────

/**
 * Whether cards (bottom to top) form a movable tableau run: all
 * face-up, each one rank lower and opposite in colour to the one below.
 */
export function isMovableRun(
  world: SolitaireWorld,
  cards: readonly Entity[],
): boolean {
  if (cards.length === 0) return false;
  for (let i = 0; i < cards.length; i++) {
    if (!isFaceUp(world, cards[i])) return false;
    if (i === 0) continue;
    const below = identityOf(world, cards[i - 1]);
    const card = identityOf(world, cards[i]);
    if (
      rankValue(card.rank) !== rankValue(below.rank) - 1 ||
      !isOppositeColor(card, below)
    ) {
      return false;
    }
  }
  return true;
}

/**
 * Locate the named card in the given pile.
 *
 * @returns The pile's cards and the card's index among them, or `null`
 *          if the card is elsewhere.
 */
function locateIn(
  world: SolitaireWorld,
  card: Card,
  pile: Entity,
): { readonly cards: Entity[]; readonly index: number } | null {
  const entity = findCard(world, card);
  const membership = world.get(entity, 'pileMembership');
  if (!sameEntity(membership.pile, pile)) return null;

  const cards = cardsInPile(world, pile);
  const index = cards.findIndex((c) => sameEntity(c, entity));
  return index === -1 ? null : { cards, index };
}

/**
 * The named card as the single top card of `pile`, or a rejection.
 */
function takeTop(
  world: SolitaireWorld,
  card: Card,
  pileId: PileId,
): { readonly source: Entity; readonly entity: Entity } | Rejection {
  const source = findPile(world, pileId);
  const found = locateIn(world, card, source);
  if (!found || found.index !== found.cards.length - 1) {
    return {
      reason: 'not-top-of-pile',
      message: `${cardLabel(card)} is not the top card of ${pileId}`,
    };
  }
  const entity = found.cards[found.index];
  if (!isFaceUp(world, entity)) {
    return {
      reason: 'not-top-of-pile',
      message: `${cardLabel(card)} is face-down`,
    };
  }
  return { source, entity };
}

function isRejection(
  value: { readonly source: Entity; readonly entity: Entity } | Rejection,
): value is Rejection {
  return 'reason' in value;
}

// ── Move checks ─────────────────────────────────────────────

function checkTableauToTableau(
  world: SolitaireWorld,
  move: Extract<Move, { kind: 'tableau-to-tableau' }>,
): MoveCheck {
  if (move.from === move.to) {
    return reject('same-pile', `Source and destination are both ${tableauId(move.from)}`);
  }

  const source = findPile(world, tableauId(move.from));
  const found = locateIn(world, move.card, source);
  if (!found) {
    return reject(
      'not-top-of-pile',
      `${cardLabel(move.card)} is not in ${tableauId(move.from)}`,
    );
  }

  const run = found.cards.slice(found.index);
  if (!isMovableRun(world, run)) {
    return reject(
      'not-top-of-pile',
      `${cardLabel(move.card)} does not head a movable face-up run`,
    );
  }

  const destination = findPile(world, tableauId(move.to));
  const refusal = tableauAccepts(world, destination, move.card);
  if (refusal) return reject(refusal.reason, refusal.message);

  return plan(move, 'transfer', source, destination, run);
}

function checkTableauToFoundation(
  world: SolitaireWorld,
  move: Extract<Move, { kind: 'tableau-to-foundation' }>,
): MoveCheck {
  const entity = findCard(world, move.card);
  const source = world.get(entity, 'pileMembership').pile;
  const kind = pileKind(world, source);
  if (kind.kind !== 'tableau') {
    return reject(
      'not-top-of-pile',
      `${cardLabel(move.card)} is not on the tableau`,
    );
  }

  const taken = takeTop(world, move.card, pileIdOf(kind));
  if (isRejection(taken)) return reject(taken.reason, taken.message);

  const refusal = foundationAccepts(world, move.to, move.card);
  if (refusal) return reject(refusal.reason, refusal.message);

  return plan(
    move,
    'transfer',
    taken.source,
    findPile(world, foundationId(move.to)),
    [taken.entity],
  );
}

function checkFoundationToTableau(
  world: SolitaireWorld,
  move: Extract<Move, { kind: 'foundation-to-tableau' }>,
): MoveCheck {
  const taken = takeTop(world, move.card, foundationId(move.from));
  if (isRejection(taken)) return reject(taken.reason, taken.message);

  const destination = findPile(world, tableauId(move.to));
  const refusal = tableauAccepts(world, destination, move.card);
  if (refusal) return reject(refusal.reason, refusal.message);

  return plan(move, 'transfer', taken.source, destination, [taken.entity]);
}

function checkWasteToTableau(
  world: SolitaireWorld,
  move: Extract<Move, { kind: 'waste-to-tableau' }>,
): MoveCheck {
  const taken = takeTop(world, move.card, 'waste');
  if (isRejection(taken)) return reject(taken.reason, taken.message);

  const destination = findPile(world, tableauId(move.to));
  const refusal = tableauAccepts(world, destination, move.card);
  if (refusal) return reject(refusal.reason, refusal.message);

  return plan(move, 'transfer', taken.source, destination, [taken.entity]);
}

function checkWasteToFoundation(
  world: SolitaireWorld,
  move: Extract<Move, { kind: 'waste-to-foundation' }>,
): MoveCheck {
  const taken = takeTop(world, move.card, 'waste');
  if (isRejection(taken)) return reject(taken.reason, taken.message);

  const refusal = foundationAccepts(world, move.to, move.card);
  if (refusal) return reject(refusal.reason, refusal.message);

  return plan(
    move,
    'transfer',
    taken.source,
    findPile(world, foundationId(move.to)),
    [taken.entity],
  );
}

function checkRecycle(world: SolitaireWorld, move: Move): MoveCheck {
  const stock = findPile(world, 'stock');
  const waste = findPile(world, 'waste');

  if (cardsInPile(world, stock).length > 0) {
    return reject('destination-full', 'The stock must be empty to turn the waste over');
  }
  const wasteCards = cardsInPile(world, waste);
  if (wasteCards.length === 0) {
    return reject('stock-empty', 'Stock and waste are both empty');
  }

  const { maxRecycles } = getRules(world);
  const { recycles } = getProgress(world);
  if (maxRecycles !== null && recycles >= maxRecycles) {
    return reject(
      'recycle-limit-exceeded',
      `The waste may be turned over at most ${maxRecycles} time(s)`,
    );
  }

  return plan(move, 'recycle', waste, stock, wasteCards);
}

function checkStockToWaste(world: SolitaireWorld, move: Move): MoveCheck {
  const stock = findPile(world, 'stock');
  const top = topCard(world, stock);
  if (top === undefined) {
    return checkRecycle(world, move);
  }
  return plan(move, 'draw', stock, findPile(world, 'waste'), [top]);
}

/**
 * Check a move against the current world without changing it.
 */
export function checkMove(world: SolitaireWorld, move: Move): MoveCheck {
  switch (move.kind) {
    case 'tableau-to-tableau':
      return checkTableauToTableau(world, move);
    case 'tableau-to-foundation':
      return checkTableauToFoundation(world, move);
    case 'foundation-to-tableau':
      return checkFoundationToTableau(world, move);
    case 'stock-to-waste':
      return checkStockToWaste(world, move);
    case 'recycle-waste':
      return checkRecycle(world, move);
    case 'waste-to-tableau':
      return checkWasteToTableau(world, move);
    case 'waste-to-foundation':
      return checkWasteToFoundation(world, move);
  }
}

/**
 * Whether a move is legal in the current world. Outside debug mode an
 * internal error is logged and the move reads as illegal.
 */
export function isLegalMove(
  world: SolitaireWorld,
  move: Move,
  options: BoundaryOptions = {},
): boolean {
  return withFallback(
    world,
    `Move check ${move.kind}`,
    false,
    () => checkMove(world, move).legal,
    options.logger,
  );
}

// ── Move application ────────────────────────────────────────

/** Rewrite a pile's positions as 0..n-1 in their current order. */
function renumber(world: SolitaireWorld, pile: Entity): void {
  cardsInPile(world, pile).forEach((card, position) => {
    if (world.get(card, 'pileMembership').position !== position) {
      world.set(card, 'pileMembership', { pile, position });
    }
  });
}

/**
 * Execute a legal plan. Only called with plans from {@link checkMove}.
 */
export function executePlan(world: SolitaireWorld, plan: MovePlan): AppliedMove {
  const { effect, source, destination } = plan;
  const ordered = effect === 'recycle' ? [...plan.cards].reverse() : plan.cards;

  let position = cardsInPile(world, destination).length;
  for (const card of ordered) {
    world.set(card, 'pileMembership', { pile: destination, position: position++ });
    if (effect === 'recycle') {
      world.set(card, 'faceState', 'face-down');
    } else if (effect === 'draw') {
      world.set(card, 'faceState', 'face-up');
    }
  }
  renumber(world, source);

  // Uncover the new top of a tableau source
  let flipped: CardView | null = null;
  if (pileKind(world, source).kind === 'tableau') {
    const exposed = topCard(world, source);
    if (exposed !== undefined && !isFaceUp(world, exposed)) {
      world.set(exposed, 'faceState', 'face-up');
      flipped = cardView(world, exposed);
    }
  }

  const progress = getProgress(world);
  const moves = progress.moves + 1;
  setProgress(world, {
    ...progress,
    moves,
    recycles: progress.recycles + (effect === 'recycle' ? 1 : 0),
  });

  return {
    move: plan.move,
    from: pileIdOf(pileKind(world, source)),
    to: pileIdOf(pileKind(world, destination)),
    cards: ordered.map((card) => cardView(world, card)),
    flipped,
    recycled: effect === 'recycle',
    moveCount: moves,
  };
}

/**
 * Check and, if legal, apply a move.
 *
 * A rejected move leaves the world untouched.
 */
export function applyMove(
  world: SolitaireWorld,
  move: Move,
): Result<AppliedMove, IllegalMove> {
  const check = checkMove(world, move);
  if (!check.legal) {
    return err({ reason: check.reason, move, message: check.message });
  }
  return ok(executePlan(world, check.plan));
}

// ── Legal move enumeration ──────────────────────────────────

/**
 * Every legal move in the current world.
 *
 * Order: stock, waste, tableau (foundation moves first per column),
 * then foundation-to-tableau.
 */
export function getLegalMoves(world: SolitaireWorld): Move[] {
  const candidates: Move[] = [];

  const stock = cardsInPile(world, findPile(world, 'stock'));
  candidates.push(
    stock.length > 0 ? { kind: 'stock-to-waste' } : { kind: 'recycle-waste' },
  );

  const wasteTop = topCard(world, findPile(world, 'waste'));
  if (wasteTop !== undefined) {
    const card = identityOf(world, wasteTop);
    candidates.push({ kind: 'waste-to-foundation', card, to: card.suit });
    for (const to of TABLEAU_INDICES) {
      candidates.push({ kind: 'waste-to-tableau', card, to });
    }
  }

  for (const from of TABLEAU_INDICES) {
    const column = cardsInPile(world, findPile(world, tableauId(from)));
    column.forEach((entity, position) => {
      if (!isFaceUp(world, entity)) return;
      const card = identityOf(world, entity);
      if (position === column.length - 1) {
        candidates.push({ kind: 'tableau-to-foundation', card, to: card.suit });
      }
      for (const to of TABLEAU_INDICES) {
        if (to !== from) {
          candidates.push({ kind: 'tableau-to-tableau', card, from, to });
        }
      }
    });
  }

  for (const suit of FOUNDATION_SUITS) {
    const top = topCard(world, findPile(world, foundationId(suit)));
    if (top === undefined) continue;
    const card = identityOf(world, top);
    for (const to of TABLEAU_INDICES) {
      candidates.push({ kind: 'foundation-to-tableau', card, from: suit, to });
    }
  }

  return candidates.filter((move) => checkMove(world, move).legal);
}

/** Whether a move draws from or turns over the stock. */
export function isStockMove(move: Move): boolean {
  return move.kind === 'stock-to-waste' || move.kind === 'recycle-waste';
}


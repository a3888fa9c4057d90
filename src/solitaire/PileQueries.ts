/**
 * Pile-scoped queries over the Klondike world.
 *
 * Pile order lives in `pileMembership.position`, never in store order,
 * so every ordered read goes through {@link cardsInPile}. Results are
 * snapshot arrays.
 */

import type { Card, Suit } from '../card-system/Card';
import { sameCard } from '../card-system/Card';
import type { Entity } from '../ecs/Entity';
import { sameEntity } from '../ecs/Entity';
import { MissingComponentError } from '../ecs/errors';
import type { CardView } from '../core-engine/TranscriptTypes';
import { toCardView } from '../core-engine/TranscriptTypes';
import type {
  GameProgress,
  SolitaireWorld,
} from './SolitaireComponents';
import type { RuleSet } from './SolitaireOptions';
import type { BoardSnapshot, PileId, PileKind } from './SolitaireState';
import {
  FOUNDATION_SUITS,
  TABLEAU_INDICES,
  foundationId,
  pileIdOf,
  tableauId,
} from './SolitaireState';

// ── Piles ───────────────────────────────────────────────────

/**
 * The pile entity with the given id.
 *
 * @throws MissingComponentError if no pile carries that kind.
 */
export function findPile(world: SolitaireWorld, id: PileId): Entity {
  for (const [entity, kind] of world.store('pileKind').entries()) {
    if (pileIdOf(kind) === id) return entity;
  }
  throw new MissingComponentError(`pileKind(${id})`);
}

export function pileKind(world: SolitaireWorld, pile: Entity): PileKind {
  return world.get(pile, 'pileKind');
}

/** Cards in a pile, ascending position (bottom first). */
export function cardsInPile(world: SolitaireWorld, pile: Entity): Entity[] {
  return world
    .all('pileMembership')
    .filter(([, membership]) => sameEntity(membership.pile, pile))
    .sort(([, a], [, b]) => a.position - b.position)
    .map(([entity]) => entity);
}

/** The top card of a pile, or `undefined` if it is empty. */
export function topCard(world: SolitaireWorld, pile: Entity): Entity | undefined {
  const cards = cardsInPile(world, pile);
  return cards.length > 0 ? cards[cards.length - 1] : undefined;
}

// ── Cards ───────────────────────────────────────────────────

/**
 * The entity of a card identity.
 *
 * @throws MissingComponentError if no card entity has that identity.
 */
export function findCard(world: SolitaireWorld, card: Card): Entity {
  for (const [entity, identity] of world.store('cardIdentity').entries()) {
    if (sameCard(identity, card)) return entity;
  }
  throw new MissingComponentError(`cardIdentity(${card.rank} of ${card.suit})`);
}

export function identityOf(world: SolitaireWorld, card: Entity): Card {
  return world.get(card, 'cardIdentity');
}

export function isFaceUp(world: SolitaireWorld, card: Entity): boolean {
  return world.get(card, 'faceState') === 'face-up';
}

export function cardView(world: SolitaireWorld, card: Entity): CardView {
  return toCardView(
    world.get(card, 'cardIdentity'),
    world.get(card, 'faceState'),
  );
}

/** A pile as CardView projections, bottom to top. */
export function pileView(world: SolitaireWorld, pile: Entity): CardView[] {
  return cardsInPile(world, pile).map((card) => cardView(world, card));
}

// ── Table entity ────────────────────────────────────────────

function tableEntity(world: SolitaireWorld): Entity {
  const [table] = world.with('rules', 'progress');
  if (!table) {
    throw new MissingComponentError('rules');
  }
  return table;
}

export function getRules(world: SolitaireWorld): RuleSet {
  return world.get(tableEntity(world), 'rules');
}

export function getProgress(world: SolitaireWorld): GameProgress {
  return world.get(tableEntity(world), 'progress');
}

export function setProgress(world: SolitaireWorld, progress: GameProgress): void {
  world.set(tableEntity(world), 'progress', progress);
}

/** Debug flag of the rule set, `false` when the table entity is missing. */
export function isDebug(world: SolitaireWorld): boolean {
  const [entry] = world.all('rules');
  return entry ? entry[1].debug : false;
}

// ── Board ───────────────────────────────────────────────────

/** Project every pile of the world into a BoardSnapshot. */
export function snapshotBoard(world: SolitaireWorld): BoardSnapshot {
  const view = (id: PileId): CardView[] => pileView(world, findPile(world, id));

  const foundations: Record<Suit, CardView[]> = {
    clubs: [],
    diamonds: [],
    hearts: [],
    spades: [],
  };
  for (const suit of FOUNDATION_SUITS) {
    foundations[suit] = view(foundationId(suit));
  }

  return {
    stock: view('stock'),
    waste: view('waste'),
    foundations,
    tableau: TABLEAU_INDICES.map((index) => view(tableauId(index))),
  };
}

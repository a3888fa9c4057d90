/**
 * Component kinds of the Klondike world.
 *
 * Cards carry identity, face state and pile membership. Pile entities
 * carry their kind. A single table entity carries the rule set and the
 * running counters, so the world is the whole game state.
 */

import type { Card, FaceState } from '../card-system/Card';
import { ComponentStore } from '../ecs/ComponentStore';
import type { Entity } from '../ecs/Entity';
import { World } from '../ecs/World';
import type { RuleSet } from './SolitaireOptions';
import type { PileKind } from './SolitaireState';

/** Where a card sits: its pile and its 0-based position (0 = bottom). */
export interface PileMembership {
  readonly pile: Entity;
  readonly position: number;
}

/** Running counters of a game. */
export interface GameProgress {
  /** Seed of the deal, or `null` for a world rebuilt from a board. */
  readonly seed: number | null;
  /** Accepted moves so far. */
  readonly moves: number;
  /** Waste-to-stock turnovers so far. */
  readonly recycles: number;
}

export interface SolitaireComponents {
  cardIdentity: Card;
  faceState: FaceState;
  pileMembership: PileMembership;
  pileKind: PileKind;
  rules: RuleSet;
  progress: GameProgress;
}

export type SolitaireWorld = World<SolitaireComponents>;

/** Create an empty world with one store per Klondike component kind. */
export function createSolitaireWorld(): SolitaireWorld {
  return new World<SolitaireComponents>({
    cardIdentity: new ComponentStore<Card>('cardIdentity'),
    faceState: new ComponentStore<FaceState>('faceState'),
    pileMembership: new ComponentStore<PileMembership>('pileMembership'),
    pileKind: new ComponentStore<PileKind>('pileKind'),
    rules: new ComponentStore<RuleSet>('rules'),
    progress: new ComponentStore<GameProgress>('progress'),
  });
}

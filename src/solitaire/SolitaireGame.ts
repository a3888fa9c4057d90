/**
 * Embedding boundary of the Klondike engine.
 *
 * The host owns the world returned by {@link newGame} and threads it
 * through every call. Only CardView projections and plain records leave
 * this module; entity ids stay inside.
 *
 * Usage:
 * ```ts
 * const world = newGame(42, { maxRecycles: 2 });
 * const result = proposeMove(world, { kind: 'stock-to-waste' });
 * if (result.ok && result.value.status === 'won') celebrate();
 * ```
 */

import type { CardView } from '../core-engine/TranscriptTypes';
import type { Result } from '../rule-engine/Result';
import { err, ok } from '../rule-engine/Result';
import type { GameProgress, SolitaireWorld } from './SolitaireComponents';
import { findPile, isDebug, pileView } from './PileQueries';
import { checkInvariants } from './SolitaireInvariants';
import { buildFromBoard, buildLayout } from './SolitaireLayout';
import type { GameOptions } from './SolitaireOptions';
import { applyMove } from './SolitaireRules';
import type {
  BoardSnapshot,
  GameStatus,
  IllegalMove,
  Move,
  MoveOutcome,
  PileId,
} from './SolitaireState';
import { detectStatus } from './SolitaireStatus';
import { InvariantError } from './errors';
import type { BoundaryOptions } from './ReleaseMode';
import { engineLogger, isInternalError, withFallback } from './ReleaseMode';

// ── Game lifecycle ──────────────────────────────────────────

/**
 * Deal a new game.
 *
 * @throws SeedError if the seed is not an unsigned 32-bit integer.
 * @throws ZodError if an option has the wrong type or range.
 */
export function newGame(seed: number, options: GameOptions = {}): SolitaireWorld {
  return buildLayout(seed, options);
}

/**
 * Rebuild a game from a saved board.
 *
 * @param progress  Counters to resume from; each defaults to a fresh game.
 * @throws LayoutError if the board breaks a world invariant.
 */
export function restoreGame(
  board: BoardSnapshot,
  options: GameOptions = {},
  progress: Partial<GameProgress> = {},
): SolitaireWorld {
  return buildFromBoard(board, options, progress);
}

// ── Moves ───────────────────────────────────────────────────

/**
 * Propose a move: validate it and, if legal, apply it.
 *
 * All or nothing: a rejected move leaves the world as it was, and so
 * does an internal error thrown halfway through an apply. In debug mode
 * such errors propagate and every applied move is followed by an
 * invariant check; otherwise they are logged and reported as an
 * `invariant-violation` rejection.
 *
 * @throws InvariantError in debug mode when a move breaks the world.
 */
export function proposeMove(
  world: SolitaireWorld,
  move: Move,
  options: BoundaryOptions = {},
): Result<MoveOutcome, IllegalMove> {
  const { logger = engineLogger } = options;
  const debug = isDebug(world);
  const before = world.snapshot();

  try {
    const result = applyMove(world, move);
    if (!result.ok) return result;

    if (debug) {
      const violations = checkInvariants(world);
      if (violations.length > 0) {
        throw new InvariantError(violations);
      }
    }
    return ok({ ...result.value, status: detectStatus(world) });
  } catch (error) {
    world.restore(before);
    if (debug || !isInternalError(error)) {
      throw error;
    }
    logger.error(`Move ${move.kind} aborted: ${error.message}`);
    return err({
      reason: 'invariant-violation',
      move,
      message: error.message,
    });
  }
}

// ── Queries ─────────────────────────────────────────────────

/**
 * Game status; pure and idempotent.
 *
 * Outside debug mode an internal error is logged and the game reads as
 * `in-progress`, so a host never ends a game on a broken world.
 */
export function queryState(
  world: SolitaireWorld,
  options: BoundaryOptions = {},
): GameStatus {
  return withFallback(
    world,
    'Status query',
    'in-progress',
    () => detectStatus(world),
    options.logger,
  );
}

/**
 * A pile's cards, bottom to top. Outside debug mode an internal error is
 * logged and the pile reads as empty.
 */
export function queryPile(
  world: SolitaireWorld,
  pileId: PileId,
  options: BoundaryOptions = {},
): CardView[] {
  return withFallback(
    world,
    `Query of ${pileId}`,
    [],
    () => pileView(world, findPile(world, pileId)),
    options.logger,
  );
}

export { snapshotBoard } from './PileQueries';

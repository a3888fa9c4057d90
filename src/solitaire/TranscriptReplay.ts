/**
 * Replay of recorded transcripts.
 *
 * Rebuilds the world from the transcript's initial board and counters,
 * then feeds every entry back through a session, so player moves,
 * auto-move batches, undo and redo behave exactly as they did when
 * recorded. Replay stops at the first entry that does not reproduce.
 */

import type { Logger } from '../core-engine/Logger';
import { silentLogger } from '../core-engine/Logger';
import type { CardView } from '../core-engine/TranscriptTypes';
import type { Result } from '../rule-engine/Result';
import { err, ok } from '../rule-engine/Result';
import type { GameTranscript, TranscriptEntry } from './GameTranscript';
import type { MoveMessage } from './MoveMessage';
import { decodeMove } from './MoveMessage';
import type { SolitaireWorld } from './SolitaireComponents';
import { dealBoard } from './SolitaireLayout';
import { SolitaireSession } from './SolitaireSession';
import type { BoardSnapshot, Move } from './SolitaireState';
import { FOUNDATION_SUITS } from './SolitaireState';

export type ReplayFailure =
  | 'seed-mismatch'
  | 'undecodable-move'
  | 'rejected-move'
  | 'nothing-to-undo'
  | 'nothing-to-redo'
  | 'move-count-mismatch';

export interface ReplayError {
  readonly reason: ReplayFailure;
  /** Index of the failing entry in `transcript.moves`, or -1 for the deal. */
  readonly step: number;
  readonly message: string;
}

export interface ReplayOptions {
  /** Defaults to a logger that discards everything. */
  logger?: Logger;
}

// ── Board comparison ────────────────────────────────────────

function samePile(a: readonly CardView[], b: readonly CardView[]): boolean {
  return (
    a.length === b.length &&
    a.every(
      (card, i) =>
        card.rank === b[i].rank &&
        card.suit === b[i].suit &&
        card.faceState === b[i].faceState,
    )
  );
}

export function sameBoard(a: BoardSnapshot, b: BoardSnapshot): boolean {
  return (
    samePile(a.stock, b.stock) &&
    samePile(a.waste, b.waste) &&
    FOUNDATION_SUITS.every((suit) =>
      samePile(a.foundations[suit], b.foundations[suit]),
    ) &&
    a.tableau.length === b.tableau.length &&
    a.tableau.every((column, i) => samePile(column, b.tableau[i]))
  );
}

// ── Replay ──────────────────────────────────────────────────

function decodeAll(messages: readonly MoveMessage[]): Move[] | string {
  const moves: Move[] = [];
  for (const message of messages) {
    const decoded = decodeMove(message);
    if (!decoded.ok) return decoded.error.message;
    moves.push(decoded.value);
  }
  return moves;
}

/** Re-run one entry. Returns a failure, or `null` when it reproduced. */
function replayEntry(
  session: SolitaireSession,
  entry: TranscriptEntry,
  step: number,
): ReplayError | null {
  switch (entry.kind) {
    case 'player-move':
    case 'player-moves':
    case 'auto-moves': {
      const moves = decodeAll(
        entry.kind === 'player-move' ? [entry.move] : entry.moves,
      );
      if (typeof moves === 'string') {
        return { reason: 'undecodable-move', step, message: moves };
      }
      const result = session.proposeBatch(moves);
      if (!result.ok) {
        return {
          reason: 'rejected-move',
          step,
          message: result.error.message,
        };
      }
      return null;
    }
    case 'undo':
      return session.undo()
        ? null
        : { reason: 'nothing-to-undo', step, message: 'Undo history is empty' };
    case 'redo':
      return session.redo()
        ? null
        : { reason: 'nothing-to-redo', step, message: 'Redo history is empty' };
  }
}

/**
 * Rebuild the world a transcript describes.
 *
 * @returns The world after the last entry, or where and why replay
 *          diverged from the recording.
 * @throws SeedError if the transcript's seed is malformed.
 */
export function replayTranscript(
  transcript: GameTranscript,
  options: ReplayOptions = {},
): Result<SolitaireWorld, ReplayError> {
  const { seed, rules, initialState, initialProgress } = transcript;

  // Only a recording that starts at the deal can be checked against it.
  if (
    seed !== null &&
    initialProgress.moves === 0 &&
    initialProgress.recycles === 0 &&
    !sameBoard(dealBoard(seed), initialState)
  ) {
    return err({
      reason: 'seed-mismatch',
      step: -1,
      message: `Initial board is not the deal of seed ${seed}`,
    });
  }

  const session = SolitaireSession.fromBoard(
    initialState,
    { ...rules, logger: options.logger ?? silentLogger },
    { seed, ...initialProgress },
  );

  for (const [step, entry] of transcript.moves.entries()) {
    const failure = replayEntry(session, entry, step);
    if (failure) return err(failure);

    if (session.moveCount !== entry.moveCount) {
      return err({
        reason: 'move-count-mismatch',
        step,
        message: `Expected ${entry.moveCount} moves after entry ${step}, got ${session.moveCount}`,
      });
    }
  }

  return ok(session.world);
}

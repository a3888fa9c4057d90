/**
 * Game transcript types and recorder for Klondike.
 *
 * Records a replay-ready JSON transcript: the rules, the initial board,
 * every accepted move (in wire form), undo and redo actions, and the
 * final result. {@link replayTranscript} rebuilds a world from one.
 *
 * Usage:
 *   const recorder = new TranscriptRecorder(world);
 *   recorder.recordMove(move, moveCount);
 *   recorder.recordBatch(moves, moveCount, 'auto');
 *   recorder.recordUndo(moveCount);
 *   const transcript = recorder.finalize('won', moveCount);
 */

import type { GameProgress, SolitaireWorld } from './SolitaireComponents';
import { getProgress, getRules, snapshotBoard } from './PileQueries';
import type { RuleSet } from './SolitaireOptions';
import type { BoardSnapshot, GameStatus, Move } from './SolitaireState';
import type { MoveMessage } from './MoveMessage';
import { encodeMove } from './MoveMessage';

// ── Entry types ─────────────────────────────────────────────

/** A single move proposed by a player (local or remote). */
export interface PlayerMoveRecord {
  kind: 'player-move';
  move: MoveMessage;
  /** Move count AFTER this move. */
  moveCount: number;
}

/** Moves a player proposed together as one undo step. */
export interface PlayerBatchRecord {
  kind: 'player-moves';
  moves: MoveMessage[];
  /** Move count AFTER the last of them. */
  moveCount: number;
}

/** Moves applied together as one undo step (auto-play, auto-complete). */
export interface AutoMovesRecord {
  kind: 'auto-moves';
  moves: MoveMessage[];
  /** Move count AFTER the last of them. */
  moveCount: number;
}

export interface UndoRecord {
  kind: 'undo';
  /** Move count AFTER the undo. */
  moveCount: number;
}

export interface RedoRecord {
  kind: 'redo';
  /** Move count AFTER the redo. */
  moveCount: number;
}

export type TranscriptEntry =
  | PlayerMoveRecord
  | PlayerBatchRecord
  | AutoMovesRecord
  | UndoRecord
  | RedoRecord;

// ── Transcript ──────────────────────────────────────────────

export interface GameResult {
  status: GameStatus;
  moveCount: number;
  elapsedSeconds: number;
}

export interface GameTranscript {
  /** Format version for future compatibility. */
  version: 1;
  game: 'klondike';
  /** Seed of the deal, `null` for a game restored from a board. */
  seed: number | null;
  rules: RuleSet;
  /** ISO 8601 timestamp when recording started. */
  startedAt: string;
  /** ISO 8601 timestamp when the game ended (set on finalize). */
  endedAt: string;
  /** Board before the first recorded move. */
  initialState: BoardSnapshot;
  /** Move and recycle counts before the first recorded move. */
  initialProgress: Pick<GameProgress, 'moves' | 'recycles'>;
  moves: TranscriptEntry[];
  /** Final result (set on finalize). */
  result: GameResult | null;
}

// ── TranscriptRecorder ──────────────────────────────────────

export class TranscriptRecorder {
  private readonly transcript: GameTranscript;
  private readonly started: Date;

  /**
   * @param world  The game, in the state recording starts from.
   * @param clock  Source of timestamps. Defaults to the system clock.
   */
  constructor(
    world: SolitaireWorld,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.started = clock();
    const { seed, moves, recycles } = getProgress(world);
    this.transcript = {
      version: 1,
      game: 'klondike',
      seed,
      rules: getRules(world),
      startedAt: this.started.toISOString(),
      endedAt: '',
      initialState: snapshotBoard(world),
      initialProgress: { moves, recycles },
      moves: [],
      result: null,
    };
  }

  recordMove(move: Move, moveCount: number): void {
    this.transcript.moves.push({
      kind: 'player-move',
      move: encodeMove(move),
      moveCount,
    });
  }

  /** Record moves applied as one undo step, by who asked for them. */
  recordBatch(
    moves: readonly Move[],
    moveCount: number,
    by: 'player' | 'auto',
  ): void {
    this.transcript.moves.push({
      kind: by === 'player' ? 'player-moves' : 'auto-moves',
      moves: moves.map(encodeMove),
      moveCount,
    });
  }

  recordUndo(moveCount: number): void {
    this.transcript.moves.push({ kind: 'undo', moveCount });
  }

  recordRedo(moveCount: number): void {
    this.transcript.moves.push({ kind: 'redo', moveCount });
  }

  /**
   * Finalize the transcript with the game outcome.
   *
   * @returns The complete transcript.
   */
  finalize(status: GameStatus, moveCount: number): GameTranscript {
    const ended = this.clock();
    this.transcript.endedAt = ended.toISOString();
    this.transcript.result = {
      status,
      moveCount,
      elapsedSeconds: Math.round(
        (ended.getTime() - this.started.getTime()) / 1000,
      ),
    };
    return this.transcript;
  }

  /**
   * Get the transcript in its current state (may not be finalized).
   */
  getTranscript(): GameTranscript {
    return this.transcript;
  }
}

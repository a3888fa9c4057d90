/**
 * SolitaireSession -- the single writer of a Klondike world.
 *
 * Wraps the stateless engine with what a host needs around it:
 * undo/redo (world snapshots driven by UndoRedoManager), typed events,
 * auto-play, remote move intake and a transcript of the game.
 *
 * Usage:
 * ```ts
 * const session = SolitaireSession.deal(42, { maxRecycles: 2 });
 * session.events.on('move-applied', ({ outcome }) => render(outcome));
 * session.events.on('game-won', () => celebrate());
 * session.start();
 * session.propose({ kind: 'stock-to-waste' });
 * session.autoPlay();
 * session.undo();
 * ```
 *
 * Events are emitted after the world has been updated, so listeners may
 * call back into the session. The session is not reentrant while a move
 * is being applied.
 */

import { cardLabel } from '../card-system/Card';
import type { Command } from '../core-engine/UndoRedoManager';
import { CompoundCommand, UndoRedoManager } from '../core-engine/UndoRedoManager';
import { GameEventEmitter } from '../core-engine/GameEventEmitter';
import type { Logger } from '../core-engine/Logger';
import { createConsoleLogger } from '../core-engine/Logger';
import type { CardView } from '../core-engine/TranscriptTypes';
import type { WorldSnapshot } from '../ecs/World';
import type { Result } from '../rule-engine/Result';
import { err, ok } from '../rule-engine/Result';
import { findSafeAutoMoves, getAutoCompleteMoves } from './SolitaireAutoPlay';
import type { GameProgress, SolitaireWorld } from './SolitaireComponents';
import type { GameTranscript } from './GameTranscript';
import { TranscriptRecorder } from './GameTranscript';
import type { MoveDecodeError } from './MoveMessage';
import { parseMove } from './MoveMessage';
import { getProgress } from './PileQueries';
import {
  proposeMove,
  queryPile,
  queryState,
  snapshotBoard,
} from './SolitaireGame';
import { buildFromBoard, buildLayout } from './SolitaireLayout';
import type { GameOptions } from './SolitaireOptions';
import { getLegalMoves, isStockMove } from './SolitaireRules';
import type {
  BoardSnapshot,
  GameStatus,
  IllegalMove,
  Move,
  MoveOutcome,
  PileId,
} from './SolitaireState';
import { foundationId, tableauId } from './SolitaireState';

// ── Events ──────────────────────────────────────────────────

/** Who asked for a move. */
export type MoveSource = 'player' | 'remote' | 'auto';

export interface SolitaireEventMap {
  'game-started': { seed: number | null; board: BoardSnapshot };
  'move-applied': { outcome: MoveOutcome; source: MoveSource };
  'move-rejected': { error: IllegalMove; source: MoveSource };
  'card-flipped': { card: CardView };
  'stock-recycled': { recycles: number };
  undo: { moveCount: number; status: GameStatus };
  redo: { moveCount: number; status: GameStatus };
  'game-won': { moveCount: number };
  'game-stuck': { moveCount: number };
}

// ── Options ─────────────────────────────────────────────────

export type SessionOptions = GameOptions & {
  /** Defaults to a console logger tagged `[Session]`. */
  logger?: Logger;
  /** Maximum undo steps kept. Defaults to unlimited. */
  undoLimit?: number;
  /** Timestamp source for the transcript. */
  clock?: () => Date;
};

// ── Commands ────────────────────────────────────────────────

/** One applied move, undone and redone by restoring world snapshots. */
class SnapshotCommand implements Command {
  constructor(
    private readonly world: SolitaireWorld,
    private readonly before: WorldSnapshot,
    private readonly after: WorldSnapshot,
    readonly description: string,
  ) {}

  execute(): void {
    this.world.restore(this.after);
  }

  undo(): void {
    this.world.restore(this.before);
  }
}

/** Short human-readable form of a move, e.g. `7♣ tableau-2 -> tableau-5`. */
export function describeMove(move: Move): string {
  switch (move.kind) {
    case 'tableau-to-tableau':
      return `${cardLabel(move.card)} ${tableauId(move.from)} -> ${tableauId(
        move.to,
      )}`;
    case 'tableau-to-foundation':
    case 'waste-to-foundation':
      return `${cardLabel(move.card)} -> ${foundationId(move.to)}`;
    case 'foundation-to-tableau':
      return `${cardLabel(move.card)} ${foundationId(
        move.from,
      )} -> ${tableauId(move.to)}`;
    case 'waste-to-tableau':
      return `${cardLabel(move.card)} waste -> ${tableauId(move.to)}`;
    case 'stock-to-waste':
      return 'draw';
    case 'recycle-waste':
      return 'recycle';
  }
}

// ── Session ─────────────────────────────────────────────────

export class SolitaireSession {
  readonly events = new GameEventEmitter<SolitaireEventMap>();

  private readonly history: UndoRedoManager;
  private readonly recorder: TranscriptRecorder;
  private readonly logger: Logger;
  private lastStatus: GameStatus;
  private applying = false;

  constructor(
    private readonly state: SolitaireWorld,
    options: SessionOptions = {},
  ) {
    this.logger = options.logger ?? createConsoleLogger('Session');
    this.history = new UndoRedoManager(options.undoLimit);
    this.recorder = new TranscriptRecorder(state, options.clock);
    this.lastStatus = queryState(state, { logger: this.logger });
  }

  /**
   * Deal a new game and open a session on it.
   *
   * @throws SeedError if the seed is malformed.
   */
  static deal(seed: number, options: SessionOptions = {}): SolitaireSession {
    return new SolitaireSession(buildLayout(seed, options), options);
  }

  /**
   * Open a session on a saved board.
   *
   * @param progress  Counters to resume from; each defaults to a fresh game.
   * @throws LayoutError if the board breaks a world invariant.
   */
  static fromBoard(
    board: BoardSnapshot,
    options: SessionOptions = {},
    progress: Partial<GameProgress> = {},
  ): SolitaireSession {
    return new SolitaireSession(
      buildFromBoard(board, options, progress),
      options,
    );
  }

  /** The session's world, for read-only queries. */
  get world(): SolitaireWorld {
    return this.state;
  }

  get moveCount(): number {
    return getProgress(this.state).moves;
  }

  /** Announce the deal to listeners. */
  start(): BoardSnapshot {
    const board = snapshotBoard(this.state);
    const { seed } = getProgress(this.state);
    this.events.emit('game-started', { seed, board });
    this.logger.info(`Game started (seed ${seed ?? 'none'})`);
    return board;
  }

  // ── Moves ───────────────────────────────────────────────────

  /** Propose a local player move. */
  propose(move: Move): Result<MoveOutcome, IllegalMove> {
    return this.submit(move, 'player');
  }

  /**
   * Take a move relayed from a peer as JSON text and propose it.
   *
   * Messages that do not decode are rejected without touching the game.
   */
  receiveRemote(
    text: string,
  ): Result<MoveOutcome, IllegalMove | MoveDecodeError> {
    const decoded = parseMove(text);
    if (!decoded.ok) {
      this.logger.warn(
        `Dropped remote move (${decoded.error.reason}): ${decoded.error.message}`,
      );
      return decoded;
    }
    return this.submit(decoded.value, 'remote');
  }

  /**
   * Apply several moves as a single undo step.
   *
   * All or nothing: if any move is rejected, the moves before it are
   * rolled back and the rejection is returned.
   */
  proposeBatch(moves: readonly Move[]): Result<MoveOutcome[], IllegalMove> {
    return this.commitBatch((i) => moves[i], 'player');
  }

  /**
   * Send every safe card to the foundations, repeating until none is
   * left. One undo step.
   *
   * @returns The applied moves' outcomes (empty when nothing was safe).
   */
  autoPlay(): Result<MoveOutcome[], IllegalMove> {
    return this.commitBatch(() => findSafeAutoMoves(this.state)[0], 'auto');
  }

  /**
   * Finish a trivially winnable game in one undo step.
   *
   * @returns The applied moves' outcomes, empty when the game cannot be
   *          completed automatically.
   */
  autoComplete(): Result<MoveOutcome[], IllegalMove> {
    const moves = getAutoCompleteMoves(this.state);
    return this.commitBatch((i) => moves[i], 'auto');
  }

  /** Undo the last move or batch. Returns `false` if there was none. */
  undo(): boolean {
    const command = this.exclusive(() => this.history.undo());
    if (command === undefined) return false;

    const { moveCount } = this;
    const status = this.status();
    this.recorder.recordUndo(moveCount);
    this.events.emit('undo', { moveCount, status });
    this.updateStatus(status);
    return true;
  }

  /** Redo the last undone move or batch. Returns `false` if there was none. */
  redo(): boolean {
    const command = this.exclusive(() => this.history.redo());
    if (command === undefined) return false;

    const { moveCount } = this;
    const status = this.status();
    this.recorder.recordRedo(moveCount);
    this.events.emit('redo', { moveCount, status });
    this.updateStatus(status);
    return true;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  // ── Queries ─────────────────────────────────────────────────

  /**
   * Legal moves, tableau/waste/foundation moves first and the stock
   * move last.
   */
  hint(): Move[] {
    const moves = getLegalMoves(this.state);
    return [
      ...moves.filter((move) => !isStockMove(move)),
      ...moves.filter(isStockMove),
    ];
  }

  status(): GameStatus {
    return queryState(this.state, { logger: this.logger });
  }

  pile(id: PileId): CardView[] {
    return queryPile(this.state, id, { logger: this.logger });
  }

  board(): BoardSnapshot {
    return snapshotBoard(this.state);
  }

  /** The transcript so far (not finalized). */
  transcript(): GameTranscript {
    return this.recorder.getTranscript();
  }

  /** Finalize and return the transcript with the current status. */
  finish(): GameTranscript {
    return this.recorder.finalize(this.status(), this.moveCount);
  }

  // ── Internals ───────────────────────────────────────────────

  private exclusive<T>(fn: () => T): T {
    if (this.applying) {
      throw new Error('SolitaireSession is not reentrant while a move is applied');
    }
    this.applying = true;
    try {
      return fn();
    } finally {
      this.applying = false;
    }
  }

  private submit(
    move: Move,
    source: MoveSource,
  ): Result<MoveOutcome, IllegalMove> {
    const before = this.state.snapshot();
    const result = this.exclusive(() =>
      proposeMove(this.state, move, { logger: this.logger }),
    );
    if (!result.ok) {
      this.events.emit('move-rejected', { error: result.error, source });
      return result;
    }

    this.history.record(
      new SnapshotCommand(
        this.state,
        before,
        this.state.snapshot(),
        describeMove(move),
      ),
    );
    this.recorder.recordMove(move, result.value.moveCount);
    this.announce(result.value, source);
    this.updateStatus(result.value.status);
    return result;
  }

  /**
   * Apply moves produced by `next` until it returns `undefined`, as one
   * undo step. A rejection or a thrown error restores the world to where
   * the batch started.
   */
  private commitBatch(
    next: (index: number) => Move | undefined,
    source: 'player' | 'auto',
  ): Result<MoveOutcome[], IllegalMove> {
    const start = this.state.snapshot();
    const commands: Command[] = [];
    const moves: Move[] = [];
    const outcomes: MoveOutcome[] = [];

    const failure = this.exclusive((): IllegalMove | null => {
      let before = start;
      try {
        for (let move = next(0); move !== undefined; move = next(moves.length)) {
          const result = proposeMove(this.state, move, { logger: this.logger });
          if (!result.ok) {
            this.state.restore(start);
            return result.error;
          }
          const after = this.state.snapshot();
          commands.push(
            new SnapshotCommand(this.state, before, after, describeMove(move)),
          );
          moves.push(move);
          outcomes.push(result.value);
          before = after;
        }
      } catch (error) {
        this.state.restore(start);
        throw error;
      }
      return null;
    });

    if (failure) {
      this.events.emit('move-rejected', { error: failure, source });
      return err(failure);
    }

    const last = outcomes[outcomes.length - 1];
    if (last === undefined) return ok([]);

    this.history.record(
      new CompoundCommand(commands, `${commands.length} move(s)`),
    );
    this.recorder.recordBatch(moves, last.moveCount, source);
    for (const outcome of outcomes) {
      this.announce(outcome, source);
    }
    this.updateStatus(last.status);
    return ok(outcomes);
  }

  private announce(outcome: MoveOutcome, source: MoveSource): void {
    this.events.emit('move-applied', { outcome, source });
    if (outcome.flipped) {
      this.events.emit('card-flipped', { card: outcome.flipped });
    }
    if (outcome.recycled) {
      this.events.emit('stock-recycled', {
        recycles: getProgress(this.state).recycles,
      });
    }
  }

  private updateStatus(status: GameStatus): void {
    if (status === this.lastStatus) return;
    this.lastStatus = status;
    if (status === 'won') {
      this.logger.info(`Game won in ${this.moveCount} moves`);
      this.events.emit('game-won', { moveCount: this.moveCount });
    } else if (status === 'no-legal-moves') {
      this.logger.info(`No legal moves left after ${this.moveCount} moves`);
      this.events.emit('game-stuck', { moveCount: this.moveCount });
    }
  }
}

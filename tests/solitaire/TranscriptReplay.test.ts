import { describe, it, expect } from 'vitest';
import type { GameTranscript } from '../../src/solitaire/GameTranscript';
import { encodeMove } from '../../src/solitaire/MoveMessage';
import { getProgress, snapshotBoard } from '../../src/solitaire/PileQueries';
import { newGame, proposeMove } from '../../src/solitaire/SolitaireGame';
import { dealBoard } from '../../src/solitaire/SolitaireLayout';
import { silentLogger } from '../../src/core-engine/Logger';
import { SolitaireSession } from '../../src/solitaire/SolitaireSession';
import type { Move } from '../../src/solitaire/SolitaireState';
import { replayTranscript, sameBoard } from '../../src/solitaire/TranscriptReplay';
import { board, card } from './helpers';

const ACE_OF_HEARTS_HOME: Move = {
  kind: 'tableau-to-foundation',
  card: card('Ah'),
  to: 'hearts',
};

function emptyTranscript(): GameTranscript {
  return SolitaireSession.deal(42, { logger: silentLogger }).transcript();
}

describe('replayTranscript', () => {
  it('should rebuild a played game from its JSON transcript', () => {
    const game = SolitaireSession.deal(42, { logger: silentLogger });
    game.propose(ACE_OF_HEARTS_HOME);
    game.propose({ kind: 'stock-to-waste' });
    game.undo();
    game.redo();
    game.propose({ kind: 'tableau-to-tableau', card: card('Jh'), from: 1, to: 5 });
    const auto = game.autoPlay();
    expect(auto.ok && auto.value.length).toBe(1);

    const text = JSON.stringify(game.finish());
    const restored: GameTranscript = JSON.parse(text);
    const result = replayTranscript(restored);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(snapshotBoard(result.value)).toEqual(game.board());
    expect(getProgress(result.value)).toEqual(getProgress(game.world));
  });

  it('should replay a game restored from a board', () => {
    const game = SolitaireSession.fromBoard(
      board({ waste: ['Ad'], tableau: [['Kc']] }),
      { logger: silentLogger },
    );
    game.propose({ kind: 'waste-to-foundation', card: card('Ad'), to: 'diamonds' });

    const result = replayTranscript(game.transcript());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(snapshotBoard(result.value)).toEqual(game.board());
  });

  it('should replay a player batch as one step', () => {
    const game = SolitaireSession.deal(42, { logger: silentLogger });
    game.proposeBatch([ACE_OF_HEARTS_HOME, { kind: 'stock-to-waste' }]);
    game.undo();
    game.redo();

    const result = replayTranscript(game.transcript());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(snapshotBoard(result.value)).toEqual(game.board());
    expect(getProgress(result.value).moves).toBe(2);
  });

  it('should replay a recording that began after the deal', () => {
    const world = newGame(42, { maxRecycles: 0 });
    proposeMove(world, { kind: 'stock-to-waste' }, { logger: silentLogger });
    const game = new SolitaireSession(world, { logger: silentLogger });
    game.propose({ kind: 'stock-to-waste' });

    const result = replayTranscript(game.finish());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(snapshotBoard(result.value)).toEqual(game.board());
    expect(getProgress(result.value)).toEqual({ seed: 42, moves: 2, recycles: 0 });
  });

  it('should resume the recycle count so the limit still applies', () => {
    const game = SolitaireSession.fromBoard(
      board({ waste: ['5c', 'Ad'], tableau: [['Kc']], filler: 0 }),
      { maxRecycles: 1, logger: silentLogger },
      { moves: 4, recycles: 1 },
    );
    game.propose({ kind: 'waste-to-foundation', card: card('Ad'), to: 'diamonds' });

    const result = replayTranscript(game.transcript());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(getProgress(result.value)).toEqual({ seed: null, moves: 5, recycles: 1 });
    const recycle = proposeMove(result.value, { kind: 'stock-to-waste' }, { logger: silentLogger });
    expect(recycle.ok || recycle.error.reason).toBe('recycle-limit-exceeded');
  });

  it('should reject a transcript whose board is not the deal of its seed', () => {
    const transcript = { ...emptyTranscript(), seed: 7 };
    expect(replayTranscript(transcript)).toEqual({
      ok: false,
      error: {
        reason: 'seed-mismatch',
        step: -1,
        message: 'Initial board is not the deal of seed 7',
      },
    });
  });

  it('should stop at a move that is no longer legal', () => {
    const transcript: GameTranscript = {
      ...emptyTranscript(),
      moves: [
        {
          kind: 'player-move',
          move: encodeMove({ kind: 'waste-to-tableau', card: card('Ad'), to: 0 }),
          moveCount: 1,
        },
      ],
    };
    const result = replayTranscript(transcript);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('rejected-move');
    expect(result.error.step).toBe(0);
  });

  it('should stop at a move that does not decode', () => {
    const transcript: GameTranscript = {
      ...emptyTranscript(),
      moves: [
        {
          kind: 'player-move',
          move: { v: 1, type: 'tableau-to-tableau', card: null, from: 'tableau-0', to: 'tableau-1' },
          moveCount: 1,
        },
      ],
    };
    expect(replayTranscript(transcript)).toEqual({
      ok: false,
      error: {
        reason: 'undecodable-move',
        step: 0,
        message: 'tableau-to-tableau needs a card',
      },
    });
  });

  it('should stop at an undo with nothing to undo', () => {
    const transcript: GameTranscript = {
      ...emptyTranscript(),
      moves: [{ kind: 'undo', moveCount: 0 }],
    };
    const result = replayTranscript(transcript);
    expect(result.ok || result.error.reason).toBe('nothing-to-undo');
  });

  it('should detect a move count that does not match the recording', () => {
    const transcript: GameTranscript = {
      ...emptyTranscript(),
      moves: [{ kind: 'player-move', move: encodeMove(ACE_OF_HEARTS_HOME), moveCount: 5 }],
    };
    expect(replayTranscript(transcript)).toEqual({
      ok: false,
      error: {
        reason: 'move-count-mismatch',
        step: 0,
        message: 'Expected 5 moves after entry 0, got 1',
      },
    });
  });
});

describe('sameBoard', () => {
  it('should compare boards card by card', () => {
    const deal = dealBoard(42);
    expect(sameBoard(deal, dealBoard(42))).toBe(true);
    expect(sameBoard(deal, dealBoard(43))).toBe(false);
  });
});

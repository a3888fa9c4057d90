import { describe, it, expect } from 'vitest';
import {
  MOVE_MESSAGE_VERSION,
  decodeMove,
  encodeMove,
  parseMove,
  serializeMove,
} from '../../src/solitaire/MoveMessage';
import type { Move } from '../../src/solitaire/SolitaireState';
import { card } from './helpers';

describe('encodeMove', () => {
  it('should flatten a tableau run move with both columns', () => {
    expect(
      encodeMove({ kind: 'tableau-to-tableau', card: card('9h'), from: 0, to: 3 }),
    ).toEqual({
      v: MOVE_MESSAGE_VERSION,
      type: 'tableau-to-tableau',
      card: { rank: '9', suit: 'hearts' },
      from: 'tableau-0',
      to: 'tableau-3',
    });
  });

  it('should leave the source of a tableau-to-foundation move open', () => {
    expect(
      encodeMove({ kind: 'tableau-to-foundation', card: card('2h'), to: 'hearts' }),
    ).toEqual({
      v: 1,
      type: 'tableau-to-foundation',
      card: { rank: '2', suit: 'hearts' },
      from: null,
      to: 'foundation-hearts',
    });
  });

  it('should encode the fixed piles of stock moves', () => {
    expect(encodeMove({ kind: 'recycle-waste' })).toEqual({
      v: 1,
      type: 'recycle-waste',
      card: null,
      from: 'waste',
      to: 'stock',
    });
  });
});

describe('serializeMove', () => {
  it('should produce a flat JSON record', () => {
    expect(serializeMove({ kind: 'stock-to-waste' })).toBe(
      '{"v":1,"type":"stock-to-waste","card":null,"from":"stock","to":"waste"}',
    );
  });
});

describe('parseMove', () => {
  const moves: Move[] = [
    { kind: 'tableau-to-tableau', card: card('Kc'), from: 6, to: 0 },
    { kind: 'foundation-to-tableau', card: card('5d'), from: 'diamonds', to: 2 },
    { kind: 'waste-to-tableau', card: card('10s'), to: 4 },
    { kind: 'waste-to-foundation', card: card('Ah'), to: 'hearts' },
  ];

  it.each(moves)('should read back $kind', (move) => {
    expect(parseMove(serializeMove(move))).toEqual({ ok: true, value: move });
  });

  it('should report text that is not JSON', () => {
    const result = parseMove('{"v":1,');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('malformed-json');
  });
});

describe('decodeMove', () => {
  it('should reject an unknown version', () => {
    const result = decodeMove({
      v: 2,
      type: 'stock-to-waste',
      card: null,
      from: 'stock',
      to: 'waste',
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('invalid-shape');
    expect(result.error.message).toMatch(/^v: /);
  });

  it('should reject values that are not records', () => {
    const result = decodeMove('stock-to-waste');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('invalid-shape');
  });

  it('should reject unknown pile ids and ranks', () => {
    const badPile = decodeMove({
      v: 1,
      type: 'waste-to-tableau',
      card: { rank: '7', suit: 'clubs' },
      from: 'waste',
      to: 'tableau-7',
    });
    expect(badPile.ok).toBe(false);

    const badRank = decodeMove({
      v: 1,
      type: 'waste-to-tableau',
      card: { rank: '1', suit: 'clubs' },
      from: 'waste',
      to: 'tableau-1',
    });
    expect(badRank.ok).toBe(false);
  });

  it('should accept omitted fixed piles', () => {
    expect(
      decodeMove({ v: 1, type: 'stock-to-waste', card: null, from: null, to: null }),
    ).toEqual({ ok: true, value: { kind: 'stock-to-waste' } });
  });

  it('should ignore extra card fields', () => {
    expect(
      decodeMove({
        v: 1,
        type: 'waste-to-foundation',
        card: { rank: 'A', suit: 'hearts', faceState: 'face-up' },
        from: 'waste',
        to: 'foundation-hearts',
      }),
    ).toEqual({
      ok: true,
      value: { kind: 'waste-to-foundation', card: card('Ah'), to: 'hearts' },
    });
  });

  it('should reject piles that do not fit the move type', () => {
    expect(
      decodeMove({
        v: 1,
        type: 'tableau-to-tableau',
        card: { rank: '9', suit: 'hearts' },
        from: 'waste',
        to: 'tableau-2',
      }),
    ).toEqual({
      ok: false,
      error: {
        reason: 'invalid-operands',
        message: 'tableau-to-tableau needs tableau source and destination',
      },
    });

    expect(
      decodeMove({ v: 1, type: 'stock-to-waste', card: null, from: 'waste', to: 'stock' }),
    ).toEqual({
      ok: false,
      error: { reason: 'invalid-operands', message: 'stock-to-waste runs from stock to waste' },
    });
  });

  it('should reject a card move without a card', () => {
    expect(
      decodeMove({
        v: 1,
        type: 'waste-to-foundation',
        card: null,
        from: 'waste',
        to: 'foundation-hearts',
      }),
    ).toEqual({
      ok: false,
      error: { reason: 'invalid-operands', message: 'waste-to-foundation needs a card' },
    });
  });

  it('should reject a tableau-to-foundation move from the waste', () => {
    const result = decodeMove({
      v: 1,
      type: 'tableau-to-foundation',
      card: { rank: 'A', suit: 'hearts' },
      from: 'waste',
      to: 'foundation-hearts',
    });
    expect(result).toEqual({
      ok: false,
      error: {
        reason: 'invalid-operands',
        message: 'tableau-to-foundation must come from the tableau',
      },
    });
  });
});

import { describe, it, expect } from 'vitest';
import {
  canRecycle,
  detectStatus,
  isWon,
  reachableThroughStock,
} from '../../src/solitaire/SolitaireStatus';
import { buildFromBoard, buildLayout } from '../../src/solitaire/SolitaireLayout';
import { applyMove } from '../../src/solitaire/SolitaireRules';
import { worldFrom, wonBoard } from './helpers';

/** Seven same-colour tops with nothing else in play. */
const BLOCKED_TABLEAU = [['Ks'], ['Qs'], ['Js'], ['10s'], ['9s'], ['8s'], ['7s']];

describe('detectStatus', () => {
  it('should report a fresh deal as in progress', () => {
    expect(detectStatus(buildLayout(42))).toBe('in-progress');
  });

  it('should report full foundations as won', () => {
    const world = buildFromBoard(wonBoard());
    expect(isWon(world)).toBe(true);
    expect(detectStatus(world)).toBe('won');
  });

  it('should report a board with no move at all as stuck', () => {
    const world = worldFrom({ tableau: BLOCKED_TABLEAU, filler: 0 });
    expect(detectStatus(world)).toBe('no-legal-moves');
  });

  it('should report stuck when draws remain but no drawn card can play', () => {
    const world = worldFrom({ tableau: BLOCKED_TABLEAU, stock: ['5c', '3c'], filler: 0 });
    expect(detectStatus(world)).toBe('no-legal-moves');
  });

  it('should stay in progress while a stock card could play', () => {
    const world = worldFrom({ tableau: BLOCKED_TABLEAU, stock: ['Ad', '5c'], filler: 0 });
    expect(detectStatus(world)).toBe('in-progress');
  });

  it('should count a buried waste card only while recycling is allowed', () => {
    const shape = { tableau: BLOCKED_TABLEAU, waste: ['Ad', '5c'], filler: 0 as const };

    const unlimited = worldFrom(shape);
    expect(canRecycle(unlimited)).toBe(true);
    expect(detectStatus(unlimited)).toBe('in-progress');

    const limited = worldFrom(shape, { maxRecycles: 0 });
    expect(canRecycle(limited)).toBe(false);
    expect(reachableThroughStock(limited)).toEqual([]);
    expect(detectStatus(limited)).toBe('no-legal-moves');
  });

  it('should stay in progress when only the waste top can play', () => {
    const world = worldFrom(
      { tableau: BLOCKED_TABLEAU, waste: ['5c', 'Ad'], filler: 0 },
      { maxRecycles: 0 },
    );
    expect(detectStatus(world)).toBe('in-progress');
  });

  it('should report stuck once the last playable card is spent', () => {
    const world = worldFrom({
      tableau: [['Ks'], ['Qs'], ['Js'], ['10s'], ['9s'], ['8s'], ['7s']],
      waste: ['6h'],
      filler: 0,
    });
    expect(detectStatus(world)).toBe('in-progress');

    const result = applyMove(world, { kind: 'waste-to-tableau', card: { rank: '6', suit: 'hearts' }, to: 6 });
    expect(result.ok).toBe(true);
    expect(detectStatus(world)).toBe('no-legal-moves');
  });

  it('should be idempotent', () => {
    const world = buildLayout(7);
    const first = detectStatus(world);
    expect(detectStatus(world)).toBe(first);
    expect(detectStatus(world)).toBe(first);
  });
});

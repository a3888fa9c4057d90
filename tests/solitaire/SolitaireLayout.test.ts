import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  buildFromBoard,
  buildLayout,
  dealBoard,
  tableauSizes,
} from '../../src/solitaire/SolitaireLayout';
import { checkInvariants } from '../../src/solitaire/SolitaireInvariants';
import {
  cardsInPile,
  findPile,
  getProgress,
  getRules,
  snapshotBoard,
} from '../../src/solitaire/PileQueries';
import { LayoutError, SeedError } from '../../src/solitaire/errors';
import { queryState } from '../../src/solitaire/SolitaireGame';
import { PILE_IDS } from '../../src/solitaire/SolitaireState';
import { board, codes } from './helpers';

describe('dealBoard', () => {
  it('should deal tableau columns of 1..7 cards and 24 to the stock', () => {
    const dealt = dealBoard(42);
    expect(tableauSizes(dealt)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(dealt.stock).toHaveLength(24);
    expect(dealt.waste).toHaveLength(0);
    expect(dealt.foundations.hearts).toHaveLength(0);
  });

  it('should leave only the last card of each column face-up', () => {
    const dealt = dealBoard(1234);
    dealt.tableau.forEach((column) => {
      const states = column.map((c) => c.faceState);
      expect(states[states.length - 1]).toBe('face-up');
      expect(states.slice(0, -1).every((s) => s === 'face-down')).toBe(true);
    });
    expect(dealt.stock.every((c) => c.faceState === 'face-down')).toBe(true);
  });

  it('should deal row by row from the shuffled deck', () => {
    const dealt = dealBoard(42);
    expect(codes(dealt.tableau[0])).toEqual(['5h']);
    expect(codes(dealt.tableau[1])).toEqual(['~9s', 'Jh']);
    expect(codes(dealt.tableau[6])).toEqual([
      '~9h',
      '~Ks',
      '~Kc',
      '~Ac',
      '~2s',
      '~Qh',
      'Ah',
    ]);
    expect(codes(dealt.stock.slice(-3))).toEqual(['~3h', '~5c', '~Ad']);
  });

  it('should be deterministic in the seed', () => {
    expect(dealBoard(99)).toEqual(dealBoard(99));
    expect(dealBoard(99)).not.toEqual(dealBoard(100));
  });

  it.each([-1, 1.5, 2 ** 32, Number.NaN])(
    'should reject malformed seed %s with SeedError',
    (seed) => {
      expect(() => dealBoard(seed)).toThrow(SeedError);
    },
  );

  it('should accept the full unsigned 32-bit range', () => {
    expect(() => dealBoard(0)).not.toThrow();
    expect(() => dealBoard(2 ** 32 - 1)).not.toThrow();
  });
});

describe('buildLayout', () => {
  it('should populate 52 cards, 13 piles and the table entity', () => {
    const world = buildLayout(42);
    expect(world.entities.size).toBe(66);
    expect(world.store('cardIdentity').size).toBe(52);
    expect(world.store('pileKind').size).toBe(PILE_IDS.length);
    expect(cardsInPile(world, findPile(world, 'stock'))).toHaveLength(24);
  });

  it('should store resolved rules and fresh counters', () => {
    const world = buildLayout(7, { maxRecycles: 3 });
    expect(getRules(world)).toEqual({
      maxRecycles: 3,
      emptyTableau: 'king-only',
      debug: false,
    });
    expect(getProgress(world)).toEqual({ seed: 7, moves: 0, recycles: 0 });
  });

  it('should project back to the dealt board', () => {
    expect(snapshotBoard(buildLayout(42))).toEqual(dealBoard(42));
  });

  it('should satisfy every world invariant for many seeds', () => {
    for (let seed = 0; seed < 40; seed++) {
      expect(checkInvariants(buildLayout(seed * 7919))).toEqual([]);
    }
  });

  it('should start seed 42 in progress', () => {
    expect(queryState(buildLayout(42))).toBe('in-progress');
  });

  it('should reject bad options with a ZodError', () => {
    expect(() => buildLayout(1, { maxRecycles: -1 })).toThrow(ZodError);
  });

  it('should reject a malformed seed', () => {
    expect(() => buildLayout(-5)).toThrow('Invalid seed -5: Seed must be non-negative');
  });
});

describe('buildFromBoard', () => {
  it('should rebuild a world from a board projection', () => {
    const saved = board({
      tableau: [['Kh'], ['~5c', 'Qs']],
      waste: ['3d', '9h'],
      foundations: { spades: 2 },
    });
    const world = buildFromBoard(saved);

    expect(snapshotBoard(world)).toEqual(saved);
    expect(getProgress(world).seed).toBeNull();
    expect(checkInvariants(world)).toEqual([]);
  });

  it('should resume from the given counters', () => {
    const world = buildFromBoard(board({}), {}, { seed: 9, moves: 12, recycles: 2 });
    expect(getProgress(world)).toEqual({ seed: 9, moves: 12, recycles: 2 });
  });

  it('should reject negative counters', () => {
    expect(() => buildFromBoard(board({}), {}, { moves: -1 })).toThrow(
      'Invalid board: move count must be a non-negative integer, got -1',
    );
  });

  it('should reject a board missing a card', () => {
    const saved = board({});
    const broken = { ...saved, stock: saved.stock.slice(1) };
    expect(() => buildFromBoard(broken)).toThrow(LayoutError);
    expect(() => buildFromBoard(broken)).toThrow(
      'Invalid board: expected 52 distinct cards, got 51 distinct of 51',
    );
  });

  it('should reject duplicated cards and wrong face states', () => {
    const saved = board({ waste: ['7c'] });
    const broken = {
      ...saved,
      waste: [...saved.waste, { rank: '7', suit: 'clubs', faceState: 'face-down' } as const],
    };

    try {
      buildFromBoard(broken);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LayoutError);
      if (error instanceof LayoutError) {
        expect(error.problems).toEqual([
          '7♣ appears more than once',
          'expected 52 distinct cards, got 52 distinct of 53',
          'waste cards must be face-up',
        ]);
      }
    }
  });

  it('should reject a broken foundation run', () => {
    const saved = board({});
    const broken = {
      ...saved,
      stock: saved.stock.filter((c) => !(c.rank === '2' && c.suit === 'hearts')),
      foundations: {
        ...saved.foundations,
        hearts: [{ rank: '2', suit: 'hearts', faceState: 'face-up' } as const],
      },
    };
    expect(() => buildFromBoard(broken)).toThrow(
      'Invalid board: foundation-hearts position 0 holds 2♥',
    );
  });

  it('should reject a tableau run that does not alternate', () => {
    const saved = board({ tableau: [['8h', '7d']] });
    expect(() => buildFromBoard(saved)).toThrow(
      'Invalid board: tableau-0 run breaks at 8♥ -> 7♦',
    );
  });

  it('should reject a column with no face-up top', () => {
    const saved = board({ tableau: [['~4c']] });
    expect(() => buildFromBoard(saved)).toThrow(
      'Invalid board: tableau-0 has no face-up top card',
    );
  });

  it('should serialize LayoutError with its problems', () => {
    const error = new LayoutError(['a', 'b']);
    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'LayoutError',
      message: 'Invalid board: a; b',
      problems: ['a', 'b'],
    });
  });
});

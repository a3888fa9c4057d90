/**
 * Game configuration and seed validation.
 *
 * Options arrive as loose input from the host and are resolved once,
 * at game start, into a RuleSet that is stored in the world. Both the
 * rule options and seeds are validated with zod.
 */

import { z } from 'zod';
import { MAX_SEED } from '../card-system/SeededRng';
import { SeedError } from './errors';

/**
 * What an empty tableau column accepts.
 *
 * - `king-only` -- only a King (or a run headed by one). Standard rule.
 * - `any-card`  -- any card or run.
 */
export const EMPTY_TABLEAU_RULES = ['king-only', 'any-card'] as const;

export type EmptyTableauRule = (typeof EMPTY_TABLEAU_RULES)[number];

export const GameOptionsSchema = z.object({
  /** Waste-to-stock turnovers allowed per game; `null` means unlimited. */
  maxRecycles: z.number().int().min(0).nullable().default(null),
  /** Empty tableau acceptance rule. */
  emptyTableau: z.enum(EMPTY_TABLEAU_RULES).default('king-only'),
  /**
   * Treat internal errors as fatal and check world invariants after
   * every move.
   */
  debug: z.boolean().default(false),
});

/** Options as the host passes them (every field optional). */
export type GameOptions = z.input<typeof GameOptionsSchema>;

/** Fully resolved rule set, stored on the world's table entity. */
export type RuleSet = Readonly<z.output<typeof GameOptionsSchema>>;

/** Seeds are unsigned 32-bit integers. */
export const SeedSchema = z
  .number()
  .int({ message: 'Seed must be an integer' })
  .min(0, { message: 'Seed must be non-negative' })
  .max(MAX_SEED, { message: 'Seed must fit in 32 bits' });

/**
 * Resolve host options into a RuleSet, filling defaults.
 *
 * @throws ZodError if an option has the wrong type or range.
 */
export function resolveRules(options: GameOptions = {}): RuleSet {
  return GameOptionsSchema.parse(options);
}

/**
 * Validate a seed.
 *
 * @throws SeedError if the value is not an integer in [0, 2^32 - 1].
 */
export function validateSeed(seed: unknown): number {
  const parsed = SeedSchema.safeParse(seed);
  if (!parsed.success) {
    const detail = parsed.error.issues[0]?.message ?? 'invalid seed';
    throw new SeedError(seed, detail);
  }
  return parsed.data;
}

/**
 * Errors raised by the solitaire layer.
 *
 * Expected rejections (illegal moves, undecodable messages) are not
 * errors; they travel inside a Result. These classes cover bad input to
 * game construction and broken world invariants.
 */

/** Malformed seed passed to the layout builder. Retry with a valid seed. */
export class SeedError extends Error {
  readonly name = 'SeedError';

  constructor(
    public readonly seed: unknown,
    detail: string,
  ) {
    super(`Invalid seed ${String(seed)}: ${detail}`);
  }

  toJSON(): { name: string; message: string; seed: string } {
    return { name: this.name, message: this.message, seed: String(this.seed) };
  }
}

/** A board snapshot that cannot be turned into a valid world. */
export class LayoutError extends Error {
  readonly name = 'LayoutError';

  constructor(public readonly problems: readonly string[]) {
    super(`Invalid board: ${problems.join('; ')}`);
  }

  toJSON(): { name: string; message: string; problems: readonly string[] } {
    return { name: this.name, message: this.message, problems: this.problems };
  }
}

/** World invariants broken after a move (debug mode only). */
export class InvariantError extends Error {
  readonly name = 'InvariantError';

  constructor(public readonly violations: readonly string[]) {
    super(`World invariants violated: ${violations.join('; ')}`);
  }
}

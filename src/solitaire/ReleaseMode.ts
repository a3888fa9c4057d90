/**
 * Internal errors at the embedding boundary.
 *
 * A missing component or a stale entity id means the world itself is
 * broken. In debug mode such errors reach the host; otherwise boundary
 * calls log them and answer with a neutral fallback.
 */

import { MissingComponentError, StaleEntityError } from '../ecs/errors';
import type { Logger } from '../core-engine/Logger';
import { createConsoleLogger } from '../core-engine/Logger';
import type { SolitaireWorld } from './SolitaireComponents';
import { isDebug } from './PileQueries';

export const engineLogger = createConsoleLogger('Solitaire');

export interface BoundaryOptions {
  /** Where release-mode internal errors are reported. */
  logger?: Logger;
}

export function isInternalError(
  error: unknown,
): error is MissingComponentError | StaleEntityError {
  return (
    MissingComponentError.isMissingComponent(error) ||
    error instanceof StaleEntityError
  );
}

/**
 * Run `fn`; outside debug mode, turn an internal error into `fallback`.
 *
 * @param what  Names the call in the log line, e.g. `Status query`.
 */
export function withFallback<T>(
  world: SolitaireWorld,
  what: string,
  fallback: T,
  fn: () => T,
  logger: Logger = engineLogger,
): T {
  if (isDebug(world)) return fn();
  try {
    return fn();
  } catch (error) {
    if (!isInternalError(error)) throw error;
    logger.error(`${what} aborted: ${error.message}`);
    return fallback;
  }
}

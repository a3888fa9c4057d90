/**
 * Errors raised by the ECS core.
 *
 * Both signal a bug in whatever system drives the world (a live entity
 * missing a component it must carry, or a write through a stale id);
 * neither is reachable from well-formed input.
 */

import type { Entity } from './Entity';
import { entityLabel } from './Entity';

export class MissingComponentError extends Error {
  readonly name = 'MissingComponentError';

  constructor(
    public readonly kind: string,
    public readonly entity?: Entity,
  ) {
    super(
      entity
        ? `Entity ${entityLabel(entity)} has no "${kind}" component`
        : `No entity carries the expected "${kind}" component`,
    );
  }

  static isMissingComponent(error: unknown): error is MissingComponentError {
    return error instanceof MissingComponentError;
  }
}

export class StaleEntityError extends Error {
  readonly name = 'StaleEntityError';

  constructor(public readonly entity: Entity) {
    super(`Entity ${entityLabel(entity)} is not alive`);
  }
}

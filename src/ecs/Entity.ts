/**
 * Entity identifiers for the ECS core.
 *
 * An entity is identity only: a slot index into the registry plus the
 * generation that slot had when the entity was created. A recycled slot
 * bumps its generation, so stale references stop matching.
 */

export interface Entity {
  /** Slot index in the entity registry. */
  readonly index: number;
  /** Generation of the slot at creation time. */
  readonly generation: number;
}

/** Whether two references name the same live-or-dead entity. */
export function sameEntity(a: Entity, b: Entity): boolean {
  return a.index === b.index && a.generation === b.generation;
}

/** Short label for error messages, e.g. `#12v3`. */
export function entityLabel(entity: Entity): string {
  return `#${entity.index}v${entity.generation}`;
}

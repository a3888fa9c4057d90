/**
 * Entity registry -- allocates and recycles generational entity ids.
 *
 * Slots live in flat arrays indexed by entity index. Destroying an
 * entity frees its slot and bumps the slot's generation; the next
 * `create()` reuses the most recently freed slot under the new
 * generation. Growing the slot table is the only allocation.
 */

import type { Entity } from './Entity';

/** Plain copy of the slot table, used by world snapshots. */
export interface RegistrySnapshot {
  readonly generations: readonly number[];
  readonly alive: readonly boolean[];
  readonly free: readonly number[];
}

export class EntityRegistry {
  private generations: number[] = [];
  private alive: boolean[] = [];
  private free: number[] = [];

  /** Allocate a fresh entity id, reusing a freed slot when one exists. */
  create(): Entity {
    const recycled = this.free.pop();
    if (recycled !== undefined) {
      this.alive[recycled] = true;
      return { index: recycled, generation: this.generations[recycled] };
    }

    const index = this.generations.length;
    this.generations.push(0);
    this.alive.push(true);
    return { index, generation: 0 };
  }

  /**
   * Free the entity's slot and invalidate every outstanding reference
   * to it. No-op for ids that are already dead.
   */
  destroy(entity: Entity): void {
    if (!this.isAlive(entity)) return;

    this.alive[entity.index] = false;
    this.generations[entity.index]++;
    this.free.push(entity.index);
  }

  /** Whether the id refers to a live entity (slot in use, generation matches). */
  isAlive(entity: Entity): boolean {
    const { index, generation } = entity;
    if (!Number.isInteger(index) || index < 0 || index >= this.generations.length) {
      return false;
    }
    return this.alive[index] && this.generations[index] === generation;
  }

  /** Number of live entities. */
  get size(): number {
    let count = 0;
    for (const flag of this.alive) {
      if (flag) count++;
    }
    return count;
  }

  /** Number of slots ever allocated (live or free). */
  get capacity(): number {
    return this.generations.length;
  }

  /** Snapshot list of all live entities, in slot order. */
  live(): Entity[] {
    const result: Entity[] = [];
    for (let index = 0; index < this.generations.length; index++) {
      if (this.alive[index]) {
        result.push({ index, generation: this.generations[index] });
      }
    }
    return result;
  }

  snapshot(): RegistrySnapshot {
    return {
      generations: [...this.generations],
      alive: [...this.alive],
      free: [...this.free],
    };
  }

  restore(snapshot: RegistrySnapshot): void {
    this.generations = [...snapshot.generations];
    this.alive = [...snapshot.alive];
    this.free = [...snapshot.free];
  }
}

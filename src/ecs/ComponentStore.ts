/**
 * Component store -- typed storage for one component kind.
 *
 * Values are keyed by entity index and tagged with the generation they
 * were written under, so a read through a stale id misses instead of
 * returning another entity's data. The store is a plain container: it
 * does not know which entities are alive (the World checks that).
 *
 * Iteration order is an implementation detail. Callers that need an
 * order (pile order, for instance) must carry it in component data.
 */

import type { Entity } from './Entity';
import { MissingComponentError } from './errors';

export interface Slot<T> {
  readonly generation: number;
  readonly value: T;
}

/** A captured copy of a store's contents that can be written back. */
export class StoreMemento<T> {
  constructor(
    private readonly store: ComponentStore<T>,
    readonly entries: ReadonlyArray<readonly [number, Slot<T>]>,
  ) {}

  get kind(): string {
    return this.store.kind;
  }

  /** Overwrite the originating store with the captured contents. */
  restore(): void {
    this.store.load(this.entries);
  }
}

export class ComponentStore<T> {
  private readonly slots = new Map<number, Slot<T>>();

  /**
   * @param kind  Component kind name, used in error messages.
   */
  constructor(readonly kind: string) {}

  /** Insert or overwrite the component for an entity. */
  set(entity: Entity, value: T): void {
    this.slots.set(entity.index, { generation: entity.generation, value });
  }

  /**
   * Read the component for an entity.
   *
   * @throws MissingComponentError if the entity has no component of this
   *         kind (or the id is stale).
   */
  get(entity: Entity): T {
    const slot = this.slots.get(entity.index);
    if (!slot || slot.generation !== entity.generation) {
      throw new MissingComponentError(this.kind, entity);
    }
    return slot.value;
  }

  /** Read the component, or `undefined` when absent. */
  tryGet(entity: Entity): T | undefined {
    const slot = this.slots.get(entity.index);
    return slot && slot.generation === entity.generation
      ? slot.value
      : undefined;
  }

  has(entity: Entity): boolean {
    const slot = this.slots.get(entity.index);
    return slot !== undefined && slot.generation === entity.generation;
  }

  /** Delete the component if present. */
  remove(entity: Entity): void {
    if (this.has(entity)) {
      this.slots.delete(entity.index);
    }
  }

  /** Lazily iterate `[entity, value]` pairs. */
  *entries(): Generator<[Entity, T]> {
    for (const [index, slot] of this.slots) {
      yield [{ index, generation: slot.generation }, slot.value];
    }
  }

  get size(): number {
    return this.slots.size;
  }

  clear(): void {
    this.slots.clear();
  }

  /** Capture the current contents for a later `restore()`. */
  capture(): StoreMemento<T> {
    return new StoreMemento(this, [...this.slots.entries()]);
  }

  /** Replace the contents wholesale. Used by {@link StoreMemento.restore}. */
  load(entries: ReadonlyArray<readonly [number, Slot<T>]>): void {
    this.slots.clear();
    for (const [index, slot] of entries) {
      this.slots.set(index, slot);
    }
  }
}

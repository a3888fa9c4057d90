/**
 * World -- the ECS container.
 *
 * Aggregates one {@link EntityRegistry} and one {@link ComponentStore}
 * per component kind. The component map type `C` names every kind and
 * its value type, so `world.get(e, 'faceState')` is fully typed.
 *
 * Query helpers return snapshot arrays, never live iterators, so a
 * system may mutate components while walking a query result. The world
 * itself is not reentrant: one writer at a time.
 */

import type { Entity } from './Entity';
import { EntityRegistry } from './EntityRegistry';
import type { RegistrySnapshot } from './EntityRegistry';
import { ComponentStore } from './ComponentStore';
import { StaleEntityError } from './errors';

/** One store per component kind of the map `C`. */
export type ComponentStores<C> = {
  readonly [K in keyof C]: ComponentStore<C[K]>;
};

/** Kind-agnostic view of a store, used for whole-world operations. */
interface AnyStore {
  readonly kind: string;
  readonly size: number;
  has(entity: Entity): boolean;
  remove(entity: Entity): void;
  capture(): { readonly kind: string; restore(): void };
}

/**
 * Full copy of a world's registry and stores.
 *
 * Snapshots are bound to the world that produced them.
 */
export interface WorldSnapshot {
  readonly owner: object;
  readonly registry: RegistrySnapshot;
  readonly components: ReadonlyArray<{ readonly kind: string; restore(): void }>;
}

export class World<C extends object> {
  readonly entities = new EntityRegistry();
  private readonly storeList: AnyStore[] = [];

  constructor(private readonly stores: ComponentStores<C>) {
    for (const kind in stores) {
      this.storeList.push(stores[kind]);
    }
  }

  // ── Entities ────────────────────────────────────────────────

  spawn(): Entity {
    return this.entities.create();
  }

  /** Remove every component of the entity, then free its id. */
  despawn(entity: Entity): void {
    if (!this.entities.isAlive(entity)) return;
    for (const store of this.storeList) {
      store.remove(entity);
    }
    this.entities.destroy(entity);
  }

  isAlive(entity: Entity): boolean {
    return this.entities.isAlive(entity);
  }

  // ── Components ──────────────────────────────────────────────

  store<K extends keyof C>(kind: K): ComponentStore<C[K]> {
    return this.stores[kind];
  }

  /**
   * Attach or overwrite a component.
   *
   * @throws StaleEntityError if the entity is not alive.
   */
  set<K extends keyof C>(entity: Entity, kind: K, value: C[K]): void {
    if (!this.entities.isAlive(entity)) {
      throw new StaleEntityError(entity);
    }
    this.stores[kind].set(entity, value);
  }

  /** @throws MissingComponentError if the component is absent. */
  get<K extends keyof C>(entity: Entity, kind: K): C[K] {
    return this.stores[kind].get(entity);
  }

  tryGet<K extends keyof C>(entity: Entity, kind: K): C[K] | undefined {
    return this.stores[kind].tryGet(entity);
  }

  has(entity: Entity, kind: keyof C): boolean {
    return this.stores[kind].has(entity);
  }

  remove(entity: Entity, kind: keyof C): void {
    this.stores[kind].remove(entity);
  }

  // ── Queries ─────────────────────────────────────────────────

  /** All `[entity, value]` pairs for one kind. */
  all<K extends keyof C>(kind: K): Array<[Entity, C[K]]> {
    return [...this.stores[kind].entries()];
  }

  /** Entities carrying every one of the given kinds. */
  with(...kinds: Array<keyof C>): Entity[] {
    if (kinds.length === 0) return this.entities.live();

    // Drive the scan from the smallest store.
    const [smallest, ...rest] = [...kinds].sort(
      (a, b) => this.stores[a].size - this.stores[b].size,
    );
    const result: Entity[] = [];
    for (const [entity] of this.stores[smallest].entries()) {
      if (rest.every((kind) => this.stores[kind].has(entity))) {
        result.push(entity);
      }
    }
    return result;
  }

  /** Entities carrying both kinds, with both values. */
  join<A extends keyof C, B extends keyof C>(
    a: A,
    b: B,
  ): Array<[Entity, C[A], C[B]]> {
    const other = this.stores[b];
    const result: Array<[Entity, C[A], C[B]]> = [];
    for (const [entity, value] of this.stores[a].entries()) {
      const second = other.tryGet(entity);
      if (second !== undefined) {
        result.push([entity, value, second]);
      }
    }
    return result;
  }

  // ── Snapshots ───────────────────────────────────────────────

  snapshot(): WorldSnapshot {
    return {
      owner: this,
      registry: this.entities.snapshot(),
      components: this.storeList.map((store) => store.capture()),
    };
  }

  /**
   * Roll the world back to a snapshot it produced.
   *
   * @throws If the snapshot belongs to another world.
   */
  restore(snapshot: WorldSnapshot): void {
    if (snapshot.owner !== this) {
      throw new Error('Cannot restore a snapshot taken from another world');
    }
    this.entities.restore(snapshot.registry);
    for (const memento of snapshot.components) {
      memento.restore();
    }
  }
}

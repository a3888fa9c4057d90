/**
 * ECS Module
 *
 * Minimal entity-component-system core: generational entity ids,
 * typed component stores, and a World that composes them.
 */
export const ECS_VERSION = '0.1.0';

export type { Entity } from './Entity';
export { sameEntity, entityLabel } from './Entity';

export type { RegistrySnapshot } from './EntityRegistry';
export { EntityRegistry } from './EntityRegistry';

export type { Slot } from './ComponentStore';
export { ComponentStore, StoreMemento } from './ComponentStore';

export type { ComponentStores, WorldSnapshot } from './World';
export { World } from './World';

export { MissingComponentError, StaleEntityError } from './errors';

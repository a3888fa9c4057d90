/**
 * Solitaire ECS engine: public surface.
 */
export * from './ecs';
export * from './card-system';
export * from './core-engine';
export * from './rule-engine';
export * from './solitaire';

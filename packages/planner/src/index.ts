/**
 * @matrixplan/planner
 *
 * Expands matrix set definitions into matrix UUIDs and deduplicated build tasks.
 */

export * from './planner.js';
export * from './metadata.js';
export * from './build-task-registry.js';
export * from './observers/logging-observer.js';

/**
 * @matrixplan/core
 *
 * Matrix planning data model, content addressing and ports.
 * Depends on no other @matrixplan package.
 */

export * from './matrix/types.js';
export * from './matrix/feature-dictionary.js';
export * from './matrix/matrix-uuid.js';
export * from './canonical-json.js';
export * from './ports/plan-observer-port.js';

/**
 * @matrixplan/cli
 */

export { registerPlanCommands, renderPlanOutput } from './commands/plan.js';
export * from './handlers/plan/generate-plan.js';
export * from './command-defs/plan.js';
export { formatError, handleError } from './core/error-handler.js';

/**
 * Tabula Engine - Dispatch Module Exports
 */

export { ModuleBus } from './ModuleBus.js';
export type { OperationHandler } from './ModuleBus.js';

/**
 * Tabula Engine - Core Module Exports
 *
 * This is the main entry point for the Tabula formula engine.
 */

// Main Engine
export { SpreadsheetEngine } from './SpreadsheetEngine.js';
export type {
  SpreadsheetEngineConfig,
  SpreadsheetEngineEvents,
  SpreadsheetStats,
} from './SpreadsheetEngine.js';

// Types - export all
export * from './types/index.js';

// Data Stores
export * from './data/index.js';

// Formula
export * from './formula/index.js';

// Cross-module dispatch
export * from './dispatch/index.js';

// History
export * from './history/index.js';

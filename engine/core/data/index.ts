/**
 * Tabula Engine - Data Module Exports
 */

export { CellMetadataStore } from './CellMetadataStore.js';
export { SparseDataStore } from './SparseDataStore.js';
export type { DataStoreStats } from './SparseDataStore.js';

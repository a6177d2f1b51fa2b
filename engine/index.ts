/**
 * Tabula Engine
 *
 * Spreadsheet formula evaluation:
 * - Formula parser and evaluator with cycle, depth and evaluation-count guards
 * - Bounded range expansion
 * - Case-insensitive function registry with metadata
 * - Module bus for functions answered by other subsystems
 * - Reversible row/column inserts and removals that keep every
 *   address-keyed store aligned
 *
 * @example
 * ```typescript
 * import { SpreadsheetEngine } from '@tabula/engine';
 *
 * const sheet = new SpreadsheetEngine();
 *
 * sheet.setCellContent(0, 0, '1');
 * sheet.setCellContent(0, 1, '2');
 * sheet.setCellContent(0, 2, '=SUM(A1:B1)');
 *
 * sheet.getCellValue(0, 2); // 3
 *
 * sheet.insertRows(0, 1);   // everything moves down one row
 * sheet.undo();             // and back
 * ```
 */

export * from './core/index.js';

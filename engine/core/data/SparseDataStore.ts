/**
 * Tabula Engine - Sparse Data Store
 *
 * Cell content storage: formula text or literals, keyed by address.
 * Empty content (null or "") is never stored, so only populated cells
 * take memory and show up in entries().
 */

import { CellContent, CellRange, isFormulaText } from '../types/index.js';
import { CellMetadataStore } from './CellMetadataStore.js';

export interface DataStoreStats {
  cellCount: number;
  formulaCount: number;
  usedRows: number;
  usedCols: number;
}

export class SparseDataStore extends CellMetadataStore<CellContent> {
  constructor() {
    super('content');
  }

  /**
   * Store content. Empty content clears the cell.
   */
  override set(row: number, col: number, content: CellContent): void {
    if (content === null || content === '') {
      this.delete(row, col);
      return;
    }
    super.set(row, col, content);
  }

  /**
   * Content at an address, null when empty.
   */
  getCell(row: number, col: number): CellContent {
    return this.get(row, col) ?? null;
  }

  /** Every populated cell whose content is formula text */
  getFormulaCells(): Array<{ row: number; col: number; formula: string }> {
    const formulas: Array<{ row: number; col: number; formula: string }> = [];
    for (const [{ row, col }, content] of this.entries()) {
      if (isFormulaText(content)) {
        formulas.push({ row, col, formula: content });
      }
    }
    return formulas;
  }

  /**
   * Content of a range as a dense row-major grid.
   */
  getRangeContent(range: CellRange): CellContent[][] {
    const rows: CellContent[][] = [];
    for (let row = range.startRow; row <= range.endRow; row++) {
      const values: CellContent[] = [];
      for (let col = range.startCol; col <= range.endCol; col++) {
        values.push(this.getCell(row, col));
      }
      rows.push(values);
    }
    return rows;
  }

  getStats(): DataStoreStats {
    const used = this.getUsedRange();
    return {
      cellCount: this.size,
      formulaCount: this.getFormulaCells().length,
      usedRows: used ? used.endRow + 1 : 0,
      usedCols: used ? used.endCol + 1 : 0,
    };
  }
}

/**
 * SpreadsheetEngine Tests
 *
 * Tests cover:
 * - Content, values and display values
 * - Styles and registered metadata stores
 * - Structural edits keeping every store aligned
 * - Undo/redo, batches and events
 * - Import/export and stats
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SpreadsheetEngine } from './SpreadsheetEngine.js';
import { CellMetadataStore } from './data/CellMetadataStore.js';
import { ModuleBus } from './dispatch/ModuleBus.js';
import { FormulaErrors } from './types/index.js';

describe('SpreadsheetEngine', () => {
  let sheet: SpreadsheetEngine;

  beforeEach(() => {
    sheet = new SpreadsheetEngine();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ===========================================================================
  // Content
  // ===========================================================================

  describe('content', () => {
    it('should evaluate formulas against stored cells', () => {
      sheet.setCellContent(0, 0, '1');
      sheet.setCellContent(0, 1, '2');
      sheet.setCellContent(0, 2, '=SUM(A1:B1)');

      expect(sheet.getCellValue(0, 2)).toBe(3);
      expect(sheet.getCellDisplayValue(0, 2)).toBe('3');
      expect(sheet.getCellRaw(0, 2)).toBe('=SUM(A1:B1)');
    });

    it('should see later edits on the next read', () => {
      sheet.setCellContent(0, 0, '1');
      sheet.setCellContent(1, 0, '=A1*10');
      expect(sheet.getCellValue(1, 0)).toBe(10);

      sheet.setCellContent(0, 0, '4');
      expect(sheet.getCellValue(1, 0)).toBe(40);
    });

    it('should display empty, boolean and error values as text', () => {
      sheet.setCellContent(0, 0, '=1>0');
      sheet.setCellContent(0, 1, '=1/0');

      expect(sheet.getCellDisplayValue(0, 0)).toBe('TRUE');
      expect(sheet.getCellDisplayValue(0, 1)).toBe('#DIV/0!');
      expect(sheet.getCellDisplayValue(5, 5)).toBe('');
    });

    it('should evaluate a formula without storing it', () => {
      sheet.setCellContent(0, 0, '3');
      expect(sheet.evaluateFormula('=A1*10')).toBe(30);
      expect(sheet.getStats().cellCount).toBe(1);
    });

    it('should reject addresses outside the sheet', () => {
      expect(() => sheet.setCellContent(-1, 0, 'x')).toThrow('Cell address out of bounds: (-1, 0)');
      expect(() => sheet.setCellContent(0, 16_384, 'x')).toThrow(RangeError);
    });

    it('should report cycles per cell', () => {
      sheet.setCellContent(0, 0, '=B1');
      sheet.setCellContent(0, 1, '=A1');
      expect(sheet.getCellValue(0, 0)).toBe(FormulaErrors.CYCLE);
      expect(sheet.getCellValue(0, 1)).toBe(FormulaErrors.CYCLE);
    });

    it('should pass guard configuration to the evaluator', () => {
      const shallow = new SpreadsheetEngine({ maxDepth: 10 });
      shallow.setCellContent(0, 0, '1');
      for (let row = 1; row <= 10; row++) {
        shallow.setCellContent(row, 0, `=A${row}+1`);
      }
      expect(shallow.getCellValue(10, 0)).toBe(11);

      shallow.setCellContent(11, 0, '=A11+1');
      expect(shallow.getCellValue(11, 0)).toBe(FormulaErrors.DEPTH);
    });
  });

  // ===========================================================================
  // Styles & Metadata
  // ===========================================================================

  describe('styles', () => {
    it('should merge style properties', () => {
      sheet.setCellStyle(0, 0, { bold: true });
      sheet.setCellStyle(0, 0, { italic: true });
      expect(sheet.getCellStyle(0, 0)).toEqual({ bold: true, italic: true });

      sheet.undo();
      expect(sheet.getCellStyle(0, 0)).toEqual({ bold: true });
    });

    it('should clear a style as one undo step', () => {
      sheet.setCellStyle(0, 0, { fontColor: '#ff0000' });
      sheet.clearCellStyle(0, 0);
      expect(sheet.getCellStyle(0, 0)).toBeNull();
      expect(sheet.getHistoryState().undoCount).toBe(2);

      sheet.clearCellStyle(0, 0);
      expect(sheet.getHistoryState().undoCount).toBe(2);
    });

    it('should hand out copies', () => {
      sheet.setCellStyle(0, 0, { bold: true });
      const style = sheet.getCellStyle(0, 0);
      if (style) style.bold = false;
      expect(sheet.getCellStyle(0, 0)).toEqual({ bold: true });
    });
  });

  describe('metadata stores', () => {
    it('should move registered stores with structural edits', () => {
      const notes = new CellMetadataStore<string>('notes');
      notes.set(5, 5, 'check this');
      sheet.registerMetadataStore(notes);

      sheet.insertColumns(0, 1);
      expect(notes.get(5, 6)).toBe('check this');
      expect(notes.has(5, 5)).toBe(false);
      expect(sheet.getStats().metadataStoreCount).toBe(1);
    });

    it('should refuse a store twice and unregister once', () => {
      const notes = new CellMetadataStore<string>('notes');
      sheet.registerMetadataStore(notes);

      expect(() => sheet.registerMetadataStore(notes)).toThrow('Metadata store already registered');
      expect(sheet.unregisterMetadataStore(notes)).toBe(true);
      expect(sheet.unregisterMetadataStore(notes)).toBe(false);
    });
  });

  // ===========================================================================
  // Structural edits
  // ===========================================================================

  describe('structural edits', () => {
    beforeEach(() => {
      sheet.setCellContent(1, 0, 'hello');
      sheet.setCellStyle(1, 1, { bold: true });
    });

    it('should shift content and styles together on insert', () => {
      sheet.insertRows(1, 2);

      expect(sheet.getCellRaw(3, 0)).toBe('hello');
      expect(sheet.getCellStyle(3, 1)).toEqual({ bold: true });
      expect(sheet.getCellRaw(1, 0)).toBeNull();
      expect(sheet.getCellStyle(1, 1)).toBeNull();
    });

    it('should restore positions on undo and repeat them on redo', () => {
      sheet.insertRows(1, 2);
      expect(sheet.undo()).toBe(true);

      expect(sheet.getCellRaw(1, 0)).toBe('hello');
      expect(sheet.getCellStyle(1, 1)).toEqual({ bold: true });

      expect(sheet.redo()).toBe(true);
      expect(sheet.getCellRaw(3, 0)).toBe('hello');
    });

    it('should discard removed cells and bring them back on undo', () => {
      sheet.removeRows(1, 1);
      expect(sheet.getStats().cellCount).toBe(0);
      expect(sheet.getStats().styleCount).toBe(0);

      sheet.undo();
      expect(sheet.getCellRaw(1, 0)).toBe('hello');
      expect(sheet.getCellStyle(1, 1)).toEqual({ bold: true });
    });

    it('should shift columns left on remove', () => {
      sheet.removeColumns(0, 1);
      expect(sheet.getCellStyle(1, 0)).toEqual({ bold: true });
      expect(sheet.getStats().cellCount).toBe(0);
    });

    it('should keep formula text as written', () => {
      sheet.setCellContent(0, 0, '5');
      sheet.setCellContent(0, 1, '=A1*2');
      sheet.insertRows(0, 1);

      expect(sheet.getCellRaw(1, 1)).toBe('=A1*2');
      expect(sheet.getCellValue(1, 1)).toBe(0);
    });

    it('should validate before recording anything', () => {
      const before = sheet.getHistoryState().undoCount;
      expect(() => sheet.insertRows(-1, 1)).toThrow('Invalid row position: -1');
      expect(() => sheet.removeColumns(0, 0)).toThrow('Invalid col count: 0');
      expect(sheet.getHistoryState().undoCount).toBe(before);
    });
  });

  describe('sorting', () => {
    beforeEach(() => {
      sheet.setCellContent(0, 0, '=10-1');
      sheet.setCellContent(1, 0, '5');
      sheet.setCellContent(2, 0, '7');
      sheet.setCellStyle(2, 0, { italic: true });
    });

    it('should sort on evaluated values and move styles with their rows', () => {
      sheet.sortRange({ startRow: 0, startCol: 0, endRow: 2, endCol: 0 }, [{ column: 0, order: 'asc' }]);

      expect(sheet.getCellRaw(0, 0)).toBe('5');
      expect(sheet.getCellRaw(1, 0)).toBe('7');
      expect(sheet.getCellRaw(2, 0)).toBe('=10-1');
      expect(sheet.getCellStyle(1, 0)).toEqual({ italic: true });
      expect(sheet.getHistoryState().undoDescription).toBe('Sort A1:A3');
    });

    it('should undo and redo the sort as one step', () => {
      sheet.sortRange({ startRow: 0, startCol: 0, endRow: 2, endCol: 0 }, [{ column: 0, order: 'desc' }]);
      expect(sheet.getCellRaw(0, 0)).toBe('=10-1');
      expect(sheet.getCellRaw(1, 0)).toBe('7');

      expect(sheet.undo()).toBe(true);
      expect(sheet.getCellRaw(0, 0)).toBe('=10-1');
      expect(sheet.getCellRaw(1, 0)).toBe('5');
      expect(sheet.getCellStyle(2, 0)).toEqual({ italic: true });

      expect(sheet.redo()).toBe(true);
      expect(sheet.getCellRaw(1, 0)).toBe('7');
      expect(sheet.getCellStyle(1, 0)).toEqual({ italic: true });
    });
  });

  // ===========================================================================
  // Undo/Redo & Batches
  // ===========================================================================

  describe('undo/redo', () => {
    it('should undo and redo content edits', () => {
      sheet.setCellContent(0, 0, '1');
      sheet.setCellContent(0, 0, '2');

      sheet.undo();
      expect(sheet.getCellValue(0, 0)).toBe(1);
      expect(sheet.canRedo()).toBe(true);

      sheet.redo();
      expect(sheet.getCellValue(0, 0)).toBe(2);
    });

    it('should return false with nothing to undo or redo', () => {
      expect(sheet.canUndo()).toBe(false);
      expect(sheet.undo()).toBe(false);
      expect(sheet.redo()).toBe(false);
    });

    it('should group a batch into one step', () => {
      sheet.batch('Fill', () => {
        sheet.setCellContent(0, 0, 'a');
        sheet.setCellContent(1, 0, 'b');
        sheet.insertColumns(0, 1);
      });

      expect(sheet.getHistoryState().undoCount).toBe(1);
      expect(sheet.getCellRaw(1, 1)).toBe('b');

      sheet.undo();
      expect(sheet.getStats().cellCount).toBe(0);
    });

    it('should roll back a batch that throws', () => {
      sheet.setCellContent(5, 5, 'kept');

      expect(() =>
        sheet.batch('Broken', () => {
          sheet.setCellContent(0, 0, 'x');
          throw new Error('stop');
        })
      ).toThrow('stop');

      expect(sheet.getCellRaw(0, 0)).toBeNull();
      expect(sheet.getCellRaw(5, 5)).toBe('kept');
      expect(sheet.getHistoryState().undoCount).toBe(1);
    });
  });

  // ===========================================================================
  // Events
  // ===========================================================================

  describe('events', () => {
    it('should report cell changes with the stored content', () => {
      const onCellChange = vi.fn();
      sheet.setEventHandlers({ onCellChange });

      sheet.setCellContent(2, 3, '=1+1');
      sheet.setCellContent(2, 3, '');

      expect(onCellChange).toHaveBeenNthCalledWith(1, 2, 3, '=1+1');
      expect(onCellChange).toHaveBeenNthCalledWith(2, 2, 3, null);
    });

    it('should report structural changes in every direction', () => {
      const onStructureChange = vi.fn();
      const onUndo = vi.fn();
      sheet.setEventHandlers({ onStructureChange, onUndo });

      sheet.insertRows(0, 1);
      sheet.undo();
      sheet.redo();

      expect(onStructureChange.mock.calls.map(([command, direction]) => [command.type, direction])).toEqual([
        ['insertRows', 'apply'],
        ['insertRows', 'undo'],
        ['insertRows', 'redo'],
      ]);
      expect(onUndo).toHaveBeenCalledTimes(1);
    });

    it('should not report structure changes for content undo', () => {
      const onStructureChange = vi.fn();
      sheet.setEventHandlers({ onStructureChange });

      sheet.setCellContent(0, 0, 'x');
      sheet.undo();
      expect(onStructureChange).not.toHaveBeenCalled();
    });

    it('should log listener errors and keep the edit', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const failure = new Error('listener failed');
      sheet.setEventHandlers({
        onCellChange: () => {
          throw failure;
        },
      });

      sheet.setCellContent(0, 0, 'x');

      expect(sheet.getCellRaw(0, 0)).toBe('x');
      expect(errorSpy).toHaveBeenCalledWith('Spreadsheet onCellChange listener error:', failure);
    });
  });

  // ===========================================================================
  // Import/Export & Stats
  // ===========================================================================

  describe('import/export', () => {
    it('should load an array without history', () => {
      sheet.setCellContent(9, 9, 'old');
      sheet.loadFromArray([
        [1, '=A1+1'],
        [null, 'x'],
      ]);

      expect(sheet.getCellValue(0, 1)).toBe(2);
      expect(sheet.getCellRaw(9, 9)).toBeNull();
      expect(sheet.canUndo()).toBe(false);
    });

    it('should export values or formula text', () => {
      sheet.loadFromArray([
        [1, '=A1+1'],
        [null, 'x'],
      ]);

      expect(sheet.toArray()).toEqual([
        [1, 2],
        [null, 'x'],
      ]);
      expect(sheet.toArray({ includeFormulas: true })).toEqual([
        [1, '=A1+1'],
        [null, 'x'],
      ]);
    });

    it('should export nothing from an empty sheet', () => {
      expect(sheet.toArray()).toEqual([]);
    });
  });

  describe('stats', () => {
    it('should summarize every component', () => {
      const bus = new ModuleBus();
      bus.register('ENGLISH (TQ)', (input) => input.length);
      const withBus = new SpreadsheetEngine({ bus });

      withBus.loadFromArray([
        [1, '=A1+1'],
        [null, 'x'],
      ]);
      withBus.setCellStyle(0, 0, { bold: true });

      expect(withBus.getStats()).toEqual({
        cellCount: 3,
        formulaCount: 1,
        usedRows: 2,
        usedCols: 2,
        styleCount: 1,
        metadataStoreCount: 0,
        undoCount: 1,
        redoCount: 0,
        functionCount: 38,
        operationCount: 1,
      });
      expect(withBus.getBus()).toBe(bus);
    });

    it('should empty everything on clear', () => {
      sheet.setCellContent(0, 0, 'x');
      sheet.setCellStyle(0, 0, { bold: true });
      sheet.clear();

      const stats = sheet.getStats();
      expect(stats.cellCount).toBe(0);
      expect(stats.styleCount).toBe(0);
      expect(stats.undoCount).toBe(0);
    });
  });
});

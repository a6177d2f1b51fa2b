/**
 * CellMetadataStore Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CellMetadataStore } from './CellMetadataStore.js';

describe('CellMetadataStore', () => {
  let store: CellMetadataStore<string>;

  beforeEach(() => {
    store = new CellMetadataStore<string>('notes');
  });

  describe('entry operations', () => {
    it('should set, get and delete entries', () => {
      store.set(2, 3, 'note');
      expect(store.get(2, 3)).toBe('note');
      expect(store.has(2, 3)).toBe(true);
      expect(store.size).toBe(1);

      expect(store.delete(2, 3)).toBe(true);
      expect(store.delete(2, 3)).toBe(false);
      expect(store.get(2, 3)).toBeUndefined();
      expect(store.size).toBe(0);
    });

    it('should reject negative or fractional addresses', () => {
      expect(() => store.set(-1, 0, 'x')).toThrow(RangeError);
      expect(() => store.set(0, 0.5, 'x')).toThrow('Invalid cell address: (0, 0.5)');
    });

    it('should list entries row-major', () => {
      store.set(5, 0, 'c');
      store.set(0, 7, 'b');
      store.set(0, 2, 'a');

      expect(store.entries()).toEqual([
        [{ row: 0, col: 2 }, 'a'],
        [{ row: 0, col: 7 }, 'b'],
        [{ row: 5, col: 0 }, 'c'],
      ]);
    });

    it('should return entries as a snapshot', () => {
      store.set(0, 0, 'a');
      const entries = store.entries();
      store.delete(0, 0);
      expect(entries).toHaveLength(1);
    });
  });

  describe('row and column queries', () => {
    it('should return entries of one row or column', () => {
      store.set(1, 0, 'a');
      store.set(1, 4, 'b');
      store.set(3, 4, 'c');

      expect(store.getRow(1)).toEqual(new Map([[0, 'a'], [4, 'b']]));
      expect(store.getColumn(4)).toEqual(new Map([[1, 'b'], [3, 'c']]));
      expect(store.getRow(2).size).toBe(0);
    });

    it('should keep the indexes in step with deletes', () => {
      store.set(1, 0, 'a');
      store.delete(1, 0);
      expect(store.getRow(1).size).toBe(0);
      expect(store.getColumn(0).size).toBe(0);
    });
  });

  describe('getUsedRange', () => {
    it('should be null when empty', () => {
      expect(store.getUsedRange()).toBeNull();
    });

    it('should cover every entry', () => {
      store.set(4, 1, 'a');
      store.set(2, 6, 'b');
      expect(store.getUsedRange()).toEqual({ startRow: 2, startCol: 1, endRow: 4, endCol: 6 });

      store.set(9, 0, 'c');
      expect(store.getUsedRange()).toEqual({ startRow: 2, startCol: 0, endRow: 9, endCol: 6 });
    });

    it('should shrink after deletes', () => {
      store.set(0, 0, 'a');
      store.set(8, 8, 'b');
      store.delete(8, 8);
      expect(store.getUsedRange()).toEqual({ startRow: 0, startCol: 0, endRow: 0, endCol: 0 });
    });

    it('should reset on clear', () => {
      store.set(3, 3, 'a');
      store.clear();
      expect(store.getUsedRange()).toBeNull();
      expect(store.size).toBe(0);
    });
  });
});

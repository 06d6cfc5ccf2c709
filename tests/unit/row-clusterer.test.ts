import { describe, it, expect } from 'vitest';
import { clusterRows, computeRowTolerance } from '../../src/core/layout/row-clusterer.js';
import type { CodeSymbol } from '../../src/types/symbol.js';
import { symbolAt, scramble } from '../helpers/synthetic.js';

const chars = (symbols: readonly CodeSymbol[]): string[] => symbols.map((s) => s.character);

describe('computeRowTolerance', () => {
  it('should take half the median symbol height by default', () => {
    const symbols = [symbolAt('a', 0, 0, 10), symbolAt('b', 0, 0, 20), symbolAt('c', 0, 0, 30)];
    expect(computeRowTolerance(symbols)).toBe(10);
  });

  it('should honour a custom factor and floor', () => {
    const symbols = [symbolAt('a', 0, 0, 10), symbolAt('b', 0, 0, 20), symbolAt('c', 0, 0, 30)];
    expect(computeRowTolerance(symbols, { rowToleranceFactor: 0.6 })).toBeCloseTo(12);
    expect(computeRowTolerance(symbols, { minRowTolerance: 15 })).toBe(15);
  });

  it('should let an explicit tolerance win', () => {
    expect(computeRowTolerance([symbolAt('a', 0, 0, 40)], { rowTolerance: 5 })).toBe(5);
  });

  it('should scale with symbol size', () => {
    const small = [symbolAt('a', 0, 0, 8), symbolAt('b', 0, 0, 8)];
    const large = [symbolAt('a', 0, 0, 32), symbolAt('b', 0, 0, 32)];
    expect(computeRowTolerance(large)).toBe(computeRowTolerance(small) * 4);
  });

  it('should return 0 for an empty page', () => {
    expect(computeRowTolerance([])).toBe(0);
  });
});

describe('clusterRows', () => {
  it('should split the two-line greeting into two rows', () => {
    const symbols = [
      symbolAt('H', 0, 0),
      symbolAt('i', 10, 0),
      symbolAt('+', 20, 0),
      symbolAt('B', 0, 20),
      symbolAt('y', 10, 20)
    ];

    const rows = clusterRows(symbols, { rowTolerance: 5 });

    expect(rows).toHaveLength(2);
    expect(chars(rows[0].symbols)).toEqual(['H', 'i', '+']);
    expect(rows[0].yCenter).toBe(0);
    expect(chars(rows[1].symbols)).toEqual(['B', 'y']);
    expect(rows[1].yCenter).toBe(20);
  });

  it('should keep jittered symbols of one line together', () => {
    const symbols = [symbolAt('a', 0, 100), symbolAt('b', 10, 103), symbolAt('c', 20, 98), symbolAt('d', 30, 101)];

    const rows = clusterRows(symbols);

    expect(rows).toHaveLength(1);
    expect(rows[0].symbols).toHaveLength(4);
    expect(rows[0].yCenter).toBeCloseTo(100.5);
  });

  it('should give a stray symbol its own row', () => {
    const symbols = [symbolAt('a', 0, 0), symbolAt('b', 10, 0), symbolAt('c', 20, 0), symbolAt('!', 200, 500)];

    const rows = clusterRows(symbols);

    expect(rows).toHaveLength(2);
    expect(chars(rows[1].symbols)).toEqual(['!']);
  });

  it('should return no rows for no symbols', () => {
    expect(clusterRows([])).toEqual([]);
  });

  it('should not depend on input order', () => {
    const symbols = [
      symbolAt('x', 30, 1),
      symbolAt('y', 0, 0),
      symbolAt('z', 10, 40),
      symbolAt('w', 0, 41),
      symbolAt('v', 20, 0)
    ];

    const a = clusterRows(symbols).map((r) => chars(r.symbols));
    const b = clusterRows([...symbols].reverse()).map((r) => chars(r.symbols));
    const c = clusterRows(scramble(symbols)).map((r) => chars(r.symbols));

    expect(b).toEqual(a);
    expect(c).toEqual(a);
  });

  it('should freeze the rows it returns', () => {
    const rows = clusterRows([symbolAt('a', 0, 0)]);
    expect(Object.isFrozen(rows[0])).toBe(true);
    expect(Object.isFrozen(rows[0].symbols)).toBe(true);
  });

  it('should put symbols closer than the tolerance into the same row', () => {
    const symbols: CodeSymbol[] = [];
    for (let r = 0; r < 5; r++) {
      for (let c = 0; c < 10; c++) {
        const jitter = (((r + c) % 3) - 1) * 2;
        symbols.push(symbolAt(`${r}`, c * 12, r * 30 + jitter));
      }
    }

    const rows = clusterRows(scramble(symbols));
    const tolerance = computeRowTolerance(symbols);
    const rowOf = new Map<CodeSymbol, number>();
    rows.forEach((row, index) => row.symbols.forEach((s) => rowOf.set(s, index)));

    expect(rows).toHaveLength(5);
    for (const row of rows) {
      expect(row.symbols).toHaveLength(10);
      expect(new Set(chars(row.symbols)).size).toBe(1);
    }
    for (const a of symbols) {
      for (const b of symbols) {
        if (Math.abs(a.position.y - b.position.y) < tolerance) {
          expect(rowOf.get(a)).toBe(rowOf.get(b));
        }
      }
    }
  });
});

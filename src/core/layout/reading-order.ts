import type { CodeSymbol, SymbolRow } from '../../types/symbol.js';

/**
 * Rows top to bottom, symbols left to right. Array.prototype.sort is stable,
 * so rows with equal yCenter and symbols with equal x keep the order the
 * clusterer produced them in.
 */
export function orderRows(rows: readonly SymbolRow[]): SymbolRow[] {
  return [...rows]
    .sort((a, b) => a.yCenter - b.yCenter)
    .map((row) =>
      Object.freeze({
        symbols: Object.freeze([...row.symbols].sort((a, b) => a.position.x - b.position.x)),
        yCenter: row.yCenter
      })
    );
}

export function readingOrder(rows: readonly SymbolRow[]): CodeSymbol[] {
  return rows.flatMap((row) => row.symbols);
}

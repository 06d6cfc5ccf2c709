import type { CodeSymbol, SymbolRow } from '../../types/symbol.js';
import type { LayoutOptions } from '../../types/config.js';
import { clusterRows, computeRowTolerance } from './row-clusterer.js';
import { orderRows } from './reading-order.js';
import { assembleText } from './paragraph-assembler.js';

export interface ReconstructedLayout {
  text: string;
  rows: SymbolRow[];
  tolerance: number;
}

export function reconstructText(symbols: readonly CodeSymbol[], options: LayoutOptions = {}): ReconstructedLayout {
  const tolerance = computeRowTolerance(symbols, options);
  const rows = orderRows(clusterRows(symbols, { ...options, rowTolerance: tolerance }));
  return {
    text: assembleText(rows, options),
    rows,
    tolerance
  };
}

export * from './stats.js';
export * from './row-clusterer.js';
export * from './reading-order.js';
export * from './paragraph-assembler.js';

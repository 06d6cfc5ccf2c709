import type { CodeSymbol, SymbolRow } from '../../types/symbol.js';
import type { LayoutOptions } from '../../types/config.js';
import { median } from './stats.js';

export const DEFAULT_ROW_TOLERANCE_FACTOR = 0.5;

type ToleranceOptions = Pick<LayoutOptions, 'rowToleranceFactor' | 'minRowTolerance' | 'rowTolerance'>;

/**
 * Vertical distance under which a symbol still joins the running row.
 *
 * Derived from the median symbol height so it follows the render zoom: a page
 * rendered twice as large yields symbols twice as tall and a tolerance twice
 * as wide. An explicit `rowTolerance` bypasses the estimate.
 */
export function computeRowTolerance(symbols: readonly CodeSymbol[], options: ToleranceOptions = {}): number {
  if (typeof options.rowTolerance === 'number' && Number.isFinite(options.rowTolerance)) {
    return Math.max(0, options.rowTolerance);
  }
  if (symbols.length === 0) return 0;

  const factor = options.rowToleranceFactor ?? DEFAULT_ROW_TOLERANCE_FACTOR;
  const floor = options.minRowTolerance ?? 0;
  const medianHeight = median(symbols.map((s) => s.extent.height));
  return Math.max(floor, factor * medianHeight);
}

/**
 * Total order used before the sweep. Detectors hand back codes in no
 * guaranteed order, so ties on y fall back to x, then to the character.
 */
export function compareForSweep(a: CodeSymbol, b: CodeSymbol): number {
  if (a.position.y !== b.position.y) return a.position.y - b.position.y;
  if (a.position.x !== b.position.x) return a.position.x - b.position.x;
  if (a.character === b.character) return 0;
  return a.character < b.character ? -1 : 1;
}

export function clusterRows(symbols: readonly CodeSymbol[], options: ToleranceOptions = {}): SymbolRow[] {
  if (symbols.length === 0) return [];

  const tolerance = computeRowTolerance(symbols, options);
  const sorted = [...symbols].sort(compareForSweep);

  const rows: SymbolRow[] = [];
  let current: CodeSymbol[] = [];
  let sumY = 0;

  const flush = (): void => {
    if (current.length === 0) return;
    rows.push(
      Object.freeze({
        symbols: Object.freeze([...current]),
        yCenter: sumY / current.length
      })
    );
    current = [];
    sumY = 0;
  };

  for (const symbol of sorted) {
    const y = symbol.position.y;
    if (current.length > 0 && Math.abs(y - sumY / current.length) > tolerance) {
      flush();
    }
    current.push(symbol);
    sumY += y;
  }
  flush();

  return rows;
}

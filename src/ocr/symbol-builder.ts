import type { CodeSymbol, DetectedCode, Polygon } from '../types/symbol.js';
import { mean } from '../core/layout/stats.js';

const MIN_POLYGON_AREA = 1e-6;

export interface BuiltSymbols {
  symbols: CodeSymbol[];
  dropped: number;
}

export function polygonArea(polygon: Polygon): number {
  let twice = 0;
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    twice += a.x * b.y - b.x * a.y;
  }
  return Math.abs(twice) / 2;
}

export function isMalformedPolygon(polygon: Polygon): boolean {
  if (polygon.length < 3) return true;
  if (polygon.some((p) => !Number.isFinite(p.x) || !Number.isFinite(p.y))) return true;

  const xs = polygon.map((p) => p.x);
  const ys = polygon.map((p) => p.y);
  if (Math.max(...xs) - Math.min(...xs) <= 0 || Math.max(...ys) - Math.min(...ys) <= 0) return true;

  return polygonArea(polygon) < MIN_POLYGON_AREA;
}

/**
 * Maps a detection from raster pixels to page units. Returns null for codes
 * that cannot take part in clustering (empty payload, degenerate polygon).
 */
export function toCodeSymbol(code: DetectedCode, pageIndex: number, zoom: number): CodeSymbol | null {
  if (!code.payload) return null;
  if (isMalformedPolygon(code.polygon)) return null;

  const scale = zoom > 0 ? 1 / zoom : 1;
  const xs = code.polygon.map((p) => p.x);
  const ys = code.polygon.map((p) => p.y);

  return {
    character: code.payload,
    position: { x: mean(xs) * scale, y: mean(ys) * scale },
    extent: {
      width: (Math.max(...xs) - Math.min(...xs)) * scale,
      height: (Math.max(...ys) - Math.min(...ys)) * scale
    },
    pageIndex
  };
}

export function buildSymbols(codes: readonly DetectedCode[], pageIndex: number, zoom: number): BuiltSymbols {
  const symbols: CodeSymbol[] = [];
  let dropped = 0;
  for (const code of codes) {
    const symbol = toCodeSymbol(code, pageIndex, zoom);
    if (symbol) {
      symbols.push(symbol);
    } else {
      dropped++;
    }
  }
  return { symbols, dropped };
}

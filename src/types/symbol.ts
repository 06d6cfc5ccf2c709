export interface Point {
  x: number;
  y: number;
}

export interface Extent {
  width: number;
  height: number;
}

export type Polygon = Point[];

/**
 * Raw detector output. Coordinates are raster pixels of the rendered page.
 */
export interface DetectedCode {
  payload: string;
  polygon: Polygon;
}

/**
 * One decoded QR code standing for one character of the document.
 * `position` is the polygon centroid and `extent` its bounding size, both in
 * page units (raster pixels divided by the render zoom).
 */
export interface CodeSymbol {
  character: string;
  position: Point;
  extent: Extent;
  pageIndex: number;
}

/**
 * Symbols judged to sit on one visual line, left to right.
 */
export interface SymbolRow {
  readonly symbols: readonly CodeSymbol[];
  readonly yCenter: number;
}

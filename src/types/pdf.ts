import type { DetectedCode } from './symbol.js';

/**
 * RGBA pixels, row-major, 4 bytes per pixel.
 */
export interface RasterImage {
  data: Uint8ClampedArray;
  width: number;
  height: number;
}

export interface EmbeddedTextSource {
  /** Returns the page's native text layer, or '' when it has none. */
  extractEmbeddedText(pageIndex: number): Promise<string>;
}

export interface PageRasterizer {
  rasterize(pageIndex: number, zoom: number): Promise<RasterImage>;
}

export interface SymbolDetector {
  /** Resolves to [] when the image holds no decodable code. */
  detect(image: RasterImage): Promise<DetectedCode[]>;
}

export interface PageCollaborators {
  text: EmbeddedTextSource;
  rasterizer: PageRasterizer;
  detector: SymbolDetector;
}

export interface PDFMetadata {
  title?: string;
  author?: string;
  creator?: string;
  producer?: string;
}

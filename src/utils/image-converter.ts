import { PNG } from 'pngjs';
import type { RasterImage } from '../types/pdf.js';

export class ImageConverter {
  static pngToRaster(png: ArrayBuffer | Uint8Array): RasterImage {
    const bytes = png instanceof Uint8Array ? Buffer.from(png.buffer, png.byteOffset, png.byteLength) : Buffer.from(png);
    const decoded = PNG.sync.read(bytes);
    return {
      data: new Uint8ClampedArray(decoded.data.buffer, decoded.data.byteOffset, decoded.data.byteLength),
      width: decoded.width,
      height: decoded.height
    };
  }
}

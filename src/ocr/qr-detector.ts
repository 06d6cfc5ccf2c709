import type { RasterImage, SymbolDetector } from '../types/pdf.js';
import type { DetectedCode, Polygon } from '../types/symbol.js';
import type cv from '@techstark/opencv-js';
import { getOpenCv, type OpenCv } from '../utils/opencv-wrapper.js';

export interface QRDetectorOptions {
  /** Extra border around each located code before decoding, as a fraction of its size. */
  cropMargin?: number;
}

interface CvMatLike {
  delete(): void;
}

interface QRCodeDetectorLike {
  detectMulti(img: CvMatLike, points: CvMatLike): boolean;
  detectAndDecode(img: CvMatLike): string;
  delete(): void;
}

type QRCodeDetectorCtor = new () => QRCodeDetectorLike;

function isDetectorCtor(value: unknown): value is QRCodeDetectorCtor {
  return typeof value === 'function';
}

/**
 * detectMulti writes four (x, y) corners per code, flattened.
 */
export function quadsFromPoints(points: ArrayLike<number>): Polygon[] {
  const quads: Polygon[] = [];
  for (let offset = 0; offset + 8 <= points.length; offset += 8) {
    const quad: Polygon = [];
    for (let corner = 0; corner < 4; corner++) {
      quad.push({ x: points[offset + corner * 2], y: points[offset + corner * 2 + 1] });
    }
    quads.push(quad);
  }
  return quads;
}

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Bounding box of the quad grown by `margin` on every side and clipped to
 * the image. Null when nothing of it is left inside the image.
 */
export function cropRectFor(quad: Polygon, imageWidth: number, imageHeight: number, margin: number): CropRect | null {
  const xs = quad.map((p) => p.x);
  const ys = quad.map((p) => p.y);
  const minX = Math.min(...xs);
  const minY = Math.min(...ys);
  const maxX = Math.max(...xs);
  const maxY = Math.max(...ys);
  const padX = (maxX - minX) * margin;
  const padY = (maxY - minY) * margin;

  const x = Math.max(0, Math.floor(minX - padX));
  const y = Math.max(0, Math.floor(minY - padY));
  const right = Math.min(imageWidth, Math.ceil(maxX + padX));
  const bottom = Math.min(imageHeight, Math.ceil(maxY + padY));

  if (right - x <= 0 || bottom - y <= 0) return null;
  return { x, y, width: right - x, height: bottom - y };
}

/**
 * Locates every QR code on a page with OpenCV.js and decodes them one crop
 * at a time: the JS build exposes multi-detection but not multi-decoding.
 */
export class OpenCvQRDetector implements SymbolDetector {
  private options: Required<QRDetectorOptions>;

  constructor(options: QRDetectorOptions = {}) {
    this.options = {
      cropMargin: options.cropMargin ?? 0.25
    };
  }

  async detect(image: RasterImage): Promise<DetectedCode[]> {
    const opencv = await getOpenCv();
    const Detector: unknown = Reflect.get(opencv, 'QRCodeDetector');
    if (!isDetectorCtor(Detector)) {
      throw new Error('This OpenCV.js build does not include QRCodeDetector');
    }

    const rgba = new opencv.Mat(image.height, image.width, opencv.CV_8UC4);
    const gray = new opencv.Mat();
    const points = new opencv.Mat();
    const detector = new Detector();

    try {
      rgba.data.set(image.data);
      opencv.cvtColor(rgba, gray, opencv.COLOR_RGBA2GRAY);

      if (!detector.detectMulti(gray, points)) {
        return [];
      }

      const codes: DetectedCode[] = [];
      for (const quad of quadsFromPoints(points.data32F)) {
        const payload = this.decodeQuad(opencv, detector, gray, quad, image);
        if (payload) {
          codes.push({ payload, polygon: quad });
        }
      }
      return codes;
    } finally {
      detector.delete();
      points.delete();
      gray.delete();
      rgba.delete();
    }
  }

  private decodeQuad(
    opencv: OpenCv,
    detector: QRCodeDetectorLike,
    gray: cv.Mat,
    quad: Polygon,
    image: RasterImage
  ): string {
    const rect = cropRectFor(quad, image.width, image.height, this.options.cropMargin);
    if (!rect) return '';

    const roi = gray.roi(new opencv.Rect(rect.x, rect.y, rect.width, rect.height));
    try {
      return detector.detectAndDecode(roi);
    } catch (error) {
      console.debug('QR decode failed for one located code:', error);
      return '';
    } finally {
      roi.delete();
    }
  }
}

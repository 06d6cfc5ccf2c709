export { OpenCvQRDetector, quadsFromPoints, cropRectFor, type QRDetectorOptions, type CropRect } from './qr-detector.js';
export * from './symbol-builder.js';

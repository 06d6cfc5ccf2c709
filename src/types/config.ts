import type { PageCollaborators } from './pdf.js';

export interface LayoutOptions {
  // Row clustering
  rowToleranceFactor?: number;
  minRowTolerance?: number;
  rowTolerance?: number;

  // Paragraph assembly
  marker?: string;
  lineBreak?: string;
  collapseEmptyParagraphs?: boolean;
}

export interface QRTextConfig {
  // Rendering
  zoom: number;

  // Layout reconstruction
  layout?: LayoutOptions;

  // Embedded text handling
  normalizeEmbeddedText?: boolean;

  // Document assembly
  pageSeparator?: string;

  // Performance
  maxConcurrentPages?: number;
  pageTimeoutMs?: number;

  // Injected backends; unpdf and OpenCV fill in whatever is omitted
  collaborators?: Partial<PageCollaborators>;
}

export interface ConversionProgress {
  stage: 'loading' | 'pages' | 'assembling' | 'complete';
  progress: number;
  currentPage?: number;
  totalPages?: number;
  message?: string;
}

export type ProgressCallback = (progress: ConversionProgress) => void;

import type { PDFMetadata } from './pdf.js';

export type PageTextSource = 'embedded' | 'symbols' | 'empty' | 'failed';

export type PageState =
  | 'start'
  | 'try-embedded-text'
  | 'embedded-text-found'
  | 'render-and-detect'
  | 'cluster'
  | 'order'
  | 'assemble'
  | 'done';

export interface PageTextResult {
  pageIndex: number;
  text: string;
  source: PageTextSource;
  symbolCount: number;
  rowCount: number;
  droppedSymbols: number;
  warnings: string[];
  trace: PageState[];
  processingTime: number;
}

export interface TextOutput {
  text: string;
  pages: PageTextResult[];
  warnings: string[];
  metadata: OutputMetadata;
}

export interface OutputMetadata {
  pageCount: number;
  processingTime: number;
  embeddedPages: number;
  symbolPages: number;
  emptyPages: number;
  failedPages: number;
  originalMetadata?: PDFMetadata;
}

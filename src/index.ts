import type {
  QRTextConfig,
  LayoutOptions,
  ConversionProgress,
  ProgressCallback
} from './types/config.js';
import type { PageCollaborators, PDFMetadata } from './types/pdf.js';
import type { PageTextResult, TextOutput } from './types/output.js';
import { PagePipeline } from './core/page-pipeline.js';
import { DocumentProcessor } from './core/document-processor.js';
import { UnPDFWrapper } from './core/unpdf-wrapper.js';
import { OpenCvQRDetector } from './ocr/qr-detector.js';
import { DEFAULT_PAGE_SEPARATOR, DEFAULT_ZOOM } from './core/defaults.js';

// Convenience configuration presets
export const ConfigPresets = {
  /**
   * Symbols printed at ordinary body-text size
   */
  standard: {
    zoom: DEFAULT_ZOOM
  },

  /**
   * Dense pages with tiny symbols; slower, but detection needs the pixels
   */
  smallSymbols: {
    zoom: 6,
    pageTimeoutMs: 120000
  },

  /**
   * Large symbols, many pages
   */
  fast: {
    zoom: 3,
    maxConcurrentPages: 4
  }
} satisfies Record<string, Partial<QRTextConfig>>;

export class QRTextExtractor {
  private config: QRTextConfig;

  constructor(config: Partial<QRTextConfig> = {}) {
    this.config = {
      zoom: DEFAULT_ZOOM,
      maxConcurrentPages: 1,
      pageSeparator: DEFAULT_PAGE_SEPARATOR,
      pageTimeoutMs: 0,
      normalizeEmbeddedText: false,
      ...config,
      layout: { ...config.layout }
    };
  }

  getConfig(): Readonly<QRTextConfig> {
    return this.config;
  }

  // Chainable configuration methods
  setZoom(zoom: number): this {
    this.config.zoom = zoom;
    return this;
  }

  setMarker(marker: string): this {
    this.config.layout = { ...this.config.layout, marker };
    return this;
  }

  setLayoutOptions(layout: LayoutOptions): this {
    this.config.layout = { ...this.config.layout, ...layout };
    return this;
  }

  setPageSeparator(separator: string): this {
    this.config.pageSeparator = separator;
    return this;
  }

  setMaxConcurrentPages(max: number): this {
    this.config.maxConcurrentPages = max;
    return this;
  }

  setPageTimeout(timeoutMs: number): this {
    this.config.pageTimeoutMs = timeoutMs;
    return this;
  }

  // Apply a preset configuration
  applyPreset(preset: keyof typeof ConfigPresets): this {
    const presetConfig: Partial<QRTextConfig> | undefined = ConfigPresets[preset];
    if (!presetConfig) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`);
    }
    Object.assign(this.config, presetConfig);
    return this;
  }

  /**
   * Reads every page of a PDF. Only a PDF that cannot be opened at all
   * rejects; page-level problems show up as warnings on the result.
   */
  async extract(pdfData: ArrayBuffer | Uint8Array, progressCallback?: ProgressCallback): Promise<TextOutput> {
    const startTime = Date.now();

    this.reportProgress(progressCallback, {
      stage: 'loading',
      progress: 0,
      message: 'Loading PDF document...'
    });

    const pdf = new UnPDFWrapper();
    await pdf.loadDocument(pdfData);

    try {
      const pageCount = await pdf.getPageCount();
      const metadata = await pdf.getMetadata();
      const injected = this.config.collaborators ?? {};
      const collaborators: PageCollaborators = {
        text: injected.text ?? pdf,
        rasterizer: injected.rasterizer ?? pdf,
        detector: injected.detector ?? new OpenCvQRDetector()
      };

      return await this.run(pageCount, collaborators, startTime, progressCallback, metadata);
    } finally {
      await pdf.dispose();
    }
  }

  /**
   * Runs the page pipeline against caller-supplied backends, without
   * opening a PDF.
   */
  async extractPages(
    pageCount: number,
    collaborators: PageCollaborators,
    progressCallback?: ProgressCallback
  ): Promise<TextOutput> {
    return await this.run(pageCount, collaborators, Date.now(), progressCallback);
  }

  private async run(
    pageCount: number,
    collaborators: PageCollaborators,
    startTime: number,
    progressCallback?: ProgressCallback,
    originalMetadata?: PDFMetadata
  ): Promise<TextOutput> {
    const pipeline = new PagePipeline(collaborators, {
      zoom: this.config.zoom,
      layout: this.config.layout,
      normalizeEmbeddedText: this.config.normalizeEmbeddedText,
      pageTimeoutMs: this.config.pageTimeoutMs
    });
    const processor = new DocumentProcessor(pipeline, {
      maxConcurrentPages: this.config.maxConcurrentPages,
      pageSeparator: this.config.pageSeparator
    });

    this.reportProgress(progressCallback, {
      stage: 'pages',
      progress: 10,
      totalPages: pageCount,
      message: `Reading ${pageCount} page(s)...`
    });

    const pages = await processor.processPages(pageCount, (result, completed) => {
      this.reportProgress(progressCallback, {
        stage: 'pages',
        progress: 10 + Math.round((completed / pageCount) * 80),
        currentPage: result.pageIndex + 1,
        totalPages: pageCount,
        message: `Page ${result.pageIndex + 1}: ${result.source}`
      });
    });

    this.reportProgress(progressCallback, {
      stage: 'assembling',
      progress: 95,
      message: 'Joining page text...'
    });

    const output: TextOutput = {
      text: processor.combine(pages),
      pages,
      warnings: pages.flatMap((p) => p.warnings),
      metadata: {
        pageCount,
        processingTime: Date.now() - startTime,
        embeddedPages: countSource(pages, 'embedded'),
        symbolPages: countSource(pages, 'symbols'),
        emptyPages: countSource(pages, 'empty'),
        failedPages: countSource(pages, 'failed'),
        originalMetadata
      }
    };

    this.reportProgress(progressCallback, {
      stage: 'complete',
      progress: 100,
      message: 'Extraction completed'
    });

    return output;
  }

  private reportProgress(callback: ProgressCallback | undefined, progress: ConversionProgress): void {
    if (callback) {
      callback(progress);
    }
  }

  // Static convenience method for one-liner extraction
  static async extractText(pdfData: ArrayBuffer | Uint8Array, config: Partial<QRTextConfig> = {}): Promise<string> {
    const output = await new QRTextExtractor(config).extract(pdfData);
    return output.text;
  }
}

function countSource(pages: readonly PageTextResult[], source: PageTextResult['source']): number {
  return pages.filter((p) => p.source === source).length;
}

export * from './types/index.js';
export * from './core/index.js';
export * from './ocr/index.js';

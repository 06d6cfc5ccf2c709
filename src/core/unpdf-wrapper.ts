import type { EmbeddedTextSource, PageRasterizer, PDFMetadata, RasterImage } from '../types/pdf.js';
import { DocumentLoadError } from './errors.js';
import { ImageConverter } from '../utils/image-converter.js';

type PDFJSDocument = {
  numPages: number;
  getPage: (pageNumber: number) => Promise<PDFJSPage>;
  getMetadata: () => Promise<{ info: Record<string, unknown>; metadata: unknown }>;
  destroy?: () => Promise<void>;
};

type PDFJSPage = {
  getTextContent: () => Promise<PDFJSTextContent>;
};

type PDFJSTextContent = {
  // Marked-content entries carry no `str`
  items: PDFJSTextItem[];
};

type PDFJSTextItem = {
  str?: string;
  hasEOL?: boolean;
};

type RenderOptions = {
  canvasImport?: () => Promise<unknown>;
  scale?: number;
};

type UnpdfModule = {
  getDocumentProxy: (bytes: Uint8Array) => Promise<PDFJSDocument>;
  renderPageAsImage: (data: PDFJSDocument, pageNumber: number, options?: RenderOptions) => Promise<ArrayBuffer>;
};

let cachedUnpdf: Promise<UnpdfModule> | null = null;

/**
 * The PDF side of the page pipeline: text layer and page rasterization, both
 * served from one pdf.js document proxy loaded through unpdf.
 */
export class UnPDFWrapper implements EmbeddedTextSource, PageRasterizer {
  private document: PDFJSDocument | null = null;

  private async getUnpdf(): Promise<UnpdfModule> {
    if (!cachedUnpdf) {
      cachedUnpdf = import('unpdf') as unknown as Promise<UnpdfModule>;
    }
    return await cachedUnpdf;
  }

  private requireDocument(): PDFJSDocument {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return this.document;
  }

  async loadDocument(data: ArrayBuffer | Uint8Array): Promise<void> {
    try {
      const unpdf = await this.getUnpdf();
      // pdf.js may transfer the buffer to its worker; keep the caller's bytes intact
      const bytes = data instanceof Uint8Array ? data.slice() : new Uint8Array(data.slice(0));
      this.document = await unpdf.getDocumentProxy(bytes);
    } catch (error) {
      throw new DocumentLoadError(error);
    }
  }

  async getPageCount(): Promise<number> {
    return this.requireDocument().numPages;
  }

  async getMetadata(): Promise<PDFMetadata> {
    const document = this.requireDocument();
    const text = (value: unknown): string | undefined => (typeof value === 'string' && value ? value : undefined);

    try {
      const { info = {} } = await document.getMetadata();
      return {
        title: text(info.Title),
        author: text(info.Author),
        creator: text(info.Creator),
        producer: text(info.Producer)
      };
    } catch (error) {
      console.warn('Failed to extract metadata:', error);
      return {};
    }
  }

  async extractEmbeddedText(pageIndex: number): Promise<string> {
    const page = await this.requireDocument().getPage(pageIndex + 1);
    const content = await page.getTextContent();
    return content.items
      .map((item) => (item.str ?? '') + (item.hasEOL ? '\n' : ''))
      .join('');
  }

  async rasterize(pageIndex: number, zoom: number): Promise<RasterImage> {
    const document = this.requireDocument();
    const unpdf = await this.getUnpdf();
    const png = await unpdf.renderPageAsImage(document, pageIndex + 1, {
      canvasImport: () => import('@napi-rs/canvas'),
      scale: zoom
    });
    return ImageConverter.pngToRaster(png);
  }

  async dispose(): Promise<void> {
    const document = this.document;
    this.document = null;
    if (document?.destroy) {
      await document.destroy();
    }
  }
}

import type { PageCollaborators, RasterImage } from '../types/pdf.js';
import type { LayoutOptions } from '../types/config.js';
import type { PageState, PageTextResult } from '../types/output.js';
import type { DetectedCode } from '../types/symbol.js';
import { buildSymbols } from '../ocr/symbol-builder.js';
import { clusterRows, computeRowTolerance } from './layout/row-clusterer.js';
import { orderRows } from './layout/reading-order.js';
import { assembleText, normalizeEmbeddedText, resolveMarker } from './layout/paragraph-assembler.js';
import { PageStageError } from './errors.js';
import { withTimeout } from '../utils/timeout.js';

export interface PagePipelineOptions {
  zoom: number;
  layout?: LayoutOptions;
  normalizeEmbeddedText?: boolean;
  pageTimeoutMs?: number;
}

type Outcome = Pick<PageTextResult, 'text' | 'source'> & Partial<Pick<PageTextResult, 'symbolCount' | 'rowCount' | 'droppedSymbols'>>;

/**
 * Turns one page into text.
 *
 * start → try-embedded-text → embedded-text-found → done
 *                           ↘ render-and-detect → cluster → order → assemble → done
 *
 * A page never rejects: collaborator failures and timeouts end in `done` with
 * empty text and a warning.
 */
export class PagePipeline {
  private collaborators: PageCollaborators;
  private options: PagePipelineOptions;

  constructor(collaborators: PageCollaborators, options: PagePipelineOptions) {
    if (!Number.isFinite(options.zoom) || options.zoom <= 0) {
      throw new Error(`Zoom factor must be a positive number, got ${options.zoom}`);
    }
    resolveMarker(options.layout ?? {});
    this.collaborators = collaborators;
    this.options = options;
  }

  async process(pageIndex: number): Promise<PageTextResult> {
    const startTime = Date.now();
    const trace: PageState[] = ['start'];
    const warnings: string[] = [];

    const warn = (message: string): void => {
      warnings.push(message);
      console.warn(message);
    };

    const outcome = await this.run(pageIndex, trace, warn);
    trace.push('done');

    return {
      pageIndex,
      text: outcome.text,
      source: outcome.source,
      symbolCount: outcome.symbolCount ?? 0,
      rowCount: outcome.rowCount ?? 0,
      droppedSymbols: outcome.droppedSymbols ?? 0,
      warnings,
      trace,
      processingTime: Date.now() - startTime
    };
  }

  private async run(pageIndex: number, trace: PageState[], warn: (message: string) => void): Promise<Outcome> {
    const { zoom, layout = {}, pageTimeoutMs } = this.options;
    const pageLabel = `Page ${pageIndex + 1}`;

    trace.push('try-embedded-text');
    let embedded = '';
    try {
      embedded = await this.collaborators.text.extractEmbeddedText(pageIndex);
    } catch (error) {
      warn(`${new PageStageError('embedded-text', pageIndex, error).message}; falling back to QR decoding`);
    }

    if (embedded.trim().length > 0) {
      trace.push('embedded-text-found');
      const text = this.options.normalizeEmbeddedText ? normalizeEmbeddedText(embedded, layout) : embedded;
      return { text, source: 'embedded' };
    }

    trace.push('render-and-detect');
    let image: RasterImage;
    try {
      image = await withTimeout(
        this.collaborators.rasterizer.rasterize(pageIndex, zoom),
        pageTimeoutMs,
        `${pageLabel} rasterization`
      );
    } catch (error) {
      warn(new PageStageError('rasterize', pageIndex, error).message);
      return { text: '', source: 'failed' };
    }

    let codes: DetectedCode[];
    try {
      codes = await withTimeout(this.collaborators.detector.detect(image), pageTimeoutMs, `${pageLabel} QR detection`);
    } catch (error) {
      warn(new PageStageError('detect', pageIndex, error).message);
      return { text: '', source: 'failed' };
    }

    const { symbols, dropped } = buildSymbols(codes, pageIndex, zoom);
    if (dropped > 0) {
      warn(`${pageLabel}: dropped ${dropped} QR detection(s) with an empty payload or degenerate outline`);
    }

    if (symbols.length === 0) {
      warn(`${pageLabel}: no QR symbols detected at zoom ${zoom}; small symbols may need a larger zoom`);
      return { text: '', source: 'empty', droppedSymbols: dropped };
    }

    trace.push('cluster');
    const tolerance = computeRowTolerance(symbols, layout);
    const clustered = clusterRows(symbols, { ...layout, rowTolerance: tolerance });

    trace.push('order');
    const rows = orderRows(clustered);

    trace.push('assemble');
    const text = assembleText(rows, layout);

    return {
      text,
      source: 'symbols',
      symbolCount: symbols.length,
      rowCount: rows.length,
      droppedSymbols: dropped
    };
  }
}

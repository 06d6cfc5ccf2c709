import type { PageTextResult } from '../types/output.js';
import { PagePipeline } from './page-pipeline.js';
import { DEFAULT_PAGE_SEPARATOR } from './defaults.js';

export interface DocumentProcessorOptions {
  maxConcurrentPages?: number;
  pageSeparator?: string;
}

export type PageDoneCallback = (result: PageTextResult, completed: number) => void;

export class DocumentProcessor {
  private pipeline: PagePipeline;
  private options: Required<DocumentProcessorOptions>;

  constructor(pipeline: PagePipeline, options: DocumentProcessorOptions = {}) {
    this.pipeline = pipeline;
    this.options = {
      maxConcurrentPages: Math.max(1, Math.floor(options.maxConcurrentPages ?? 1)),
      pageSeparator: options.pageSeparator ?? DEFAULT_PAGE_SEPARATOR
    };
  }

  async processPages(pageCount: number, onPageDone?: PageDoneCallback): Promise<PageTextResult[]> {
    if (pageCount <= 0) return [];

    if (this.options.maxConcurrentPages > 1) {
      return await this.processPagesParallel(pageCount, onPageDone);
    }

    const results: PageTextResult[] = [];
    for (let i = 0; i < pageCount; i++) {
      const result = await this.pipeline.process(i);
      results.push(result);
      onPageDone?.(result, results.length);
    }
    return results;
  }

  /**
   * Pages share no state, so a fixed pool of workers pulls page indexes
   * until none are left. Results land at their own index, keeping page order
   * independent of completion order.
   */
  private async processPagesParallel(pageCount: number, onPageDone?: PageDoneCallback): Promise<PageTextResult[]> {
    const results = new Array<PageTextResult>(pageCount);
    const workerCount = Math.min(this.options.maxConcurrentPages, pageCount);
    let next = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (next < pageCount) {
        const pageIndex = next++;
        const result = await this.pipeline.process(pageIndex);
        results[pageIndex] = result;
        completed++;
        onPageDone?.(result, completed);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }

  combine(results: readonly PageTextResult[]): string {
    return results.map((r) => r.text).join(this.options.pageSeparator);
  }
}

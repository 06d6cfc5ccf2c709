export type PipelineStage = 'embedded-text' | 'rasterize' | 'detect';

/**
 * A collaborator call that failed for one page. The page pipeline turns these
 * into empty page output plus a warning.
 */
export class PageStageError extends Error {
  readonly stage: PipelineStage;
  readonly pageIndex: number;

  constructor(stage: PipelineStage, pageIndex: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Page ${pageIndex + 1}: ${stage} failed: ${detail}`, { cause });
    this.name = 'PageStageError';
    this.stage = stage;
    this.pageIndex = pageIndex;
  }
}

export class StageTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The input could not be opened as a PDF at all. This is the only failure
 * that reaches callers of `extract()`.
 */
export class DocumentLoadError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load PDF document: ${detail}`, { cause });
    this.name = 'DocumentLoadError';
  }
}

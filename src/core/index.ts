export * from './defaults.js';
export { UnPDFWrapper } from './unpdf-wrapper.js';
export { PagePipeline, type PagePipelineOptions } from './page-pipeline.js';
export { DocumentProcessor, type DocumentProcessorOptions, type PageDoneCallback } from './document-processor.js';
export * from './errors.js';
export * from './layout/index.js';

export * from './symbol.js';
export * from './pdf.js';
export * from './config.js';
export * from './output.js';

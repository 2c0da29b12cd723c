// Page-text extraction
export { PdfjsTextExtractor } from './pdf-extractor.js';
export type { PdfjsTextExtractorOptions } from './pdf-extractor.js';

// Layout-aware line reconstruction
export { toTextItems, buildLinesFromItems } from './layout-pdfjs.js';
export type { TextItem } from './layout-pdfjs.js';

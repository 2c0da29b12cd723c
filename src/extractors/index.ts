export { closeDocument } from './document.js';

// pdfjs-dist backed extraction
export { PdfjsTextExtractor, type PdfjsTextExtractorOptions } from '@ledgerlock/pdf-extract';

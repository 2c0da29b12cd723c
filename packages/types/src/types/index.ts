export type { LoadedDocument, TextExtractor } from './extraction.js';

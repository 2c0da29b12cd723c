/**
 * A document opened by a {@link TextExtractor}. Pages are addressed by
 * zero-based index and come back in document order.
 */
export interface LoadedDocument {
  readonly pageCount: number;
  /**
   * Plain text of one page, or `null` when the page has no extractable text
   * (or could not be read at all).
   */
  pageText(pageIndex: number): Promise<string | null>;
  close(): Promise<void>;
}

/**
 * Page-text extraction collaborator. `load` rejects when the file cannot be
 * opened as a document; individual pages never reject.
 */
export interface TextExtractor {
  load(filePath: string): Promise<LoadedDocument>;
}

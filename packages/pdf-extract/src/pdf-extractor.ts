import { readFile } from 'fs/promises';
import type { LoadedDocument, Logger, TextExtractor } from '@ledgerlock/types';
import { silentLogger } from '@ledgerlock/types';
import { buildLinesFromItems, toTextItems } from './layout-pdfjs.js';

interface PdfjsPageLike {
  getTextContent(): Promise<{ items: unknown[] }>;
}

interface PdfjsDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPageLike>;
  destroy(): Promise<void>;
}

export interface PdfjsTextExtractorOptions {
  logger?: Logger;
}

/**
 * Page-text extraction backed by pdfjs-dist.
 *
 * The whole file is read into memory once; pages are turned into text
 * lazily, so a validator that only needs page one never touches the rest.
 */
export class PdfjsTextExtractor implements TextExtractor {
  private readonly logger: Logger;

  constructor(options: PdfjsTextExtractorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async load(filePath: string): Promise<LoadedDocument> {
    const data = new Uint8Array(await readFile(filePath));

    // Dynamic import for pdfjs-dist (ESM only)
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const loadingTask = pdfjs.getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
      verbosity: 0,
    });
    const pdfDocument: PdfjsDocumentLike = await loadingTask.promise;

    return new PdfjsLoadedDocument(pdfDocument, this.logger);
  }
}

class PdfjsLoadedDocument implements LoadedDocument {
  constructor(
    private readonly pdfDocument: PdfjsDocumentLike,
    private readonly logger: Logger
  ) {}

  get pageCount(): number {
    return this.pdfDocument.numPages;
  }

  async pageText(pageIndex: number): Promise<string | null> {
    if (pageIndex < 0 || pageIndex >= this.pageCount) return null;

    try {
      const page = await this.pdfDocument.getPage(pageIndex + 1);
      const textContent = await page.getTextContent();
      const lines = buildLinesFromItems(toTextItems(textContent.items));
      return lines.length > 0 ? lines.join('\n') : null;
    } catch (error) {
      this.logger.debug('Page text extraction failed', {
        page: pageIndex + 1,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async close(): Promise<void> {
    await this.pdfDocument.destroy();
  }
}

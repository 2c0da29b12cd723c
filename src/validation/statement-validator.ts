import {
  STATEMENT_MARKERS,
  resolveImportLimits,
  silentLogger,
  type ImportLimits,
  type ImportLimitsInput,
  type LoadedDocument,
  type Logger,
  type TextExtractor,
} from '@ledgerlock/types';
import { closeDocument } from '../extractors/index.js';

export interface ValidationResult {
  valid: boolean;
  reason: string;
}

export interface StatementValidatorOptions {
  extractor: TextExtractor;
  /** Lowercase first-page markers; one must be present */
  markers?: readonly string[];
  limits?: ImportLimitsInput;
  logger?: Logger;
}

function invalid(reason: string): ValidationResult {
  return { valid: false, reason };
}

/**
 * Cheap pre-check of a staged document that only reads the first page.
 * Checks run in order and stop at the first failure.
 */
export class StatementValidator {
  private readonly extractor: TextExtractor;
  private readonly markers: readonly string[];
  private readonly limits: ImportLimits;
  private readonly logger: Logger;

  constructor(options: StatementValidatorOptions) {
    this.extractor = options.extractor;
    this.markers = (options.markers ?? STATEMENT_MARKERS).map((marker) => marker.toLowerCase());
    this.limits = resolveImportLimits(options.limits);
    this.logger = options.logger ?? silentLogger;
  }

  async validate(stagedPath: string): Promise<ValidationResult> {
    let document: LoadedDocument;
    try {
      document = await this.extractor.load(stagedPath);
    } catch (error) {
      this.logger.debug('Validation load failed', { error: error instanceof Error ? error.message : String(error) });
      return invalid('Invalid PDF file');
    }

    try {
      return await this.checkDocument(document);
    } finally {
      await closeDocument(document, this.logger);
    }
  }

  private async checkDocument(document: LoadedDocument): Promise<ValidationResult> {
    if (document.pageCount <= 0) {
      return invalid('PDF has no pages');
    }

    if (document.pageCount > this.limits.maxPageCount) {
      return invalid(`PDF has too many pages (${document.pageCount}). Maximum: ${this.limits.maxPageCount}`);
    }

    let firstPage: string | null;
    try {
      firstPage = await document.pageText(0);
    } catch (error) {
      this.logger.debug('First page unreadable', { error: error instanceof Error ? error.message : String(error) });
      firstPage = null;
    }
    if (firstPage === null) {
      return invalid('Cannot read PDF content');
    }

    if (firstPage.length >= this.limits.maxContentChars) {
      return invalid('PDF content too large');
    }

    const content = firstPage.toLowerCase();
    if (!this.markers.some((marker) => content.includes(marker))) {
      return invalid('PDF does not appear to be a supported bank statement');
    }

    return { valid: true, reason: 'Valid statement' };
  }
}

import { stat } from 'fs/promises';
import { basename } from 'path';
import {
  contentTooLarge,
  documentLoadFailed,
  fileTooLarge,
  noTransactionsFound,
  pageLimitExceeded,
  resolveImportLimits,
  silentLogger,
  type ImportLimits,
  type ImportLimitsInput,
  type LoadedDocument,
  type Logger,
  type ParseResult,
  type TextExtractor,
  type Transaction,
} from '@ledgerlock/types';
import { closeDocument } from '../extractors/index.js';
import { LineClassifier } from './line-classifier.js';
import { createFailedParseResult, createParseResult } from './parse-result.js';
import { TransactionLineParser } from './transaction-line-parser.js';

export interface StatementParserOptions {
  extractor: TextExtractor;
  classifier?: LineClassifier;
  lineParser?: TransactionLineParser;
  limits?: ImportLimitsInput;
  logger?: Logger;
}

/**
 * Turns a staged statement into a ParseResult in one sequential pass.
 *
 * Two outcomes only: a structural failure (limit exceeded or unreadable
 * document: no transactions, one fatal reason) or a completed parse (zero or
 * more transactions, at most one soft warning). Lines that do not parse are
 * skipped without a trace.
 */
export class StatementParser {
  private readonly extractor: TextExtractor;
  private readonly classifier: LineClassifier;
  private readonly lineParser: TransactionLineParser;
  private readonly limits: ImportLimits;
  private readonly logger: Logger;

  constructor(options: StatementParserOptions) {
    this.extractor = options.extractor;
    this.classifier = options.classifier ?? new LineClassifier();
    this.lineParser = options.lineParser ?? new TransactionLineParser();
    this.limits = resolveImportLimits(options.limits);
    this.logger = options.logger ?? silentLogger;
  }

  async parseStatement(stagedPath: string, sourceName: string = basename(stagedPath)): Promise<ParseResult> {
    // The gateway only checked the original; check the staged copy too.
    const fileSize = await this.fileSize(stagedPath);
    if (fileSize !== null && fileSize > this.limits.maxFileSizeBytes) {
      return createFailedParseResult(sourceName, fileTooLarge(fileSize, this.limits.maxFileSizeBytes));
    }

    let document: LoadedDocument;
    try {
      document = await this.extractor.load(stagedPath);
    } catch (error) {
      this.logger.debug('Document load failed', { error: error instanceof Error ? error.message : String(error) });
      return createFailedParseResult(sourceName, documentLoadFailed(error));
    }

    try {
      return await this.parseDocument(document, sourceName);
    } finally {
      await closeDocument(document, this.logger);
    }
  }

  private async parseDocument(document: LoadedDocument, sourceName: string): Promise<ParseResult> {
    if (document.pageCount > this.limits.maxPageCount) {
      return createFailedParseResult(sourceName, pageLimitExceeded(document.pageCount, this.limits.maxPageCount));
    }

    const pageTexts: string[] = [];
    let contentLength = 0;

    for (let pageIndex = 0; pageIndex < document.pageCount; pageIndex++) {
      const text = await this.readPage(document, pageIndex);
      if (text === null) continue;

      contentLength += text.length + (pageTexts.length > 0 ? 1 : 0);
      if (contentLength >= this.limits.maxContentChars) {
        return createFailedParseResult(sourceName, contentTooLarge(contentLength, this.limits.maxContentChars));
      }
      pageTexts.push(text);
    }

    const rawLines = pageTexts.length > 0 ? pageTexts.join('\n').split(/\r\n|\r|\n/) : [];

    const transactions: Transaction[] = [];
    for (const line of rawLines) {
      if (this.classifier.isNoise(line)) continue;

      const transaction = this.lineParser.parse(line);
      if (transaction !== null) {
        transactions.push(transaction);
      }
    }

    const parseErrors = transactions.length === 0 ? [noTransactionsFound().message] : [];

    this.logger.debug('Statement parsed', {
      pages: document.pageCount,
      lines: rawLines.length,
      transactions: transactions.length,
    });

    return createParseResult({ transactions, rawLines, parseErrors, sourceName });
  }

  /** Best effort: a page that fails to yield text is treated as empty. */
  private async readPage(document: LoadedDocument, pageIndex: number): Promise<string | null> {
    try {
      return await document.pageText(pageIndex);
    } catch (error) {
      this.logger.debug('Skipping unreadable page', {
        page: pageIndex + 1,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async fileSize(filePath: string): Promise<number | null> {
    try {
      return (await stat(filePath)).size;
    } catch (error) {
      // Unreadable here means unloadable below; the load step reports it.
      this.logger.debug('Could not stat staged document', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

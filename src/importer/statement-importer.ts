import type { Categorizer } from '@ledgerlock/categorizer';
import { PdfjsTextExtractor } from '@ledgerlock/pdf-extract';
import {
  isStatementError,
  silentLogger,
  type ImportLimitsInput,
  type Logger,
  type ParseResult,
  type TextExtractor,
} from '@ledgerlock/types';
import { DocumentGateway, type DocumentHandle, type StorageProtection } from '../gateway/index.js';
import { LineClassifier, StatementParser, TransactionLineParser } from '../parsers/index.js';
import { StatementValidator, type ValidationResult } from '../validation/index.js';

export interface StatementImporterOptions {
  /** Page-text collaborator (default: pdfjs-dist) */
  extractor?: TextExtractor;
  stagingDir?: string;
  protection?: StorageProtection;
  /** Minimum age of leftovers removed by `purgeStagingArea` */
  purgeGraceMs?: number;
  limits?: ImportLimitsInput;
  categorizer?: Categorizer;
  /** First-page markers for validation */
  markers?: readonly string[];
  extraNoisePatterns?: readonly RegExp[];
  logger?: Logger;
}

/**
 * Wires gateway, validator and parser together. Every collaborator is
 * created per importer; nothing is shared between importers beyond the
 * staging directory on disk.
 */
export class StatementImporter {
  readonly gateway: DocumentGateway;
  readonly parser: StatementParser;
  readonly validator: StatementValidator;
  private readonly logger: Logger;

  constructor(options: StatementImporterOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    const extractor = options.extractor ?? new PdfjsTextExtractor({ logger: this.logger });

    this.gateway = new DocumentGateway({
      stagingDir: options.stagingDir,
      protection: options.protection,
      purgeGraceMs: options.purgeGraceMs,
      limits: options.limits,
      logger: this.logger,
    });
    this.parser = new StatementParser({
      extractor,
      classifier: new LineClassifier({ extraPatterns: options.extraNoisePatterns }),
      lineParser: new TransactionLineParser({ categorizer: options.categorizer }),
      limits: options.limits,
      logger: this.logger,
    });
    this.validator = new StatementValidator({
      extractor,
      markers: options.markers,
      limits: options.limits,
      logger: this.logger,
    });
  }

  /**
   * Stage, parse and destroy. Gateway failures (missing file, wrong type,
   * too large, access or I/O errors) reject with a StatementError; parse
   * failures come back inside the result.
   */
  async parseSecurely(handle: DocumentHandle): Promise<ParseResult> {
    return this.gateway.withSecureAccess(handle, (stagedPath) =>
      this.parser.parseStatement(stagedPath, handle.name)
    );
  }

  async validateSecurely(handle: DocumentHandle): Promise<ValidationResult> {
    try {
      return await this.gateway.withSecureAccess(handle, (stagedPath) => this.validator.validate(stagedPath));
    } catch (error) {
      if (isStatementError(error)) {
        return { valid: false, reason: error.message };
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Unexpected validation error', { error: message });
      return { valid: false, reason: `Validation error: ${message}` };
    }
  }

  async purgeStagingArea(): Promise<number> {
    return this.gateway.purgeStagingArea();
  }
}

export function createStatementImporter(options: StatementImporterOptions = {}): StatementImporter {
  return new StatementImporter(options);
}

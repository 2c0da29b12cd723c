/**
 * ledgerlock - bank statement PDF import with secure staging
 *
 * Library entry point. The CLI lives in ./cli.
 */

// ─── Importer facade ────────────────────────────────────────────────────────
export {
  StatementImporter,
  createStatementImporter,
  type StatementImporterOptions,
} from './importer/index.js';

// ─── Gateway ────────────────────────────────────────────────────────────────
export {
  DocumentGateway,
  DEFAULT_STAGING_DIR,
  DEFAULT_PURGE_GRACE_MS,
  localDocumentHandle,
  secureDelete,
  noStorageProtection,
  ownerOnlyStorageProtection,
  defaultStorageProtection,
} from './gateway/index.js';
export type { DocumentGatewayOptions, DocumentHandle, StorageProtection } from './gateway/index.js';

// ─── Validation ─────────────────────────────────────────────────────────────
export { StatementValidator } from './validation/index.js';
export type { StatementValidatorOptions, ValidationResult } from './validation/index.js';

// ─── Parsers ────────────────────────────────────────────────────────────────
export {
  LineClassifier,
  NOISE_PATTERNS,
  TransactionLineParser,
  StatementParser,
  createParseResult,
  createFailedParseResult,
} from './parsers/index.js';
export type {
  LineClassifierOptions,
  TransactionLineParserOptions,
  StatementParserOptions,
  ParseResultFields,
} from './parsers/index.js';

// ─── Extraction ─────────────────────────────────────────────────────────────
export { PdfjsTextExtractor } from './extractors/index.js';
export type { PdfjsTextExtractorOptions } from './extractors/index.js';

// ─── Categorization ─────────────────────────────────────────────────────────
export {
  CATEGORY_RULES,
  DEFAULT_CATEGORY,
  categorize,
  createKeywordCategorizer,
  categoryLabel,
} from '@ledgerlock/categorizer';
export type { Categorizer, CategoryRule } from '@ledgerlock/categorizer';

// ─── Output ─────────────────────────────────────────────────────────────────
export { exportCsv, summarizeTransactions } from '@ledgerlock/output';
export type { CsvExportOptions, StatementSummary, CategoryTotal } from '@ledgerlock/output';

// ─── Shared types ───────────────────────────────────────────────────────────
export {
  TransactionSchema,
  ParseResultSchema,
  CategorySchema,
  TransactionDirectionSchema,
  ImportLimitsSchema,
  StatementError,
  isStatementError,
  createConsoleLogger,
  silentLogger,
  PARSER_VERSION,
} from '@ledgerlock/types';
export type {
  Transaction,
  ParseResult,
  Category,
  TransactionDirection,
  ImportLimits,
  ImportLimitsInput,
  StatementErrorKind,
  Logger,
  TextExtractor,
  LoadedDocument,
} from '@ledgerlock/types';

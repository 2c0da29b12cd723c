import { NO_TRANSACTIONS_WARNING } from './utils/constants.js';

export type StatementErrorKind =
  | 'FileTooLarge'
  | 'InvalidFileType'
  | 'FileNotFound'
  | 'ScopeAccessFailed'
  | 'PageLimitExceeded'
  | 'ContentTooLarge'
  | 'DocumentLoadFailed'
  | 'NoTransactionsFound'
  | 'IOFailure';

/**
 * Every failure the gateway throws, and every fatal reason the parser
 * records, is a StatementError. `NoTransactionsFound` is the one soft kind:
 * it is reported, never thrown.
 */
export class StatementError extends Error {
  readonly kind: StatementErrorKind;

  constructor(kind: StatementErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatementError';
    this.kind = kind;
  }

  get isFatal(): boolean {
    return this.kind !== 'NoTransactionsFound';
  }
}

export function isStatementError(error: unknown): error is StatementError {
  return error instanceof StatementError;
}

export function formatFileSize(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function fileTooLarge(size: number, max: number): StatementError {
  return new StatementError(
    'FileTooLarge',
    `File too large (${formatFileSize(size)}). Maximum allowed: ${formatFileSize(max)}`
  );
}

export function invalidFileType(extension: string): StatementError {
  const shown = extension === '' ? '(none)' : extension;
  return new StatementError('InvalidFileType', `Invalid file type: ${shown}. Only PDF files are allowed`);
}

export function fileNotFound(cause?: unknown): StatementError {
  return new StatementError('FileNotFound', 'File not found', { cause });
}

export function scopeAccessFailed(cause?: unknown): StatementError {
  return new StatementError('ScopeAccessFailed', 'Failed to access file securely', { cause });
}

export function pageLimitExceeded(pageCount: number, max: number): StatementError {
  return new StatementError('PageLimitExceeded', `PDF has too many pages (${pageCount}). Maximum: ${max}`);
}

export function contentTooLarge(length: number, max: number): StatementError {
  return new StatementError('ContentTooLarge', `PDF content too large (${length} characters). Limit: ${max}`);
}

export function documentLoadFailed(cause?: unknown): StatementError {
  return new StatementError('DocumentLoadFailed', 'Failed to load PDF document', { cause });
}

export function noTransactionsFound(): StatementError {
  return new StatementError('NoTransactionsFound', NO_TRANSACTIONS_WARNING);
}

export function ioFailure(cause: unknown): StatementError {
  return new StatementError('IOFailure', `File error: ${describeCause(cause)}`, { cause });
}

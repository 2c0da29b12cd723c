export const PARSER_VERSION = '1.0.0';

/** 10 MiB. */
export const MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

export const MAX_PAGE_COUNT = 100;

export const MAX_CONTENT_CHARS = 1_000_000;

/** Leading bytes of a staged file overwritten before unlink. */
export const SECURE_OVERWRITE_BYTES = 1024;

export const ALLOWED_EXTENSIONS = ['.pdf'] as const;

export const UNKNOWN_TRANSACTION_DETAILS = 'Unknown Transaction';

export const NO_TRANSACTIONS_WARNING =
  'No transactions found in statement. Check that the document matches the supported statement layout.';

/** Currency codes accepted in front of an amount token. */
export const SUPPORTED_CURRENCIES = ['CHF', 'EUR', 'USD', 'GBP'] as const;

export const DEFAULT_CURRENCY = 'CHF';

/** Lowercase markers, at least one of which appears on the first page of a supported statement. */
export const STATEMENT_MARKERS = ['zürcher kantonalbank', 'zkb', 'kontoauszug'] as const;

export const DATE_FORMATS = {
  ISO: 'YYYY-MM-DD',
  SWISS_LONG: 'DD.MM.YYYY',
  SWISS_SHORT: 'DD.MM.YY',
} as const;

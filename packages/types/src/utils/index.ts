export {
  PARSER_VERSION,
  MAX_FILE_SIZE_BYTES,
  MAX_PAGE_COUNT,
  MAX_CONTENT_CHARS,
  SECURE_OVERWRITE_BYTES,
  ALLOWED_EXTENSIONS,
  UNKNOWN_TRANSACTION_DETAILS,
  NO_TRANSACTIONS_WARNING,
  SUPPORTED_CURRENCIES,
  DEFAULT_CURRENCY,
  STATEMENT_MARKERS,
  DATE_FORMATS,
} from './constants.js';
export { parseSwissDate, formatSwissDate, isValidISODate, compareDates } from './date.js';
export {
  toMinorUnits,
  fromMinorUnits,
  normalizeAmount,
  sumAmounts,
  subtractAmounts,
  formatCurrency,
  type DecimalString,
} from './money.js';
export { createConsoleLogger, silentLogger, type Logger, type LogFields, type ConsoleLoggerOptions } from './logger.js';

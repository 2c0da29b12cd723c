/**
 * CSV Exporter Module
 *
 * Converts a dry-run ParseResult to CSV for spreadsheet review.
 */

import { formatSwissDate, type ParseResult, type Transaction } from '@ledgerlock/types';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Prefix debit amounts with '-' (default: true) */
  signedAmounts?: boolean;
  /** Date format: 'iso' (YYYY-MM-DD) or 'swiss' (DD.MM.YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'swiss';
}

const COLUMNS = ['Date', 'Details', 'Amount', 'Direction', 'Category'] as const;

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting = value.includes(delimiter) ||
                       value.includes('"') ||
                       value.includes('\n') ||
                       value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function formatAmount(txn: Transaction, signed: boolean): string {
  return signed && txn.direction === 'debit' ? `-${txn.amount}` : txn.amount;
}

function buildDataRow(txn: Transaction, options: Required<CsvExportOptions>): string[] {
  return [
    options.dateFormat === 'swiss' ? formatSwissDate(txn.date) : txn.date,
    txn.details,
    formatAmount(txn, options.signedAmounts),
    txn.direction,
    txn.category,
  ];
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export the transactions of a parse result, in document order.
 *
 * @returns CSV text without a trailing newline
 */
export function exportCsv(result: ParseResult, options: CsvExportOptions = {}): string {
  const opts: Required<CsvExportOptions> = {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    signedAmounts: options.signedAmounts ?? true,
    dateFormat: options.dateFormat ?? 'iso',
  };

  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(COLUMNS, opts.delimiter));
  }

  for (const txn of result.transactions) {
    lines.push(rowToCsvLine(buildDataRow(txn, opts), opts.delimiter));
  }

  return lines.join('\n');
}

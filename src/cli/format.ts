import { categoryLabel } from '@ledgerlock/categorizer';
import { summarizeTransactions } from '@ledgerlock/output';
import { formatCurrency, formatSwissDate, type ParseResult } from '@ledgerlock/types';

export const OUTPUT_FORMATS = ['table', 'json', 'csv'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

function padStart(value: string, width: number): string {
  return value.length >= width ? value : ' '.repeat(width - value.length) + value;
}

/**
 * Plain-text dry-run review: one row per transaction, then totals and
 * any parse errors.
 */
export function renderTable(result: ParseResult): string {
  const rows = result.transactions.map((txn) => [
    formatSwissDate(txn.date),
    txn.details,
    formatCurrency(txn.direction === 'debit' ? `-${txn.amount}` : txn.amount),
    categoryLabel(txn.category),
  ]);

  const header = ['Date', 'Details', 'Amount', 'Category'];
  const widths = header.map((title, col) =>
    Math.max(title.length, ...rows.map((row) => (row[col] ?? '').length))
  );

  const formatRow = (row: readonly string[]): string =>
    row
      .map((cell, col) => (col === 2 ? padStart(cell, widths[col] ?? 0) : pad(cell, widths[col] ?? 0)))
      .join('  ')
      .trimEnd();

  const lines = [`Statement: ${result.sourceName}`, ''];
  if (rows.length > 0) {
    lines.push(formatRow(header));
    lines.push(widths.map((width) => '-'.repeat(width)).join('  '));
    for (const row of rows) {
      lines.push(formatRow(row));
    }
    lines.push('');
  }

  const summary = summarizeTransactions(result.transactions);
  lines.push(`Transactions: ${result.transactions.length}`);
  lines.push(`Income:       ${formatCurrency(summary.totalIncome)}`);
  lines.push(`Expenses:     ${formatCurrency(summary.totalExpenses)}`);
  lines.push(`Balance:      ${formatCurrency(summary.balance)}`);

  for (const error of result.parseErrors) {
    lines.push(`Warning: ${error}`);
  }

  return lines.join('\n');
}

import { describe, it, expect } from 'vitest';
import type { ParseResult, Transaction } from '@ledgerlock/types';
import { exportCsv } from '@ledgerlock/output';

const coop: Transaction = {
  date: '2026-01-15',
  details: 'COOP Zürich, Kaufvertrag',
  amount: '45.80',
  direction: 'credit',
  category: 'groceries',
};

const netflix: Transaction = {
  date: '2026-01-16',
  details: 'Netflix "Premium"',
  amount: '15.90',
  direction: 'debit',
  category: 'entertainment',
};

const result: ParseResult = {
  transactions: [coop, netflix],
  rawLines: [],
  parseErrors: [],
  sourceName: 'januar.pdf',
};

describe('exportCsv', () => {
  it('should export a header and one row per transaction', () => {
    expect(exportCsv(result)).toBe(
      [
        'Date,Details,Amount,Direction,Category',
        '2026-01-15,"COOP Zürich, Kaufvertrag",45.80,credit,groceries',
        '2026-01-16,"Netflix ""Premium""",-15.90,debit,entertainment',
      ].join('\n')
    );
  });

  it('should honour delimiter, date format, sign and header options', () => {
    const csv = exportCsv(result, {
      includeHeader: false,
      delimiter: ';',
      signedAmounts: false,
      dateFormat: 'swiss',
    });

    expect(csv.split('\n')).toEqual([
      '15.01.2026;COOP Zürich, Kaufvertrag;45.80;credit;groceries',
      '16.01.2026;"Netflix ""Premium""";15.90;debit;entertainment',
    ]);
  });

  it('should quote values containing line breaks', () => {
    const multiline: ParseResult = {
      ...result,
      transactions: [{ ...coop, details: 'Coop\nBasel' }],
    };
    expect(exportCsv(multiline, { includeHeader: false })).toBe('2026-01-15,"Coop\nBasel",45.80,credit,groceries');
  });

  it('should export only the header for an empty result', () => {
    expect(exportCsv({ ...result, transactions: [] })).toBe('Date,Details,Amount,Direction,Category');
  });
});

import type { ParseResult, StatementError, Transaction } from '@ledgerlock/types';

export interface ParseResultFields {
  transactions: Transaction[];
  rawLines: string[];
  parseErrors: string[];
  sourceName: string;
}

export function createParseResult(fields: ParseResultFields): ParseResult {
  return Object.freeze({
    transactions: Object.freeze(fields.transactions),
    rawLines: Object.freeze(fields.rawLines),
    parseErrors: Object.freeze(fields.parseErrors),
    sourceName: fields.sourceName,
  });
}

/** Structural failure: no transactions, no lines, a single fatal reason. */
export function createFailedParseResult(sourceName: string, error: StatementError): ParseResult {
  return createParseResult({
    transactions: [],
    rawLines: [],
    parseErrors: [error.message],
    sourceName,
  });
}

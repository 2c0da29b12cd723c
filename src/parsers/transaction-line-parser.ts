import {
  SUPPORTED_CURRENCIES,
  UNKNOWN_TRANSACTION_DETAILS,
  normalizeAmount,
  parseSwissDate,
  type Transaction,
} from '@ledgerlock/types';
import { createKeywordCategorizer, type Categorizer } from '@ledgerlock/categorizer';

/** `d.m.yyyy` or `d.m.yy`, not embedded in a longer digit run. */
const DATE_TOKEN = /(?<!\d)\d{1,2}\.\d{1,2}\.(?:\d{4}|\d{2})(?!\d)/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Amount token: optional currency code, optional minus, apostrophe-grouped
 * or plain digits, optional two-digit fraction after `.` or `,`. A token
 * may neither start nor end inside another number, so `16.01.2026` and
 * `12'34` produce no tokens.
 *
 * Groups: 1 currency, 2 sign, 3 unsigned amount.
 */
function buildAmountPattern(currencies: readonly string[]): RegExp {
  const codes = currencies.map(escapeRegExp).join('|');
  return new RegExp(
    String.raw`(?:\b(${codes})\s*)?(?<![\d'.,])(-?)((?:\d{1,3}(?:'\d{3})+|\d+)(?:[.,]\d{2})?)(?![\d']|[.,]\d)`,
    'g'
  );
}

interface AmountToken {
  /** Index where the token starts, currency code included */
  start: number;
  negative: boolean;
  unsigned: string;
}

export interface TransactionLineParserOptions {
  categorizer?: Categorizer;
  /** Currency codes accepted in front of an amount */
  currencies?: readonly string[];
}

/**
 * Extracts one transaction from one statement line, e.g.
 * `15.01.2026 COOP Zürich, Kaufvertrag CHF 45.80`.
 *
 * Returns `null` for anything that is not a transaction line; it never
 * throws and never reports why a line was skipped.
 */
export class TransactionLineParser {
  private readonly categorizer: Categorizer;
  private readonly amountPattern: RegExp;

  constructor(options: TransactionLineParserOptions = {}) {
    this.categorizer = options.categorizer ?? createKeywordCategorizer();
    this.amountPattern = buildAmountPattern(options.currencies ?? SUPPORTED_CURRENCIES);
  }

  parse(line: string): Transaction | null {
    const trimmed = line.trim();

    const dateMatch = DATE_TOKEN.exec(trimmed);
    if (dateMatch === null) return null;
    const dateEnd = dateMatch.index + dateMatch[0].length;

    // The trailing numeric token is the ledger amount; earlier ones belong
    // to the description (years, street numbers, references).
    const amount = this.findLastAmount(trimmed, dateEnd);
    if (amount === null) return null;

    const date = parseSwissDate(dateMatch[0]);
    if (date === null) return null;

    const extracted = trimmed.slice(dateEnd, amount.start).trim();
    const details = extracted.length > 0 ? extracted : UNKNOWN_TRANSACTION_DETAILS;

    // Unsigned amounts are credits, minus-signed amounts debits.
    return {
      date,
      details,
      amount: normalizeAmount(amount.unsigned),
      direction: amount.negative ? 'debit' : 'credit',
      category: this.categorizer.categorize(details),
    };
  }

  private findLastAmount(line: string, fromIndex: number): AmountToken | null {
    const pattern = this.amountPattern;
    pattern.lastIndex = fromIndex;

    let last: AmountToken | null = null;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(line)) !== null) {
      const unsigned = match[3];
      if (unsigned !== undefined) {
        last = { start: match.index, negative: match[2] === '-', unsigned };
      }
    }

    return last;
  }
}

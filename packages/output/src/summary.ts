/**
 * Financial summary of a parsed statement: income, expenses, per-category
 * totals and the most recent transactions.
 */

import {
  CATEGORIES,
  compareDates,
  subtractAmounts,
  sumAmounts,
  type Category,
  type DecimalString,
  type Transaction,
} from '@ledgerlock/types';

export interface CategoryTotal {
  category: Category;
  amount: DecimalString;
  count: number;
}

export interface StatementSummary {
  totalIncome: DecimalString;
  totalExpenses: DecimalString;
  /** Income minus expenses; negative when more went out than came in */
  balance: DecimalString;
  /** Non-empty categories only, in category table order */
  byCategory: CategoryTotal[];
  /** Newest first; equal dates keep document order */
  recent: Transaction[];
}

export interface SummaryOptions {
  /** Number of transactions in `recent` (default: 10) */
  recentLimit?: number;
}

export function summarizeTransactions(
  transactions: readonly Transaction[],
  options: SummaryOptions = {}
): StatementSummary {
  const recentLimit = options.recentLimit ?? 10;

  const income: DecimalString[] = [];
  const expenses: DecimalString[] = [];
  const totals = new Map<Category, DecimalString[]>();

  for (const txn of transactions) {
    (txn.direction === 'credit' ? income : expenses).push(txn.amount);

    const amounts = totals.get(txn.category) ?? [];
    amounts.push(txn.amount);
    totals.set(txn.category, amounts);
  }

  const byCategory: CategoryTotal[] = [];
  for (const category of CATEGORIES) {
    const amounts = totals.get(category);
    if (amounts !== undefined) {
      byCategory.push({ category, amount: sumAmounts(amounts), count: amounts.length });
    }
  }

  // Array.prototype.sort is stable, so same-day transactions keep their order.
  const recent = [...transactions]
    .sort((a, b) => compareDates(b.date, a.date))
    .slice(0, Math.max(0, recentLimit));

  const totalIncome = sumAmounts(income);
  const totalExpenses = sumAmounts(expenses);

  return {
    totalIncome,
    totalExpenses,
    balance: subtractAmounts(totalIncome, totalExpenses),
    byCategory,
    recent,
  };
}

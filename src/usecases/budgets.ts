import type { Budget, Transaction, TransactionFilter } from '../domain/types';
import { monthKey } from '../utils/dates';
import { addAmounts, formatAmount, percentOf, roundTo, subtractAmounts } from '../utils/money';

export type BudgetState = 'Good' | 'Warning' | 'Over Budget';

export interface BudgetStatus {
  category: string;
  monthlyLimit: number;
  spent: number;
  percentage: number;
  status: BudgetState;
}

type BudgetSource = {
  listBudgets(): Budget[];
  listTransactions(filter?: TransactionFilter): Transaction[];
};

export const WARNING_PERCENT = 80;

export class BudgetService {
  constructor(private readonly ledger: BudgetSource) {}

  /** One row per budget for the month (YYYY-MM), in budget order. */
  status(month: string): BudgetStatus[] {
    const spent = new Map<string, number>();
    for (const t of this.ledger.listTransactions({ type: 'Expense' })) {
      if (monthKey(t.date) !== month) continue;
      spent.set(t.category, addAmounts(spent.get(t.category) ?? 0, t.amount));
    }
    return this.ledger.listBudgets().map((b) => {
      const used = spent.get(b.category) ?? 0;
      // Classified on the exact ratio; `percentage` is rounded for display only.
      const exact = percentOf(used, b.monthlyLimit);
      return {
        category: b.category,
        monthlyLimit: b.monthlyLimit,
        spent: used,
        percentage: roundTo(exact, 2),
        status: exact > 100 ? 'Over Budget' : exact > WARNING_PERCENT ? 'Warning' : 'Good',
      };
    });
  }

  alerts(month: string): string[] {
    const out: string[] = [];
    for (const s of this.status(month)) {
      if (s.status === 'Over Budget') {
        out.push(`${s.category} is over budget by ${formatAmount(subtractAmounts(s.spent, s.monthlyLimit))}`);
      } else if (s.status === 'Warning') {
        out.push(`${s.category} is approaching budget limit (${s.percentage.toFixed(1)}% used)`);
      }
    }
    return out;
  }
}

import type { IAnalyticsService, MonthlySummary, MonthlyTrend, SeriesKind } from '../ports/analytics';
import type { DateRange, Point, Transaction, TransactionFilter } from '../domain/types';
import { isoWeekKey, monthKey } from '../utils/dates';
import { addAmounts, subtractAmounts } from '../utils/money';

type TransactionSource = { listTransactions(filter?: TransactionFilter): Transaction[] };

export class AnalyticsService implements IAnalyticsService {
  constructor(private readonly provider: TransactionSource){}

  getWeeklySeries(kind: SeriesKind, range?: DateRange): Point[] {
    return seriesAggregate(this.provider.listTransactions({ range }), kind, 'week');
  }

  getMonthlySeries(kind: SeriesKind, range?: DateRange): Point[] {
    return seriesAggregate(this.provider.listTransactions({ range }), kind, 'month');
  }

  monthlySummary(month: string): MonthlySummary {
    let income = 0;
    let expenses = 0;
    for (const t of this.provider.listTransactions()) {
      if (monthKey(t.date) !== month) continue;
      if (t.type === 'Income') income = addAmounts(income, t.amount);
      else expenses = addAmounts(expenses, t.amount);
    }
    return { month, income, expenses, balance: subtractAmounts(income, expenses) };
  }

  /** Expense totals per category, in order of first occurrence. */
  categoryDistribution(filter: TransactionFilter = {}): Map<string, number> {
    const buckets = new Map<string, number>();
    for (const t of this.provider.listTransactions({ ...filter, type: 'Expense' })) {
      buckets.set(t.category, addAmounts(buckets.get(t.category) ?? 0, t.amount));
    }
    return buckets;
  }

  monthlyTrends(filter: TransactionFilter = {}): MonthlyTrend[] {
    const buckets = new Map<string, { income: number; expense: number }>();
    for (const t of this.provider.listTransactions(filter)) {
      const key = monthKey(t.date);
      const b = buckets.get(key) ?? { income: 0, expense: 0 };
      if (t.type === 'Income') b.income = addAmounts(b.income, t.amount);
      else b.expense = addAmounts(b.expense, t.amount);
      buckets.set(key, b);
    }
    return [...buckets.entries()]
      .sort((a, b) => a[0].localeCompare(b[0]))
      .map(([month, b]) => ({ month, income: b.income, expense: b.expense }));
  }
}

function seriesAggregate(items: Transaction[], kind: SeriesKind, gran: 'week'|'month'): Point[] {
  const buckets = new Map<string, number>();
  for (const t of items){
    if (kind === 'income' && t.type !== 'Income') continue;
    if (kind === 'expense' && t.type !== 'Expense') continue;
    const key = gran === 'week' ? isoWeekKey(t.date) : monthKey(t.date); // YYYY-Www or YYYY-MM
    const v = kind === 'balance' && t.type === 'Expense' ? -t.amount : t.amount;
    buckets.set(key, addAmounts(buckets.get(key) ?? 0, v));
  }
  const out = Array.from(buckets.entries())
    .sort((a,b)=> a[0].localeCompare(b[0]))
    .map(([x,y])=>({ x, y }));
  if (kind === 'balance') {
    // running balance
    let acc = 0;
    for (const p of out){ acc = addAmounts(acc, p.y); p.y = acc; }
  }
  return out;
}

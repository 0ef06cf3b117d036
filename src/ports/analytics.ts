import type { DateRange, Point, TransactionFilter } from '../domain/types';

export type SeriesKind = 'balance' | 'income' | 'expense';

export interface MonthlySummary { month: string; income: number; expenses: number; balance: number }
export interface MonthlyTrend { month: string; income: number; expense: number }

export interface IAnalyticsService {
  getWeeklySeries(kind: SeriesKind, range?: DateRange): Point[];
  getMonthlySeries(kind: SeriesKind, range?: DateRange): Point[];
  monthlySummary(month: string): MonthlySummary;
  categoryDistribution(filter?: TransactionFilter): Map<string, number>;
  monthlyTrends(filter?: TransactionFilter): MonthlyTrend[];
}

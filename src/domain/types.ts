export type TxType = 'Income' | 'Expense';

export const DEFAULT_CATEGORIES = [
  'Food & Dining',
  'Transportation',
  'Housing',
  'Utilities',
  'Entertainment',
  'Shopping',
  'Healthcare',
  'Education',
  'Salary',
  'Investment',
  'Other',
] as const;

export interface Transaction {
  id: string;
  date: string; // YYYY-MM-DD
  type: TxType;
  category: string;
  amount: number; // never negative, sign comes from type
  note?: string;
  tags?: string[];
  goalId?: string;
}

export interface SavingsGoal {
  id: string;
  name: string;
  targetAmount: number;
  targetDate?: string; // YYYY-MM-DD
  milestones?: number[]; // ascending amounts on the way to the target
}

export interface Budget {
  category: string;
  monthlyLimit: number;
}

export interface LedgerSnapshot {
  transactions: Transaction[];
  goals: SavingsGoal[];
  budgets: Budget[];
}

export interface DateRange { start?: string; end?: string }
export interface Point { x: string; y: number }

export interface TransactionFilter {
  range?: DateRange;
  category?: string;
  type?: TxType;
  search?: string;
  minAmount?: number;
  maxAmount?: number;
  tag?: string;
  goalId?: string;
}

export type GroupBy = 'category' | 'month' | 'type';

export type EntityKind = 'transaction' | 'goal';

export interface GoalProgress {
  currentTotal: number;
  targetAmount: number;
  fraction: number;
}

export type ImportStrategy = 'overwrite' | 'merge';
